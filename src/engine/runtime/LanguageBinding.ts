/**
 * Language Binding
 *
 * 拡張子とインタープリタの対応を表す型
 * - 各言語（Python、Batch、PowerShell等）は1つのバインディングで表現
 * - 言語を追加する場合はバインディングを1つ登録するだけ
 */

/**
 * インタープリタテンプレート内でスクリプトパスに置き換えられるトークン
 */
export const SCRIPT_PATH_TOKEN = '{scriptPath}';

export interface LanguageBinding {
  /** 識別子（例: "python"） */
  readonly id: string;

  /** 拡張子（先頭のドット付き、小文字。例: ".py"） */
  readonly extension: string;

  /** 表示名（例: "Python"） */
  readonly displayName: string;

  /**
   * コマンドトークン列（例: ["python", "{scriptPath}"]）
   * 先頭がコマンド、残りが引数
   */
  readonly interpreterTemplate: readonly string[];
}

export type ResolveResult =
  | { found: true; binding: LanguageBinding }
  | { found: false; extension: string };

/**
 * 起動するコマンド（シェルを介さず直接起動する）
 */
export interface InterpreterCommand {
  command: string;
  args: string[];
}
