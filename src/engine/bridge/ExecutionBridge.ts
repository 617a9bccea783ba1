/**
 * Execution Event Bridge
 *
 * UI（フロントエンド）とコアの間の契約
 * - スクリプト実行は呼び出し / 戻り値のペア（出力は一括）
 * - シェルの入出力はプッシュ型（チャンクごとにコールバック）
 * - コアは UI フレームワークに依存しない。UI スレッドへの受け渡しは dispatch で行う
 */

import type { ShellCommand } from '@/engine/cmd/shell/defaultShell';
import type {
  CommandSubmission,
  OutputListener,
  StateListener,
  Unsubscribe,
} from '@/engine/cmd/shell/shellSession';
import type { RunOptions, RunResult } from '@/engine/runtime/ScriptRunner';

/**
 * UI 側のスケジューラ（例: 描画ループのキューに積む）
 */
export type Dispatch = (task: () => void) => void;

/**
 * 同期的にそのまま呼び出す（デフォルト）
 */
export const immediateDispatch: Dispatch = task => task();

export interface ScriptRunPort {
  /** 保存済みスクリプトを実行（終了後に結果を返す） */
  runScript(scriptPath: string, options?: RunOptions): Promise<RunResult>;
}

export interface ShellPort {
  readonly isShellRunning: boolean;
  startShell(shellCommand?: ShellCommand): boolean;
  submitCommand(submission: CommandSubmission | string): boolean;
  stopShell(): Promise<void>;
  restartShell(shellCommand?: ShellCommand): Promise<boolean>;
  onShellOutput(listener: OutputListener): Unsubscribe;
  onShellState(listener: StateListener): Unsubscribe;
}

export interface ExecutionBridge extends ScriptRunPort, ShellPort {
  /** シェルを停止し、購読をすべて解除 */
  dispose(): Promise<void>;
}
