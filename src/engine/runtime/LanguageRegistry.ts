/**
 * Language Registry
 *
 * 言語バインディングの登録・管理
 * - ビルトイン言語（Python、Batch、PowerShell）の登録
 * - ファイル拡張子に基づくインタープリタの解決
 */

import { SCRIPT_PATH_TOKEN } from './LanguageBinding';
import { runtimeInfo, runtimeWarn } from './runtimeLogger';

import type { InterpreterCommand, LanguageBinding, ResolveResult } from './LanguageBinding';

export const UNKNOWN_LANGUAGE = 'Unknown';

/**
 * 拡張子を正規化（".PY" / "py" -> ".py"）
 */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  if (trimmed === '') return '';
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

/**
 * ファイルパスから拡張子を取得（なければ空文字）
 */
export function extensionOf(filePath: string): string {
  const match = filePath.match(/(\.[^.\\/]+)$/);
  return match ? normalizeExtension(match[1]) : '';
}

/**
 * テンプレートのトークンを置換してコマンドを組み立てる
 * - スクリプトパスは1つの引数としてそのまま渡す（再クォートしない）
 */
export function buildCommand(binding: LanguageBinding, scriptPath: string): InterpreterCommand {
  const [command, ...rest] = binding.interpreterTemplate.map(token =>
    token === SCRIPT_PATH_TOKEN ? scriptPath : token
  );
  if (command === undefined) {
    throw new Error(`Language binding has an empty interpreter template: ${binding.id}`);
  }
  return { command, args: rest };
}

/**
 * LanguageRegistry
 *
 * シングルトンパターンで言語バインディングを管理
 */
export class LanguageRegistry {
  private static instance: LanguageRegistry | null = null;

  private bindings: Map<string, LanguageBinding> = new Map();
  private extensionToLanguage: Map<string, string> = new Map(); // .py -> "python"

  /**
   * シングルトンインスタンスを取得
   */
  static getInstance(): LanguageRegistry {
    if (!LanguageRegistry.instance) {
      LanguageRegistry.instance = new LanguageRegistry();
    }
    return LanguageRegistry.instance;
  }

  /**
   * 言語バインディングを登録
   */
  register(binding: LanguageBinding): void {
    const extension = normalizeExtension(binding.extension);
    if (extension === '') {
      throw new Error(`Language binding needs an extension: ${binding.id}`);
    }
    if (binding.interpreterTemplate.length === 0) {
      throw new Error(`Language binding has an empty interpreter template: ${binding.id}`);
    }

    if (this.bindings.has(binding.id)) {
      runtimeWarn(`⚠️ Language binding already registered: ${binding.id}, replacing...`);
      this.unregister(binding.id);
    }

    const frozen: LanguageBinding = Object.freeze({
      id: binding.id,
      extension,
      displayName: binding.displayName,
      interpreterTemplate: Object.freeze([...binding.interpreterTemplate]),
    });

    const previous = this.extensionToLanguage.get(extension);
    if (previous && previous !== binding.id) {
      runtimeWarn(`⚠️ Extension ${extension} moved from ${previous} to ${binding.id}`);
    }

    this.bindings.set(frozen.id, frozen);
    this.extensionToLanguage.set(extension, frozen.id);

    runtimeInfo(`✅ Language registered: ${frozen.displayName} (${extension})`);
  }

  /**
   * 言語バインディングを登録解除
   */
  unregister(id: string): void {
    const binding = this.bindings.get(id);
    if (!binding) {
      runtimeWarn(`⚠️ Language binding not found: ${id}`);
      return;
    }

    if (this.extensionToLanguage.get(binding.extension) === id) {
      this.extensionToLanguage.delete(binding.extension);
    }

    this.bindings.delete(id);
    runtimeInfo(`🗑️ Language unregistered: ${id}`);
  }

  /**
   * 拡張子からバインディングを解決（副作用なし）
   */
  resolve(extension: string): ResolveResult {
    const normalized = normalizeExtension(extension);
    const id = this.extensionToLanguage.get(normalized);
    const binding = id ? this.bindings.get(id) : undefined;
    return binding ? { found: true, binding } : { found: false, extension: normalized };
  }

  /**
   * ファイルパスの拡張子からバインディングを解決
   */
  resolveForFile(filePath: string): ResolveResult {
    return this.resolve(extensionOf(filePath));
  }

  /**
   * IDでバインディングを取得
   */
  get(id: string): LanguageBinding | null {
    return this.bindings.get(id) ?? null;
  }

  /**
   * 表示名からバインディングを取得（新規スクリプト作成時の拡張子決定用）
   */
  findByDisplayName(displayName: string): LanguageBinding | null {
    for (const binding of this.bindings.values()) {
      if (binding.displayName === displayName) return binding;
    }
    return null;
  }

  /**
   * ステータスバー表示用の言語名
   */
  detectLanguage(filePath: string): string {
    const result = this.resolveForFile(filePath);
    return result.found ? result.binding.displayName : UNKNOWN_LANGUAGE;
  }

  /**
   * 登録されているすべてのバインディング（登録順）
   */
  getAll(): LanguageBinding[] {
    return Array.from(this.bindings.values());
  }

  /**
   * すべてのバインディングをクリア（テスト用）
   */
  clear(): void {
    this.bindings.clear();
    this.extensionToLanguage.clear();
  }
}

/**
 * シングルトンインスタンスをエクスポート
 */
export const languageRegistry = LanguageRegistry.getInstance();
