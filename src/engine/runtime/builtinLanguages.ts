/**
 * Builtin Language Bindings
 *
 * ビルトイン言語バインディングの初期化
 * - アプリケーション起動時に自動登録
 */

import { SCRIPT_PATH_TOKEN } from './LanguageBinding';
import { languageRegistry } from './LanguageRegistry';
import { runtimeInfo } from './runtimeLogger';

import type { LanguageBinding } from './LanguageBinding';
import type { LanguageRegistry } from './LanguageRegistry';

export const BUILTIN_LANGUAGES: readonly LanguageBinding[] = [
  {
    id: 'python',
    extension: '.py',
    displayName: 'Python',
    interpreterTemplate: ['python', SCRIPT_PATH_TOKEN],
  },
  {
    id: 'batch',
    extension: '.bat',
    displayName: 'Batch',
    interpreterTemplate: ['cmd.exe', '/c', SCRIPT_PATH_TOKEN],
  },
  {
    id: 'powershell',
    extension: '.ps1',
    displayName: 'PowerShell',
    interpreterTemplate: ['powershell', '-File', SCRIPT_PATH_TOKEN],
  },
];

/**
 * ビルトイン言語バインディングを登録
 */
export function initializeBuiltinLanguages(registry: LanguageRegistry = languageRegistry): void {
  runtimeInfo('🔧 Initializing builtin language bindings...');

  for (const binding of BUILTIN_LANGUAGES) {
    registry.register(binding);
  }

  runtimeInfo('✅ Builtin language bindings initialized');
}
