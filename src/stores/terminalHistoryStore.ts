/**
 * Terminal History Store
 * シェルに送信したコマンドの履歴（メモリ上、セッション単位）
 * プロンプトでの上下キーによる呼び出しに対応
 */

import { proxy } from 'valtio/vanilla';

import { HISTORY_CONFIG } from '@/constants/config';

export const terminalHistoryStore = proxy<{
  entries: string[];
  /** 呼び出し中の位置（entries.length = 未選択） */
  cursor: number;
  maxEntries: number;
}>({
  entries: [],
  cursor: 0,
  maxEntries: HISTORY_CONFIG.MAX_ENTRIES,
});

/**
 * コマンドを履歴に追加
 * - 空文字と直前と同じコマンドは追加しない
 */
export function pushTerminalHistory(command: string): void {
  const trimmed = command.trim();
  if (trimmed !== '' && terminalHistoryStore.entries[terminalHistoryStore.entries.length - 1] !== trimmed) {
    terminalHistoryStore.entries.push(trimmed);
    const overflow = terminalHistoryStore.entries.length - terminalHistoryStore.maxEntries;
    if (overflow > 0) {
      terminalHistoryStore.entries.splice(0, overflow);
    }
  }
  terminalHistoryStore.cursor = terminalHistoryStore.entries.length;
}

/**
 * 1つ前のコマンド（先頭ではそのまま）
 */
export function previousTerminalHistory(): string | null {
  if (terminalHistoryStore.entries.length === 0) return null;
  terminalHistoryStore.cursor = Math.max(0, terminalHistoryStore.cursor - 1);
  return terminalHistoryStore.entries[terminalHistoryStore.cursor] ?? null;
}

/**
 * 1つ後のコマンド（末尾を越えると空文字 = 入力中の行に戻る）
 */
export function nextTerminalHistory(): string | null {
  if (terminalHistoryStore.entries.length === 0) return null;
  terminalHistoryStore.cursor = Math.min(
    terminalHistoryStore.entries.length,
    terminalHistoryStore.cursor + 1
  );
  return terminalHistoryStore.entries[terminalHistoryStore.cursor] ?? '';
}

export function getTerminalHistory(): string[] {
  return [...terminalHistoryStore.entries];
}

export function clearTerminalHistory(): void {
  terminalHistoryStore.entries = [];
  terminalHistoryStore.cursor = 0;
}

export function setTerminalHistoryLimit(max: number): void {
  terminalHistoryStore.maxEntries = Math.max(1, max);
  const overflow = terminalHistoryStore.entries.length - terminalHistoryStore.maxEntries;
  if (overflow > 0) {
    terminalHistoryStore.entries.splice(0, overflow);
  }
  terminalHistoryStore.cursor = terminalHistoryStore.entries.length;
}
