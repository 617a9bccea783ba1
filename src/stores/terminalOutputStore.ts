import { proxy } from 'valtio/vanilla';

import { TERMINAL_CONFIG } from '@/constants/config';

import type { OutputSource } from '@/engine/cmd/shell/shellSession';

export interface TerminalChunk {
  /** 到着順の通し番号 */
  seq: number;
  source: OutputSource | 'system';
  text: string;
}

// Vanilla Valtio store (UI 非依存)
// フロントエンドは subscribe / snapshot で描画する
export const terminalOutputStore = proxy<{
  chunks: TerminalChunk[];
  nextSeq: number;
  maxChunks: number;
}>({
  chunks: [],
  nextSeq: 0,
  maxChunks: TERMINAL_CONFIG.MAX_CHUNKS,
});

/**
 * 出力チャンクを到着順に追加
 */
export function appendTerminalChunk(source: TerminalChunk['source'], text: string): void {
  if (text === '') return;

  terminalOutputStore.chunks.push({ seq: terminalOutputStore.nextSeq, source, text });
  terminalOutputStore.nextSeq += 1;

  // 最大数制限（古いチャンクから削除）
  const overflow = terminalOutputStore.chunks.length - terminalOutputStore.maxChunks;
  if (overflow > 0) {
    terminalOutputStore.chunks.splice(0, overflow);
  }
}

/**
 * 表示用テキスト（source を指定するとそのストリームのみ）
 */
export function getTerminalText(source?: TerminalChunk['source']): string {
  return terminalOutputStore.chunks
    .filter(chunk => source === undefined || chunk.source === source)
    .map(chunk => chunk.text)
    .join('');
}

export function setTerminalMaxChunks(max: number): void {
  terminalOutputStore.maxChunks = Math.max(1, max);
  const overflow = terminalOutputStore.chunks.length - terminalOutputStore.maxChunks;
  if (overflow > 0) {
    terminalOutputStore.chunks.splice(0, overflow);
  }
}

/**
 * 出力をクリア（通し番号はリセットしない）
 */
export function clearTerminalOutput(): void {
  terminalOutputStore.chunks = [];
}
