import { proxy } from 'valtio/vanilla';

import { OUTPUT_CONFIG } from '@/constants/config';

export type LogLevel = 'info' | 'warn' | 'error';

/** ログの発生元（runtimeLogger の Runtime / Shell） */
export type LogContext = 'Runtime' | 'Shell';

export interface LogEntry {
  message: string;
  type?: LogLevel;
  context?: LogContext;
  /** 同じ内容が連続した回数（1回目は undefined） */
  count?: number;
}

// Vanilla Valtio store (UI 非依存)
export const loggerStore = proxy<{
  messages: LogEntry[];
  mirrorToConsole: boolean;
}>({
  messages: [],
  mirrorToConsole: true,
});

const CONSOLE_BY_LEVEL: Record<LogLevel, (line: string) => void> = {
  info: line => console.log(line),
  warn: line => console.warn(line),
  error: line => console.error(line),
};

function sameEntry(entry: LogEntry | undefined, msg: string, type?: LogLevel, context?: LogContext) {
  return entry !== undefined && entry.message === msg && entry.type === type && entry.context === context;
}

/**
 * ログを追加する（engine 層から直接呼ぶ）
 * - 直前と同じ内容なら count を増やす
 * - OUTPUT_MAX_MESSAGES を超えた分は古い順に捨てる
 */
export function pushLogMessage(msg: string, type?: LogLevel, context?: LogContext): void {
  const messages = loggerStore.messages;
  const last = messages[messages.length - 1];

  if (last && sameEntry(last, msg, type, context)) {
    last.count = (last.count ?? 1) + 1;
  } else {
    messages.push({ message: msg, type, context });
  }

  const overflow = messages.length - OUTPUT_CONFIG.OUTPUT_MAX_MESSAGES;
  if (overflow > 0) messages.splice(0, overflow);

  if (loggerStore.mirrorToConsole && type) {
    CONSOLE_BY_LEVEL[type](`[${context ?? 'unknown'}] ${msg}`);
  }
}

export function clearAllLogs(): void {
  loggerStore.messages = [];
}

/**
 * コンソールへのミラー出力を切り替え（ホスト側がログを自前で描画する場合など）
 */
export function setConsoleMirror(enabled: boolean): void {
  loggerStore.mirrorToConsole = enabled;
}
