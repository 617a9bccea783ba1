import { pushLogMessage } from '@/stores/loggerStore';

function safeStringify(value: unknown): string {
  try {
    if (typeof value === 'string') return value;
    if (typeof value === 'undefined') return 'undefined';
    if (value === null) return 'null';
    if (value instanceof Error) return `${value.name}: ${value.message}`;
    if (typeof value === 'object') return JSON.stringify(value, null, 2);
    return String(value);
  } catch {
    return String(value);
  }
}

export function formatArgs(args: unknown[]): string {
  return args.map(a => safeStringify(a)).join(' ');
}

export function runtimeInfo(...args: unknown[]): void {
  pushLogMessage(formatArgs(args), 'info', 'Runtime');
}

export function runtimeWarn(...args: unknown[]): void {
  pushLogMessage(formatArgs(args), 'warn', 'Runtime');
}

export function runtimeError(...args: unknown[]): void {
  pushLogMessage(formatArgs(args), 'error', 'Runtime');
}

/**
 * Shell セッション用のロガー（context を "Shell" にする）
 */
export function shellInfo(...args: unknown[]): void {
  pushLogMessage(formatArgs(args), 'info', 'Shell');
}

export function shellWarn(...args: unknown[]): void {
  pushLogMessage(formatArgs(args), 'warn', 'Shell');
}

export function shellError(...args: unknown[]): void {
  pushLogMessage(formatArgs(args), 'error', 'Shell');
}
