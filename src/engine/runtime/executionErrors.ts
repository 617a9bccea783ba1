/**
 * Launch / execution error utilities
 * OSのエラー（ENOENT、EACCES等）を読みやすい1行のメッセージに整形する
 */

export type RunFailureKind =
  | 'UnsupportedLanguage'
  | 'MissingFile'
  | 'LaunchFailure'
  | 'NonZeroExit'
  | 'Terminated'
  | 'TimedOut'
  | 'Cancelled';

function errorCode(error: Error): unknown {
  return 'code' in error ? error.code : undefined;
}

/**
 * Format an OS launch error the way Node prints it
 * e.g. "spawn python ENOENT (python: command not found)"
 */
export function formatLaunchError(
  error: Error | unknown,
  context?: {
    command?: string;
  }
): string {
  const err = error instanceof Error ? error : new Error(String(error));
  const code = errorCode(err);

  let message = err.message || `${err.name || 'Error'}`;

  if (code === 'ENOENT' && context?.command) {
    message += ` (${context.command}: command not found)`;
  } else if ((code === 'EACCES' || code === 'EPERM') && context?.command) {
    message += ` (${context.command}: permission denied)`;
  }

  return message;
}

export function unsupportedLanguageMessage(extension: string): string {
  return `Unsupported script type: ${extension === '' ? '(no extension)' : extension}`;
}

export function missingFileMessage(scriptPath: string): string {
  return `Script not found: ${scriptPath}. Save the script before running it.`;
}

export function timedOutMessage(timeoutMs: number): string {
  return `Script timed out after ${timeoutMs}ms`;
}

export const CANCELLED_MESSAGE = 'Script run cancelled';
