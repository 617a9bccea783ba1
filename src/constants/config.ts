import { runtimeWarn } from '@/engine/runtime/runtimeLogger';

export const ENV_KEY = {
  SHELL: 'SCRIPTDOCK_SHELL',
  RUN_TIMEOUT_MS: 'SCRIPTDOCK_RUN_TIMEOUT_MS',
  LINE_TERMINATOR: 'SCRIPTDOCK_LINE_TERMINATOR',
  TERMINAL_MAX_CHUNKS: 'SCRIPTDOCK_TERMINAL_MAX_CHUNKS',
};

// Output panel related configuration
export const OUTPUT_CONFIG = {
  // maximum number of messages to keep in the output panel
  OUTPUT_MAX_MESSAGES: 30,
};

// Script runner / shell session configuration
export const EXECUTION_CONFIG: {
  RUN_TIMEOUT_MS: number;
  ENCODING: BufferEncoding;
  LINE_TERMINATOR: string;
  KILL_SIGNAL: NodeJS.Signals;
  KILL_GRACE_MS: number;
} = {
  // 0 = no timeout
  RUN_TIMEOUT_MS: 0,
  // encoding used for captured output and submitted input
  ENCODING: 'utf8',
  LINE_TERMINATOR: '\n',
  KILL_SIGNAL: 'SIGTERM',
  // stop() and interrupted runs escalate to SIGKILL after this
  KILL_GRACE_MS: 2000,
};

// Terminal output log configuration
export const TERMINAL_CONFIG = {
  // oldest chunks are dropped beyond this
  MAX_CHUNKS: 5000,
};

export const HISTORY_CONFIG = {
  MAX_ENTRIES: 200,
};

export interface ExecutionConfig {
  shell?: string;
  runTimeoutMs: number;
  encoding: BufferEncoding;
  lineTerminator: string;
  killSignal: NodeJS.Signals;
  killGraceMs: number;
  terminalMaxChunks: number;
  historyMaxEntries: number;
}

function readPositiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    runtimeWarn(`⚠️ Ignoring invalid ${key}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}

/**
 * Defaults overlaid with SCRIPTDOCK_* environment overrides.
 */
export function resolveExecutionConfig(env: NodeJS.ProcessEnv = process.env): ExecutionConfig {
  const shell = env[ENV_KEY.SHELL]?.trim();
  const terminator = env[ENV_KEY.LINE_TERMINATOR];

  return {
    shell: shell ? shell : undefined,
    runTimeoutMs: readPositiveInt(env, ENV_KEY.RUN_TIMEOUT_MS, EXECUTION_CONFIG.RUN_TIMEOUT_MS),
    encoding: EXECUTION_CONFIG.ENCODING,
    // accept the escaped forms so the value can be set from a plain shell
    lineTerminator:
      terminator === undefined || terminator === ''
        ? EXECUTION_CONFIG.LINE_TERMINATOR
        : terminator.replace(/\\r/g, '\r').replace(/\\n/g, '\n'),
    killSignal: EXECUTION_CONFIG.KILL_SIGNAL,
    killGraceMs: EXECUTION_CONFIG.KILL_GRACE_MS,
    terminalMaxChunks: readPositiveInt(env, ENV_KEY.TERMINAL_MAX_CHUNKS, TERMINAL_CONFIG.MAX_CHUNKS),
    historyMaxEntries: HISTORY_CONFIG.MAX_ENTRIES,
  };
}
