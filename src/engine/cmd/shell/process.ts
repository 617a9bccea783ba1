import { spawn } from 'node:child_process';
import type EventEmitter from 'node:events';
import type { Readable, Writable } from 'node:stream';

/**
 * Process - the part of a child process the runner and the shell session use.
 * node:child_process ChildProcess satisfies it; tests pass an in-process fake.
 */
export type ProcExit = { code: number | null; signal: NodeJS.Signals | null };

export interface LaunchedProcess extends EventEmitter {
  readonly pid?: number;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export interface LaunchOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** pipe stdin (interactive shell) or leave it closed (script run) */
  interactive: boolean;
}

/**
 * Starts a program directly, never through an intermediate shell, so every
 * argument reaches the program as-is.
 */
export interface ProcessLauncher {
  launch(command: string, args: readonly string[], options: LaunchOptions): LaunchedProcess;
}

export const nodeProcessLauncher: ProcessLauncher = {
  launch(command, args, options) {
    return spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: [options.interactive ? 'pipe' : 'ignore', 'pipe', 'pipe'],
      shell: false,
      windowsHide: true,
    });
  },
};

/**
 * Resolves once the process has exited and its stdio has closed ('close').
 * Rejects with the launch error when the process never started.
 */
export function waitForClose(child: LaunchedProcess): Promise<ProcExit> {
  return new Promise((resolve, reject) => {
    let settled = false;

    const onClose = (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled) return;
      settled = true;
      child.off('error', onError);
      resolve({ code, signal });
    };

    const onError = (err: Error) => {
      // errors after a successful spawn (e.g. a failed kill) are not fatal here
      if (settled || child.pid !== undefined) return;
      settled = true;
      child.off('close', onClose);
      reject(err);
    };

    child.on('close', onClose);
    child.on('error', onError);
  });
}
