/**
 * Session Scope
 * - Tracks every shell session that currently owns a child process
 * - Kills them when the host process exits, so no shell is left orphaned
 */

import { shellInfo, shellWarn } from '@/engine/runtime/runtimeLogger';

export interface ScopedProcessOwner {
  /** Synchronously kill the owned child process, if any. */
  terminateNow(): void;
}

const owners = new Set<ScopedProcessOwner>();
let exitHookInstalled = false;
let signalHandlers: Array<[NodeJS.Signals, () => void]> = [];

function installExitHook(): void {
  if (exitHookInstalled) return;
  exitHookInstalled = true;
  // only synchronous work is possible inside 'exit'
  process.once('exit', terminateAllSessions);
}

export function trackSession(owner: ScopedProcessOwner): void {
  owners.add(owner);
  installExitHook();
}

export function untrackSession(owner: ScopedProcessOwner): void {
  owners.delete(owner);
}

export function trackedSessionCount(): number {
  return owners.size;
}

/**
 * Kill every tracked child process. Safe to call more than once.
 */
export function terminateAllSessions(): void {
  for (const owner of Array.from(owners)) {
    try {
      owner.terminateNow();
    } catch (e) {
      shellWarn('⚠️ Failed to terminate shell session:', e);
    }
    owners.delete(owner);
  }
}

/**
 * Opt-in: on SIGINT/SIGTERM/SIGHUP kill tracked sessions, then re-raise the
 * signal so the host still terminates the way it would have without the hook.
 * Returns a function that removes the handlers.
 */
export function installSignalCleanup(
  signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP']
): () => void {
  removeSignalCleanup();

  for (const signal of signals) {
    const handler = () => {
      shellInfo(`Received ${signal}, terminating shell sessions`);
      terminateAllSessions();
      removeSignalCleanup();
      process.kill(process.pid, signal);
    };
    process.once(signal, handler);
    signalHandlers.push([signal, handler]);
  }

  return removeSignalCleanup;
}

function removeSignalCleanup(): void {
  for (const [signal, handler] of signalHandlers) {
    process.off(signal, handler);
  }
  signalHandlers = [];
}
