import { EXECUTION_CONFIG } from '@/constants/config';
import { formatLaunchError } from '@/engine/runtime/executionErrors';
import { shellError, shellInfo, shellWarn } from '@/engine/runtime/runtimeLogger';

import { resolveDefaultShell, type ShellCommand } from './defaultShell';
import { attachDecodedListener } from './io/streamDecoder';
import { StdinWriter } from './io/stdinWriter';
import { nodeProcessLauncher, waitForClose } from './process';
import { trackSession, untrackSession, type ScopedProcessOwner } from './sessionScope';

import type { LaunchedProcess, ProcExit, ProcessLauncher } from './process';

/**
 * ShellSession
 * - Owns exactly one long-lived interactive shell process at a time
 * - stdout / stderr are drained by two independent listeners, each with its
 *   own decoder; chunks go out as soon as they are read
 * - stdin has a single writer (StdinWriter), so commands never interleave
 * - No auto-restart: after the shell exits, submit() is a no-op until start()
 */

export type OutputSource = 'stdout' | 'stderr';

export interface OutputEvent {
  source: OutputSource;
  chunk: string;
}

export interface CommandSubmission {
  text: string;
}

export type ShellState = 'idle' | 'running' | 'exited' | 'stopped';

/**
 * `state: 'exited'` is the ShellProcessTerminated notification: the shell went
 * away without stop() (crash, `exit` typed by the user, launch failure).
 */
export interface ShellStateEvent {
  state: ShellState;
  pid?: number;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  reason?: string;
}

export type OutputListener = (event: OutputEvent) => void;
export type StateListener = (event: ShellStateEvent) => void;
export type Unsubscribe = () => void;

export interface ShellSessionOptions {
  launcher?: ProcessLauncher;
  /** used when start() is called without a command */
  defaultShell?: ShellCommand;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  encoding?: BufferEncoding;
  lineTerminator?: string;
  killSignal?: NodeJS.Signals;
  /** how long stop() waits before escalating to SIGKILL */
  killGraceMs?: number;
}

export class ShellSession implements ScopedProcessOwner {
  private launcher: ProcessLauncher;
  private defaultShell: ShellCommand;
  private cwd?: string;
  private env?: NodeJS.ProcessEnv;
  private encoding: BufferEncoding;
  private lineTerminator: string;
  private killSignal: NodeJS.Signals;
  private killGraceMs: number;

  private child: LaunchedProcess | null = null;
  private writer: StdinWriter | null = null;
  private detachers: Array<() => void> = [];
  private _state: ShellState = 'idle';
  private lastEvent: ShellStateEvent = { state: 'idle', exitCode: null, signal: null };

  private outputListeners = new Set<OutputListener>();
  private stateListeners = new Set<StateListener>();

  constructor(options: ShellSessionOptions = {}) {
    this.launcher = options.launcher ?? nodeProcessLauncher;
    this.defaultShell = options.defaultShell ?? resolveDefaultShell();
    this.cwd = options.cwd;
    this.env = options.env;
    this.encoding = options.encoding ?? EXECUTION_CONFIG.ENCODING;
    this.lineTerminator = options.lineTerminator ?? EXECUTION_CONFIG.LINE_TERMINATOR;
    this.killSignal = options.killSignal ?? EXECUTION_CONFIG.KILL_SIGNAL;
    this.killGraceMs = options.killGraceMs ?? EXECUTION_CONFIG.KILL_GRACE_MS;
  }

  get state(): ShellState {
    return this._state;
  }

  get isRunning(): boolean {
    return this._state === 'running';
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  /** The most recent state change (what a late subscriber would have missed). */
  get lastStateEvent(): ShellStateEvent {
    return this.lastEvent;
  }

  /**
   * Spawn the shell. Returns false (and spawns nothing) while a process is
   * still attached, including one that is being stopped.
   */
  start(shellCommand: ShellCommand = this.defaultShell): boolean {
    if (this.child) {
      shellWarn(`⚠️ Shell already running (pid=${this.child.pid}), start ignored`);
      return false;
    }

    const args = shellCommand.args ?? [];
    let child: LaunchedProcess;
    try {
      child = this.launcher.launch(shellCommand.command, args, {
        cwd: this.cwd,
        env: this.env,
        interactive: true,
      });
    } catch (err) {
      const reason = formatLaunchError(err, { command: shellCommand.command });
      shellError(`Failed to start shell: ${reason}`);
      this.setState({ state: 'exited', exitCode: null, signal: null, reason });
      return false;
    }

    this.child = child;
    this.attachStreams(child);
    trackSession(this);

    void waitForClose(child).then(
      exit => this.handleExit(child, exit),
      (err: unknown) => this.handleLaunchError(child, shellCommand.command, err)
    );

    shellInfo(`🐚 Shell started: ${shellCommand.command} (pid=${child.pid})`);
    this.setState({ state: 'running', pid: child.pid, exitCode: null, signal: null });
    return true;
  }

  /**
   * Send one command line. Empty (whitespace-only) text is dropped.
   * Returns whether the command was queued; never throws.
   */
  submit(submission: CommandSubmission | string): boolean {
    const text = typeof submission === 'string' ? submission : submission.text;
    if (text.trim() === '') return false;

    const writer = this.writer;
    if (!this.isRunning || !writer) return false;

    const line = text.replace(/[\r\n]+$/, '') + this.lineTerminator;
    writer
      .write(line)
      .then(written => {
        if (!written) shellWarn(`⚠️ Command dropped, shell input closed: ${text}`);
      })
      .catch((err: unknown) => shellError('Failed to write command:', err));
    return true;
  }

  /**
   * Resolve once every submitted command has been handed to the process.
   */
  async drain(): Promise<void> {
    await this.writer?.flush();
  }

  onOutput(listener: OutputListener): Unsubscribe {
    this.outputListeners.add(listener);
    return () => {
      this.outputListeners.delete(listener);
    };
  }

  onStateChange(listener: StateListener): Unsubscribe {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  /**
   * Terminate the shell if one is attached. Unread output is discarded.
   * Resolves once the process has exited. Safe to call repeatedly.
   */
  async stop(): Promise<void> {
    const child = this.child;
    if (!child) return;

    const exited = waitForExit(child);
    const wasRunning = this._state === 'running';

    this.detachStreams();
    this.terminateNow();

    if (wasRunning) {
      this.setState({ state: 'stopped', pid: child.pid, exitCode: null, signal: null });
    }

    // escalate if the shell ignores the polite signal
    const escalation = setTimeout(() => {
      if (child.exitCode === null && child.signalCode === null) {
        shellWarn(`⚠️ Shell did not exit after ${this.killSignal}, sending SIGKILL (pid=${child.pid})`);
        child.kill('SIGKILL');
      }
    }, this.killGraceMs);
    escalation.unref();

    try {
      await exited;
    } finally {
      clearTimeout(escalation);
    }
    this.releaseChild(child);
  }

  /**
   * stop() followed by start()
   */
  async restart(shellCommand?: ShellCommand): Promise<boolean> {
    await this.stop();
    return this.start(shellCommand);
  }

  /**
   * Synchronous kill used by stop() and by the exit-time scope cleanup.
   */
  terminateNow(): void {
    const child = this.child;
    if (!child) return;

    this.writer?.close();
    this.writer = null;

    if (child.pid !== undefined && child.exitCode === null && child.signalCode === null) {
      child.kill(this.killSignal);
    }
  }

  private attachStreams(child: LaunchedProcess): void {
    if (child.stdout) {
      this.detachers.push(
        attachDecodedListener(child.stdout, chunk => this.emitOutput({ source: 'stdout', chunk }), {
          encoding: this.encoding,
          onError: err => shellError('stdout read failed:', err),
        })
      );
    }
    if (child.stderr) {
      this.detachers.push(
        attachDecodedListener(child.stderr, chunk => this.emitOutput({ source: 'stderr', chunk }), {
          encoding: this.encoding,
          onError: err => shellError('stderr read failed:', err),
        })
      );
    }
    if (child.stdin) {
      this.writer = new StdinWriter(child.stdin, {
        encoding: this.encoding,
        onError: err => shellWarn(`⚠️ Shell input closed: ${err.message}`),
      });
    }
  }

  private detachStreams(): void {
    for (const detach of this.detachers) detach();
    this.detachers = [];
  }

  private handleExit(child: LaunchedProcess, exit: ProcExit): void {
    if (this.child !== child) return;
    const stoppedByUs = this._state === 'stopped';
    this.releaseChild(child);

    if (stoppedByUs) {
      shellInfo(`Shell stopped (pid=${child.pid})`);
      return;
    }

    shellWarn(`⚠️ Shell exited (pid=${child.pid}, code=${exit.code}, signal=${exit.signal})`);
    this.setState({
      state: 'exited',
      pid: child.pid,
      exitCode: exit.code,
      signal: exit.signal,
    });
  }

  private handleLaunchError(child: LaunchedProcess, command: string, err: unknown): void {
    if (this.child !== child) return;
    const stoppedByUs = this._state === 'stopped';
    this.releaseChild(child);

    const reason = formatLaunchError(err, { command });
    shellError(`Failed to start shell: ${reason}`);
    if (!stoppedByUs) {
      this.setState({ state: 'exited', exitCode: null, signal: null, reason });
    }
  }

  private releaseChild(child: LaunchedProcess): void {
    if (this.child !== child) return;
    this.detachStreams();
    this.writer?.close();
    this.writer = null;
    this.child = null;
    untrackSession(this);
  }

  private emitOutput(event: OutputEvent): void {
    for (const listener of Array.from(this.outputListeners)) {
      try {
        listener(event);
      } catch (e) {
        shellError('Output listener failed:', e);
      }
    }
  }

  private setState(event: ShellStateEvent): void {
    this._state = event.state;
    this.lastEvent = event;
    for (const listener of Array.from(this.stateListeners)) {
      try {
        listener(event);
      } catch (e) {
        shellError('State listener failed:', e);
      }
    }
  }
}

function waitForExit(child: LaunchedProcess): Promise<void> {
  return new Promise(resolve => {
    if (child.pid === undefined || child.exitCode !== null || child.signalCode !== null) {
      resolve();
      return;
    }
    child.once('exit', () => resolve());
  });
}

/**
 * Run `fn` with a fresh session that is always stopped afterwards,
 * whether `fn` returns or throws.
 */
export async function withShellSession<T>(
  options: ShellSessionOptions,
  fn: (session: ShellSession) => Promise<T> | T
): Promise<T> {
  const session = new ShellSession(options);
  try {
    return await fn(session);
  } finally {
    await session.stop();
  }
}
