import { resolveExecutionConfig, type ExecutionConfig } from '@/constants/config';
import { parseShellCommand, resolveDefaultShell, type ShellCommand } from '@/engine/cmd/shell/defaultShell';
import { ShellSession } from '@/engine/cmd/shell/shellSession';
import { initializeBuiltinLanguages } from '@/engine/runtime/builtinLanguages';
import { languageRegistry, type LanguageRegistry } from '@/engine/runtime/LanguageRegistry';
import { runtimeError, shellInfo } from '@/engine/runtime/runtimeLogger';
import { ScriptRunner } from '@/engine/runtime/ScriptRunner';
import { pushTerminalHistory, setTerminalHistoryLimit } from '@/stores/terminalHistoryStore';
import { appendTerminalChunk, setTerminalMaxChunks } from '@/stores/terminalOutputStore';

import { immediateDispatch } from './ExecutionBridge';

import type { Dispatch, ExecutionBridge } from './ExecutionBridge';
import type { ProcessLauncher } from '@/engine/cmd/shell/process';
import type {
  CommandSubmission,
  OutputEvent,
  OutputListener,
  ShellStateEvent,
  StateListener,
  Unsubscribe,
} from '@/engine/cmd/shell/shellSession';
import type { RunOptions, RunResult } from '@/engine/runtime/ScriptRunner';

export interface ExecutionCoreOptions {
  config?: ExecutionConfig;
  registry?: LanguageRegistry;
  launcher?: ProcessLauncher;
  runner?: ScriptRunner;
  session?: ShellSession;
  /** how callbacks reach the UI thread; defaults to a direct call */
  dispatch?: Dispatch;
  /** working directory of the shell */
  cwd?: string;
  /** append shell output to terminalOutputStore (default true) */
  recordOutput?: boolean;
}

/**
 * ExecutionCore
 * - One ScriptRunner and one ShellSession behind the ExecutionBridge contract
 * - Any number of front-ends (full editor, minimal console) can subscribe
 */
export class ExecutionCore implements ExecutionBridge {
  readonly registry: LanguageRegistry;
  private runner: ScriptRunner;
  private session: ShellSession;
  private dispatch: Dispatch;
  private recordOutput: boolean;

  private outputListeners = new Set<OutputListener>();
  private stateListeners = new Set<StateListener>();
  private sessionSubscriptions: Unsubscribe[] = [];
  private disposed = false;

  constructor(options: ExecutionCoreOptions = {}) {
    const config = options.config ?? resolveExecutionConfig();

    this.registry = options.registry ?? languageRegistry;
    if (this.registry.getAll().length === 0) {
      initializeBuiltinLanguages(this.registry);
    }

    this.runner =
      options.runner ??
      new ScriptRunner({
        registry: this.registry,
        launcher: options.launcher,
        encoding: config.encoding,
        defaultTimeoutMs: config.runTimeoutMs,
        killSignal: config.killSignal,
        killGraceMs: config.killGraceMs,
      });

    this.session =
      options.session ??
      new ShellSession({
        launcher: options.launcher,
        defaultShell: configuredShell(config),
        cwd: options.cwd,
        encoding: config.encoding,
        lineTerminator: config.lineTerminator,
        killSignal: config.killSignal,
        killGraceMs: config.killGraceMs,
      });

    this.dispatch = options.dispatch ?? immediateDispatch;
    this.recordOutput = options.recordOutput ?? true;

    setTerminalMaxChunks(config.terminalMaxChunks);
    setTerminalHistoryLimit(config.historyMaxEntries);

    this.sessionSubscriptions.push(
      this.session.onOutput(event => this.handleOutput(event)),
      this.session.onStateChange(event => this.handleState(event))
    );
  }

  get isShellRunning(): boolean {
    return this.session.isRunning;
  }

  runScript(scriptPath: string, options?: RunOptions): Promise<RunResult> {
    return this.runner.run(scriptPath, options);
  }

  startShell(shellCommand?: ShellCommand): boolean {
    if (this.disposed) return false;
    return this.session.start(shellCommand);
  }

  submitCommand(submission: CommandSubmission | string): boolean {
    const text = typeof submission === 'string' ? submission : submission.text;
    const accepted = this.session.submit(text);
    if (accepted) pushTerminalHistory(text);
    return accepted;
  }

  stopShell(): Promise<void> {
    return this.session.stop();
  }

  async restartShell(shellCommand?: ShellCommand): Promise<boolean> {
    if (this.disposed) return false;
    return this.session.restart(shellCommand);
  }

  onShellOutput(listener: OutputListener): Unsubscribe {
    this.outputListeners.add(listener);
    return () => {
      this.outputListeners.delete(listener);
    };
  }

  onShellState(listener: StateListener): Unsubscribe {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    await this.session.stop();
    for (const unsubscribe of this.sessionSubscriptions) unsubscribe();
    this.sessionSubscriptions = [];
    this.outputListeners.clear();
    this.stateListeners.clear();
  }

  private handleOutput(event: OutputEvent): void {
    if (this.recordOutput) appendTerminalChunk(event.source, event.chunk);
    this.deliver(this.outputListeners, event);
  }

  private handleState(event: ShellStateEvent): void {
    if (this.recordOutput && event.state === 'exited') {
      appendTerminalChunk('system', `\n[shell exited: ${exitDetail(event)}]\n`);
    }
    this.deliver(this.stateListeners, event);
  }

  private deliver<T>(listeners: Set<(event: T) => void>, event: T): void {
    for (const listener of Array.from(listeners)) {
      this.dispatch(() => {
        try {
          listener(event);
        } catch (e) {
          runtimeError('Bridge listener failed:', e);
        }
      });
    }
  }
}

function exitDetail(event: ShellStateEvent): string {
  if (event.reason) return event.reason;
  if (event.exitCode !== null) return `code ${event.exitCode}`;
  if (event.signal) return `signal ${event.signal}`;
  return 'unknown';
}

function configuredShell(config: ExecutionConfig): ShellCommand {
  if (config.shell) {
    const parsed = parseShellCommand(config.shell);
    if (parsed) {
      shellInfo(`Using configured shell: ${config.shell}`);
      return parsed;
    }
  }
  return resolveDefaultShell();
}
