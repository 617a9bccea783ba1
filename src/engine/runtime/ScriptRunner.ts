/**
 * Script Runner
 *
 * 保存済みスクリプトを拡張子に対応するインタープリタで実行する
 * - インタープリタはシェルを介さず直接起動（パスは1つの引数としてそのまま渡す）
 * - stdout / stderr は到着順に1つの出力へまとめる
 * - 結果はプロセス終了後に一括で返す（途中経過は返さない）
 * - 実行は1つずつ（前の実行が終わるまで次は待つ）
 */

import { stat } from 'node:fs/promises';
import { resolve as resolvePath } from 'node:path';

import { EXECUTION_CONFIG } from '@/constants/config';
import { attachDecodedListener } from '@/engine/cmd/shell/io/streamDecoder';
import { nodeProcessLauncher, waitForClose } from '@/engine/cmd/shell/process';

import {
  CANCELLED_MESSAGE,
  formatLaunchError,
  missingFileMessage,
  timedOutMessage,
  unsupportedLanguageMessage,
} from './executionErrors';
import { buildCommand, extensionOf, languageRegistry } from './LanguageRegistry';
import { runtimeError, runtimeInfo, runtimeWarn } from './runtimeLogger';

import type { RunFailureKind } from './executionErrors';
import type { LanguageBinding } from './LanguageBinding';
import type { LanguageRegistry } from './LanguageRegistry';
import type { LaunchedProcess, ProcessLauncher } from '@/engine/cmd/shell/process';

/**
 * 実行リクエスト（呼び出しごとに作成、保存しない）
 */
export interface RunRequest {
  /** 絶対パス */
  scriptPath: string;
  /** scriptPath から導出した拡張子 */
  extension: string;
}

/**
 * 実行結果
 */
export interface RunResult {
  succeeded: boolean;
  /** stdout と stderr を到着順にまとめた出力（起動失敗時は OS のエラーメッセージ） */
  combinedOutput: string;
  /** 終了コード（起動前の失敗・シグナル終了時は null） */
  exitCode: number | null;
  /** 失敗の分類（成功時は undefined） */
  failure?: RunFailureKind;
  /** 言語の表示名 */
  language?: string;
  durationMs: number;
}

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** 0 = タイムアウトなし（順番待ちの時間も含む） */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ScriptRunnerOptions {
  registry?: LanguageRegistry;
  launcher?: ProcessLauncher;
  encoding?: BufferEncoding;
  defaultTimeoutMs?: number;
  killSignal?: NodeJS.Signals;
  /** timeout / cancel で killSignal を送ってから SIGKILL に切り替えるまでの時間 */
  killGraceMs?: number;
}

type InterruptKind = 'TimedOut' | 'Cancelled';

/**
 * 1回の実行のタイムアウト / キャンセル
 * - run() の呼び出し時に開始する（順番待ちの間も有効）
 * - 起動前に発火した場合は whileQueued が解決し、起動後はハンドラ（kill）を呼ぶ
 */
class RunInterruption {
  kind: InterruptKind | null = null;
  readonly whileQueued: Promise<InterruptKind>;

  readonly timeoutMs: number;

  private signal?: AbortSignal;
  private resolveQueued: (kind: InterruptKind) => void = () => undefined;
  private handler: ((kind: InterruptKind) => void) | null = null;
  private timer: NodeJS.Timeout | null = null;
  private onAbort = () => this.trigger('Cancelled');

  constructor(timeoutMs: number, signal?: AbortSignal) {
    this.timeoutMs = timeoutMs;
    this.signal = signal;
    this.whileQueued = new Promise(resolve => {
      this.resolveQueued = resolve;
    });

    if (signal?.aborted) {
      this.trigger('Cancelled');
      return;
    }
    signal?.addEventListener('abort', this.onAbort, { once: true });
    if (timeoutMs > 0) {
      this.timer = setTimeout(() => this.trigger('TimedOut'), timeoutMs);
    }
  }

  /** 起動済みのプロセスに割り込みを届ける */
  attach(handler: (kind: InterruptKind) => void): void {
    this.handler = handler;
  }

  message(): string {
    return this.kind === 'TimedOut' ? timedOutMessage(this.timeoutMs) : CANCELLED_MESSAGE;
  }

  dispose(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.signal?.removeEventListener('abort', this.onAbort);
    this.handler = null;
  }

  private trigger(kind: InterruptKind): void {
    if (this.kind) return;
    this.kind = kind;
    if (this.handler) this.handler(kind);
    else this.resolveQueued(kind);
  }
}

async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export class ScriptRunner {
  private registry: LanguageRegistry;
  private launcher: ProcessLauncher;
  private encoding: BufferEncoding;
  private defaultTimeoutMs: number;
  private killSignal: NodeJS.Signals;
  private killGraceMs: number;

  // 直前の実行（終わるまで次の実行は始めない）
  private tail: Promise<void> = Promise.resolve();

  constructor(options: ScriptRunnerOptions = {}) {
    this.registry = options.registry ?? languageRegistry;
    this.launcher = options.launcher ?? nodeProcessLauncher;
    this.encoding = options.encoding ?? EXECUTION_CONFIG.ENCODING;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? EXECUTION_CONFIG.RUN_TIMEOUT_MS;
    this.killSignal = options.killSignal ?? EXECUTION_CONFIG.KILL_SIGNAL;
    this.killGraceMs = options.killGraceMs ?? EXECUTION_CONFIG.KILL_GRACE_MS;
  }

  /**
   * スクリプトを実行し、プロセス終了後に結果を返す
   * - 呼び出し側が事前にバッファを保存していることが前提
   * - timeoutMs / signal は順番待ちの間も有効（待機中に発火した実行は起動しない）
   */
  run(scriptPath: string, options: RunOptions = {}): Promise<RunResult> {
    const startedAt = Date.now();
    const interruption = new RunInterruption(
      options.timeoutMs ?? this.defaultTimeoutMs,
      options.signal
    );

    const turn = this.tail.then(() => this.execute(scriptPath, options, interruption, startedAt));
    // the chain only orders runs; each caller still sees its own rejection
    this.tail = turn.then(
      () => undefined,
      () => undefined
    );

    const beforeLaunch = interruption.whileQueued.then(() => {
      runtimeInfo(`⏹️ ${interruption.message()} before it started: ${scriptPath}`);
      return this.failed(
        interruption.kind ?? 'Cancelled',
        interruption.message(),
        startedAt,
        this.bindingFor(scriptPath)
      );
    });

    return Promise.race([turn, beforeLaunch]).finally(() => interruption.dispose());
  }

  private bindingFor(scriptPath: string): LanguageBinding | undefined {
    const resolved = this.registry.resolve(extensionOf(scriptPath));
    return resolved.found ? resolved.binding : undefined;
  }

  private async execute(
    scriptPath: string,
    options: RunOptions,
    interruption: RunInterruption,
    startedAt: number
  ): Promise<RunResult> {
    const request: RunRequest = {
      scriptPath: resolvePath(scriptPath),
      extension: extensionOf(scriptPath),
    };

    const resolved = this.registry.resolve(request.extension);
    if (!resolved.found) {
      runtimeWarn(`⚠️ No language binding for ${request.scriptPath}`);
      return this.failed('UnsupportedLanguage', unsupportedLanguageMessage(resolved.extension), startedAt);
    }
    const binding = resolved.binding;

    if (!(await isRegularFile(request.scriptPath))) {
      runtimeWarn(`⚠️ Script not found: ${request.scriptPath}`);
      return this.failed('MissingFile', missingFileMessage(request.scriptPath), startedAt, binding);
    }

    // 待機中にタイムアウト / キャンセル済み（呼び出し側には結果を返してある）
    if (interruption.kind) {
      return this.failed(interruption.kind, interruption.message(), startedAt, binding);
    }

    return this.spawnAndCollect(request, binding, options, interruption, startedAt);
  }

  private async spawnAndCollect(
    request: RunRequest,
    binding: LanguageBinding,
    options: RunOptions,
    interruption: RunInterruption,
    startedAt: number
  ): Promise<RunResult> {
    const { command, args } = buildCommand(binding, request.scriptPath);
    runtimeInfo(`▶️ Running ${binding.displayName}: ${command} ${args.join(' ')}`);

    let child: LaunchedProcess;
    try {
      child = this.launcher.launch(command, args, {
        cwd: options.cwd,
        env: options.env,
        interactive: false,
      });
    } catch (err) {
      const message = formatLaunchError(err, { command });
      runtimeError(`Failed to launch ${command}: ${message}`);
      return this.failed('LaunchFailure', message, startedAt, binding);
    }

    let combinedOutput = '';
    const append = (text: string) => {
      combinedOutput += text;
    };
    const onStreamError = (err: Error) => runtimeError(`Output read failed for ${command}:`, err);
    if (child.stdout) {
      attachDecodedListener(child.stdout, append, { encoding: this.encoding, onError: onStreamError });
    }
    if (child.stderr) {
      attachDecodedListener(child.stderr, append, { encoding: this.encoding, onError: onStreamError });
    }

    const escalation: { timer?: NodeJS.Timeout } = {};
    interruption.attach(() => {
      if (child.exitCode !== null || child.signalCode !== null) return;
      child.kill(this.killSignal);
      // escalate if the script ignores the polite signal
      escalation.timer = setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) {
          runtimeWarn(
            `⚠️ ${command} did not exit after ${this.killSignal}, sending SIGKILL (pid=${child.pid})`
          );
          child.kill('SIGKILL');
        }
      }, this.killGraceMs);
    });

    try {
      const exit = await waitForClose(child);
      const durationMs = Date.now() - startedAt;

      if (interruption.kind === 'TimedOut') {
        runtimeWarn(`⚠️ ${binding.displayName} script timed out: ${request.scriptPath}`);
        return {
          succeeded: false,
          combinedOutput: appendLine(combinedOutput, interruption.message()),
          exitCode: exit.code,
          failure: 'TimedOut',
          language: binding.displayName,
          durationMs,
        };
      }
      if (interruption.kind === 'Cancelled') {
        runtimeInfo(`⏹️ ${binding.displayName} script cancelled: ${request.scriptPath}`);
        return {
          succeeded: false,
          combinedOutput: appendLine(combinedOutput, interruption.message()),
          exitCode: exit.code,
          failure: 'Cancelled',
          language: binding.displayName,
          durationMs,
        };
      }

      if (exit.code === 0) {
        runtimeInfo(`✅ ${binding.displayName} script finished (${durationMs}ms)`);
        return {
          succeeded: true,
          combinedOutput,
          exitCode: 0,
          language: binding.displayName,
          durationMs,
        };
      }

      runtimeWarn(
        `⚠️ ${binding.displayName} script failed (code=${exit.code}, signal=${exit.signal})`
      );
      return {
        succeeded: false,
        combinedOutput,
        exitCode: exit.code,
        failure: exit.code === null ? 'Terminated' : 'NonZeroExit',
        language: binding.displayName,
        durationMs,
      };
    } catch (err) {
      const message = formatLaunchError(err, { command });
      runtimeError(`Failed to launch ${command}: ${message}`);
      return this.failed('LaunchFailure', message, startedAt, binding);
    } finally {
      if (escalation.timer) clearTimeout(escalation.timer);
      interruption.dispose();
    }
  }

  private failed(
    failure: RunFailureKind,
    message: string,
    startedAt: number,
    binding?: LanguageBinding
  ): RunResult {
    return {
      succeeded: false,
      combinedOutput: message,
      exitCode: null,
      failure,
      language: binding?.displayName,
      durationMs: Date.now() - startedAt,
    };
  }
}

function appendLine(output: string, line: string): string {
  if (output === '' || output.endsWith('\n')) return `${output}${line}`;
  return `${output}\n${line}`;
}
