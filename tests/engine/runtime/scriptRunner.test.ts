/**
 * ScriptRunner Tests
 *
 * 実行前チェック（言語・ファイル）、出力の収集、終了コード、タイムアウト / キャンセル
 * プロセスはフェイク（最後のブロックのみ実プロセス）
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { initializeBuiltinLanguages } from '@/engine/runtime/builtinLanguages';
import { SCRIPT_PATH_TOKEN } from '@/engine/runtime/LanguageBinding';
import { LanguageRegistry } from '@/engine/runtime/LanguageRegistry';
import { ScriptRunner } from '@/engine/runtime/ScriptRunner';
import { loggerStore } from '@/stores/loggerStore';

import { errnoError, FakeLauncher } from '../../_helpers/fakeProcess';

function inSequence(...steps: Array<() => void>): void {
  const [first, ...rest] = steps;
  if (!first) return;
  setImmediate(() => {
    first();
    inSequence(...rest);
  });
}

describe('ScriptRunner', () => {
  let dir: string;
  let registry: LanguageRegistry;

  const saveScript = async (name: string, content = ''): Promise<string> => {
    const path = join(dir, name);
    await writeFile(path, content);
    return path;
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'scriptdock-runner-'));
    registry = new LanguageRegistry();
    initializeBuiltinLanguages(registry);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('pre-launch checks', () => {
    test('a missing file never launches the interpreter', async () => {
      const launcher = new FakeLauncher();
      const runner = new ScriptRunner({ registry, launcher });
      const path = join(dir, 'unsaved.py');

      const result = await runner.run(path);

      expect(result).toMatchObject({
        succeeded: false,
        failure: 'MissingFile',
        exitCode: null,
        language: 'Python',
        combinedOutput: `Script not found: ${path}. Save the script before running it.`,
      });
      expect(launcher.calls).toHaveLength(0);
    });

    test('a directory is not a script', async () => {
      const launcher = new FakeLauncher();
      const runner = new ScriptRunner({ registry, launcher });
      const path = join(dir, 'package.py');
      await mkdir(path);

      const result = await runner.run(path);

      expect(result.failure).toBe('MissingFile');
      expect(launcher.calls).toHaveLength(0);
    });

    test('an unknown extension is rejected before the file is checked', async () => {
      const launcher = new FakeLauncher();
      const runner = new ScriptRunner({ registry, launcher });

      const result = await runner.run(join(dir, 'ghost.rb'));

      expect(result).toMatchObject({
        succeeded: false,
        failure: 'UnsupportedLanguage',
        exitCode: null,
        combinedOutput: 'Unsupported script type: .rb',
      });
      expect(result.language).toBeUndefined();
      expect(launcher.calls).toHaveLength(0);
    });

    test('a file without extension is unsupported', async () => {
      const launcher = new FakeLauncher();
      const runner = new ScriptRunner({ registry, launcher });
      const path = await saveScript('Makefile', 'all:\n');

      const result = await runner.run(path);

      expect(result.combinedOutput).toBe('Unsupported script type: (no extension)');
      expect(launcher.calls).toHaveLength(0);
    });

    test('an already aborted signal cancels without launching', async () => {
      const launcher = new FakeLauncher();
      const runner = new ScriptRunner({ registry, launcher });
      const path = await saveScript('job.py');
      const controller = new AbortController();
      controller.abort();

      const result = await runner.run(path, { signal: controller.signal });

      expect(result).toMatchObject({ failure: 'Cancelled', combinedOutput: 'Script run cancelled' });
      expect(launcher.calls).toHaveLength(0);
    });
  });

  describe('execution', () => {
    test('runs the interpreter with the script path as a single argument', async () => {
      const launcher = new FakeLauncher(child => {
        child.emitStdout('hello\n');
        child.finish(0);
      });
      const runner = new ScriptRunner({ registry, launcher });
      const path = await saveScript('hello world.py', 'print("hello")\n');

      const result = await runner.run(path);

      expect(result).toMatchObject({
        succeeded: true,
        combinedOutput: 'hello\n',
        exitCode: 0,
        language: 'Python',
      });
      expect(result.failure).toBeUndefined();
      expect(result.durationMs).toBeGreaterThanOrEqual(0);
      expect(launcher.calls).toEqual([
        { command: 'python', args: [path], options: { cwd: undefined, env: undefined, interactive: false } },
      ]);
    });

    test('passes cwd and env through to the launcher', async () => {
      const launcher = new FakeLauncher(child => child.finish(0));
      const runner = new ScriptRunner({ registry, launcher });
      const path = await saveScript('env.py');
      const env = { SCRIPTDOCK_TEST: '1' };

      await runner.run(path, { cwd: dir, env });

      expect(launcher.calls[0]?.options).toEqual({ cwd: dir, env, interactive: false });
    });

    test('stdout and stderr are merged in arrival order', async () => {
      const launcher = new FakeLauncher(child =>
        inSequence(
          () => child.emitStdout('one\n'),
          () => child.emitStderr('two\n'),
          () => {
            child.emitStdout('three\n');
            child.finish(1);
          }
        )
      );
      const runner = new ScriptRunner({ registry, launcher });
      const path = await saveScript('mixed.py');

      const result = await runner.run(path);

      expect(result).toMatchObject({
        succeeded: false,
        combinedOutput: 'one\ntwo\nthree\n',
        exitCode: 1,
        failure: 'NonZeroExit',
      });
    });

    test('a character split across two reads is decoded once', async () => {
      const bytes = Buffer.from('héllo ✓\n', 'utf8');
      const launcher = new FakeLauncher(child =>
        inSequence(
          () => child.emitStdout(bytes.subarray(0, 8)),
          () => {
            child.emitStdout(bytes.subarray(8));
            child.finish(0);
          }
        )
      );
      const runner = new ScriptRunner({ registry, launcher });
      const path = await saveScript('unicode.py');

      const result = await runner.run(path);

      expect(result.combinedOutput).toBe('héllo ✓\n');
    });

    test('a signal exit is reported as Terminated', async () => {
      const launcher = new FakeLauncher(child => inSequence(() => child.finish(null, 'SIGKILL')));
      const runner = new ScriptRunner({ registry, launcher });
      const path = await saveScript('killed.py');

      const result = await runner.run(path);

      expect(result).toMatchObject({ succeeded: false, exitCode: null, failure: 'Terminated' });
    });

    test('an interpreter that cannot be found is a launch failure', async () => {
      const launcher = new FakeLauncher(child =>
        child.failToLaunch(errnoError('ENOENT', 'spawn python ENOENT'))
      );
      const runner = new ScriptRunner({ registry, launcher });
      const path = await saveScript('nopython.py');

      const result = await runner.run(path);

      expect(result).toMatchObject({
        succeeded: false,
        exitCode: null,
        failure: 'LaunchFailure',
        language: 'Python',
        combinedOutput: 'spawn python ENOENT (python: command not found)',
      });
      expect(loggerStore.messages.some(m => m.type === 'error')).toBe(true);
    });

    test('a launcher that throws is a launch failure', async () => {
      const launcher = new FakeLauncher(() => {
        throw errnoError('EACCES', 'spawn python EACCES');
      });
      const runner = new ScriptRunner({ registry, launcher });
      const path = await saveScript('denied.py');

      const result = await runner.run(path);

      expect(result.failure).toBe('LaunchFailure');
      expect(result.combinedOutput).toBe('spawn python EACCES (python: permission denied)');
    });
  });

  describe('timeout and cancellation', () => {
    test('kills a script that runs past its timeout', async () => {
      const launcher = new FakeLauncher(child => child.emitStdout('working\n'));
      const runner = new ScriptRunner({ registry, launcher });
      const path = await saveScript('forever.py');

      const result = await runner.run(path, { timeoutMs: 100 });

      expect(result).toMatchObject({
        succeeded: false,
        failure: 'TimedOut',
        exitCode: null,
        combinedOutput: 'working\nScript timed out after 100ms',
      });
      expect(launcher.lastChild.killSignals).toEqual(['SIGTERM']);
    });

    test('uses the runner default timeout', async () => {
      const launcher = new FakeLauncher();
      const runner = new ScriptRunner({ registry, launcher, defaultTimeoutMs: 100, killSignal: 'SIGINT' });
      const path = await saveScript('slow.py');

      const result = await runner.run(path);

      expect(result.combinedOutput).toBe('Script timed out after 100ms');
      expect(launcher.lastChild.killSignals).toEqual(['SIGINT']);
    });

    test('aborting the signal cancels a running script', async () => {
      const controller = new AbortController();
      const launcher = new FakeLauncher(() => inSequence(() => controller.abort()));
      const runner = new ScriptRunner({ registry, launcher });
      const path = await saveScript('cancel.py');

      const result = await runner.run(path, { signal: controller.signal });

      expect(result).toMatchObject({
        succeeded: false,
        failure: 'Cancelled',
        combinedOutput: 'Script run cancelled',
      });
    });

    test('escalates to SIGKILL when the script ignores the kill signal', async () => {
      const launcher = new FakeLauncher(undefined, { exitOnKill: false });
      const runner = new ScriptRunner({ registry, launcher, killGraceMs: 10 });
      const path = await saveScript('stubborn.py');

      const running = runner.run(path, { timeoutMs: 100 });
      await vi.waitFor(() => expect(launcher.lastChild.killSignals).toEqual(['SIGTERM', 'SIGKILL']));
      launcher.lastChild.finish(null, 'SIGKILL');

      await expect(running).resolves.toMatchObject({
        failure: 'TimedOut',
        combinedOutput: 'Script timed out after 100ms',
      });
      expect(loggerStore.messages.map(m => m.message)).toContain(
        '⚠️ python did not exit after SIGTERM, sending SIGKILL (pid=1001)'
      );
    });

    test('no SIGKILL once the script exits within the grace period', async () => {
      const launcher = new FakeLauncher();
      const runner = new ScriptRunner({ registry, launcher, killGraceMs: 10 });
      const path = await saveScript('polite.py');

      await runner.run(path, { timeoutMs: 100 });
      await new Promise(resolve => setTimeout(resolve, 30));

      expect(launcher.lastChild.killSignals).toEqual(['SIGTERM']);
    });

    test('cancelling a queued run settles it without launching', async () => {
      const launcher = new FakeLauncher();
      const runner = new ScriptRunner({ registry, launcher });
      const first = await saveScript('long.py');
      const second = await saveScript('queued.py');
      const controller = new AbortController();

      const firstRun = runner.run(first);
      const secondRun = runner.run(second, { signal: controller.signal });
      await vi.waitFor(() => expect(launcher.calls).toHaveLength(1));

      controller.abort();
      await expect(secondRun).resolves.toEqual({
        succeeded: false,
        combinedOutput: 'Script run cancelled',
        exitCode: null,
        failure: 'Cancelled',
        language: 'Python',
        durationMs: expect.any(Number),
      });
      expect(loggerStore.messages.map(m => m.message)).toContain(
        `⏹️ Script run cancelled before it started: ${second}`
      );

      launcher.lastChild.finish(0);
      await expect(firstRun).resolves.toMatchObject({ succeeded: true });
      await new Promise(resolve => setTimeout(resolve, 20));
      expect(launcher.calls).toHaveLength(1);
    });

    test('a queued run times out while waiting', async () => {
      const launcher = new FakeLauncher();
      const runner = new ScriptRunner({ registry, launcher });
      const first = await saveScript('long.py');
      const second = await saveScript('queued.py');

      const firstRun = runner.run(first);
      const secondRun = runner.run(second, { timeoutMs: 20 });

      await expect(secondRun).resolves.toMatchObject({
        failure: 'TimedOut',
        combinedOutput: 'Script timed out after 20ms',
        exitCode: null,
      });
      expect(launcher.calls).toHaveLength(1);

      launcher.lastChild.finish(0);
      await firstRun;
      await new Promise(resolve => setTimeout(resolve, 20));
      expect(launcher.calls).toHaveLength(1);
    });
  });

  test('runs one script at a time', async () => {
    const launcher = new FakeLauncher();
    const runner = new ScriptRunner({ registry, launcher });
    const first = await saveScript('first.py');
    const second = await saveScript('second.py');

    const firstRun = runner.run(first);
    const secondRun = runner.run(second);

    await vi.waitFor(() => expect(launcher.calls).toHaveLength(1));
    await new Promise(resolve => setTimeout(resolve, 20));
    expect(launcher.calls).toHaveLength(1);

    launcher.lastChild.finish(0);
    await expect(firstRun).resolves.toMatchObject({ succeeded: true });

    await vi.waitFor(() => expect(launcher.calls).toHaveLength(2));
    expect(launcher.calls[1]?.args).toEqual([second]);
    launcher.lastChild.finish(2);
    await expect(secondRun).resolves.toMatchObject({ exitCode: 2, failure: 'NonZeroExit' });
  });
});

describe('ScriptRunner with real processes', () => {
  let dir: string;
  let registry: LanguageRegistry;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'scriptdock real '));
    registry = new LanguageRegistry();
    registry.register({
      id: 'node-module',
      extension: '.mjs',
      displayName: 'Node',
      interpreterTemplate: [process.execPath, SCRIPT_PATH_TOKEN],
    });
    registry.register({
      id: 'missing',
      extension: '.nope',
      displayName: 'Missing',
      interpreterTemplate: ['scriptdock-missing-interpreter', SCRIPT_PATH_TOKEN],
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('passes a path containing spaces unchanged', async () => {
    const path = join(dir, 'print args.mjs');
    await writeFile(path, 'console.log(JSON.stringify(process.argv.slice(1)));\n');

    const result = await new ScriptRunner({ registry }).run(path);

    expect(result.succeeded).toBe(true);
    expect(result.combinedOutput).toBe(`${JSON.stringify([path])}\n`);
  });

  test('captures both streams and the exit code', async () => {
    const path = join(dir, 'fail.mjs');
    await writeFile(path, "process.stdout.write('out\\n'); process.stderr.write('err\\n'); process.exitCode = 3;\n");

    const result = await new ScriptRunner({ registry }).run(path);

    expect(result.exitCode).toBe(3);
    expect(result.failure).toBe('NonZeroExit');
    expect(result.combinedOutput).toContain('out\n');
    expect(result.combinedOutput).toContain('err\n');
    expect(result.combinedOutput).toHaveLength('out\nerr\n'.length);
  });

  test('a script that ignores SIGTERM is killed after the grace period', async () => {
    const path = join(dir, 'stubborn.mjs');
    await writeFile(path, "process.on('SIGTERM', () => {});\nsetInterval(() => {}, 1000);\n");

    const result = await new ScriptRunner({ registry, killGraceMs: 200 }).run(path, { timeoutMs: 300 });

    expect(result.failure).toBe('TimedOut');
    expect(result.combinedOutput.endsWith('Script timed out after 300ms')).toBe(true);
    expect(result.durationMs).toBeLessThan(2500);
  });

  test('reports a missing interpreter', async () => {
    const path = join(dir, 'task.nope');
    await writeFile(path, '');

    const result = await new ScriptRunner({ registry }).run(path);

    expect(result.failure).toBe('LaunchFailure');
    expect(result.combinedOutput).toBe(
      'spawn scriptdock-missing-interpreter ENOENT (scriptdock-missing-interpreter: command not found)'
    );
  });
});
