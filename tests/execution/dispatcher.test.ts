import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  ExecutionFailure,
  InterpreterUnavailableError,
  ShellUnavailableError,
} from '../../src/errors.js';
import { ScriptBackend } from '../../src/execution/backends.js';
import { ExecutionDispatcher } from '../../src/execution/dispatcher.js';
import type { ApplicationType, ExecutionBackend, ExecutionResult } from '../../src/execution/types.js';
import { quietLogger, testDispatcher } from '../helpers.js';

class RecordingBackend implements ExecutionBackend {
  readonly received: string[] = [];

  constructor(
    readonly type: ApplicationType,
    private readonly result: ExecutionResult,
  ) {}

  async run(code: string): Promise<ExecutionResult> {
    this.received.push(code);
    return this.result;
  }
}

describe('ExecutionDispatcher', () => {
  let sandbox: string;

  beforeEach(() => {
    sandbox = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'tr-exec-')));
  });

  afterEach(() => {
    fs.rmSync(sandbox, { recursive: true, force: true });
  });

  it('routes each application type to its own backend', async () => {
    const ok = { exitCode: 0, stdout: 'ok', stderr: '', timedOut: false };
    const script = new RecordingBackend('script', ok);
    const shell = new RecordingBackend('shell', ok);
    const dispatcher = new ExecutionDispatcher({ script, shell }, quietLogger());

    await dispatcher.execute({ application_type: 'shell', code: 'ls' });
    await dispatcher.execute({ application_type: 'script', code: 'print(1)' });

    expect(shell.received).toEqual(['ls']);
    expect(script.received).toEqual(['print(1)']);
  });

  it('runs a script backend and captures stdout and stderr', async () => {
    const result = await testDispatcher(sandbox).execute({
      application_type: 'script',
      code: 'console.log("out"); console.error("warn")',
    });
    expect(result).toEqual({ exitCode: 0, stdout: 'out\n', stderr: 'warn\n', timedOut: false });
  });

  it('runs a shell backend inside the sandbox directory', async () => {
    const result = await testDispatcher(sandbox).execute({ application_type: 'shell', code: 'pwd' });
    expect(result.stdout).toBe(`${sandbox}\n`);
  });

  it('throws ExecutionFailure with stderr on a non-zero exit', async () => {
    const err = await testDispatcher(sandbox)
      .execute({ application_type: 'shell', code: 'echo broken >&2; exit 3' })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ExecutionFailure);
    if (!(err instanceof ExecutionFailure)) return;
    expect(err.result.exitCode).toBe(3);
    expect(err.stderr).toBe('broken');
  });

  it('throws ShellUnavailableError when the shell cannot be found', async () => {
    const err = await testDispatcher(sandbox, 'definitely-not-a-shell-xyz')
      .execute({ application_type: 'shell', code: 'echo hi' })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ShellUnavailableError);
  });

  it('throws InterpreterUnavailableError when the interpreter cannot be started', async () => {
    const missing = new ScriptBackend('no-such-python-xyz', { cwd: sandbox, timeoutMs: 0 });
    const dispatcher = new ExecutionDispatcher({ script: missing, shell: missing }, quietLogger());

    const err = await dispatcher
      .execute({ application_type: 'script', code: 'print(1)' })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InterpreterUnavailableError);
    expect(err).not.toBeInstanceOf(ExecutionFailure);
    if (!(err instanceof InterpreterUnavailableError)) return;
    expect(err.message).toBe('Interpreter could not be started: spawn no-such-python-xyz ENOENT');
  });

  it('treats a timeout as an execution failure', async () => {
    const slow = new ScriptBackend(process.execPath, { cwd: sandbox, timeoutMs: 300 }, '-e');
    const dispatcher = new ExecutionDispatcher({ script: slow, shell: slow }, quietLogger());

    const err = await dispatcher
      .execute({ application_type: 'script', code: 'setTimeout(() => {}, 30000)' })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ExecutionFailure);
    if (!(err instanceof ExecutionFailure)) return;
    expect(err.result.timedOut).toBe(true);
    expect(err.stderr).toBe('Execution timed out');
  }, 10000);
});
