import { spawnCapture } from '../utils/exec.js';
import { findExecutable } from '../utils/which.js';
import { ShellUnavailableError } from '../errors.js';
import type { ApplicationType, ExecutionBackend, ExecutionResult } from './types.js';

export interface BackendOptions {
  /** Working directory of the child process. */
  cwd: string;
  /** 0 disables the deadline. */
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
}

/** Runs code as an inline program: `<interpreter> <flag> <code>`. */
export class ScriptBackend implements ExecutionBackend {
  readonly type: ApplicationType = 'script';

  constructor(
    private readonly interpreter: string,
    private readonly options: BackendOptions,
    private readonly inlineFlag = '-c',
  ) {}

  run(code: string): Promise<ExecutionResult> {
    return spawnCapture(this.interpreter, [this.inlineFlag, code], {
      cwd: this.options.cwd,
      timeoutMs: this.options.timeoutMs,
      env: this.options.env,
    });
  }
}

/** Runs code as an inline shell command: `<shell> -c <code>`. */
export class ShellBackend implements ExecutionBackend {
  readonly type: ApplicationType = 'shell';

  constructor(
    private readonly shell: string,
    private readonly options: BackendOptions,
  ) {}

  async run(code: string): Promise<ExecutionResult> {
    const resolved = await findExecutable(this.shell, this.options.env?.PATH ?? process.env.PATH);
    if (!resolved) {
      throw new ShellUnavailableError(this.shell);
    }
    return spawnCapture(resolved, ['-c', code], {
      cwd: this.options.cwd,
      timeoutMs: this.options.timeoutMs,
      env: this.options.env,
    });
  }
}
