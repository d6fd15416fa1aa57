import { spawn, ChildProcess } from 'node:child_process';

export interface SpawnOptions {
  /** Kill the process group after this many ms. Omitted or 0 means no deadline. */
  timeoutMs?: number;
  killGraceMs?: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface SpawnResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
  /** Set when the process could not be started at all. */
  spawnError?: string;
}

export function spawnCapture(
  command: string,
  args: string[],
  options: SpawnOptions = {},
): Promise<SpawnResult> {
  return new Promise((resolve) => {
    const killGraceMs = options.killGraceMs ?? 5000;
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let timedOut = false;
    let settled = false;

    const child: ChildProcess = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
    });

    child.stdout?.on('data', (chunk: Buffer) => {
      stdoutChunks.push(chunk);
    });

    child.stderr?.on('data', (chunk: Buffer) => {
      stderrChunks.push(chunk);
    });

    const timeoutHandle = options.timeoutMs
      ? setTimeout(() => {
          if (settled) return;
          timedOut = true;
          killProcessGroup(child, killGraceMs);
        }, options.timeoutMs)
      : undefined;

    child.on('close', (code) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutHandle);
      resolve({
        stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
        stderr: Buffer.concat(stderrChunks).toString('utf-8'),
        exitCode: code,
        timedOut,
      });
    });

    // Spawn failures (ENOENT, EACCES) never emit 'close'
    child.on('error', (err) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutHandle);
      resolve({
        stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
        stderr: Buffer.concat(stderrChunks).toString('utf-8'),
        exitCode: null,
        timedOut: false,
        spawnError: err.message,
      });
    });
  });
}

function killProcessGroup(child: ChildProcess, graceMs: number): void {
  const pid = child.pid;
  if (!pid) return;

  // Try process group kill first (POSIX), fall back to direct child kill
  try {
    process.kill(-pid, 'SIGTERM');
  } catch {
    try {
      child.kill('SIGTERM');
    } catch {
      return;
    }
  }

  const graceTimeout = setTimeout(() => {
    try {
      process.kill(-pid, 'SIGKILL');
    } catch {
      try {
        child.kill('SIGKILL');
      } catch {
        // Already dead
      }
    }
  }, graceMs);

  child.on('close', () => clearTimeout(graceTimeout));
}
