import { describe, it, expect } from 'vitest';
import * as os from 'node:os';
import * as fs from 'node:fs';
import { spawnCapture } from '../../src/utils/exec.js';

describe('spawnCapture', () => {
  it('captures stdout from a simple command', async () => {
    const result = await spawnCapture('echo', ['hello']);
    expect(result.stdout).toBe('hello\n');
    expect(result.exitCode).toBe(0);
    expect(result.timedOut).toBe(false);
  });

  it('captures stderr', async () => {
    const result = await spawnCapture(process.execPath, ['-e', 'console.error("err")']);
    expect(result.stderr).toBe('err\n');
  });

  it('returns non-zero exit code on failure', async () => {
    const result = await spawnCapture(process.execPath, ['-e', 'process.exit(42)']);
    expect(result.exitCode).toBe(42);
  });

  it('runs in the requested working directory', async () => {
    const dir = fs.realpathSync(os.tmpdir());
    const result = await spawnCapture(process.execPath, ['-e', 'process.stdout.write(process.cwd())'], { cwd: dir });
    expect(result.stdout).toBe(dir);
  });

  it('reports a missing command as a spawn error, apart from stderr', async () => {
    const result = await spawnCapture('definitely-not-a-command-xyz', []);
    expect(result.exitCode).toBeNull();
    expect(result.stderr).toBe('');
    expect(result.spawnError).toBe('spawn definitely-not-a-command-xyz ENOENT');
  });

  it('leaves spawnError unset when the process started', async () => {
    const result = await spawnCapture(process.execPath, ['-e', 'process.exit(1)']);
    expect(result.spawnError).toBeUndefined();
  });

  it('kills process on timeout', async () => {
    const result = await spawnCapture('sleep', ['30'], { timeoutMs: 500, killGraceMs: 200 });
    expect(result.timedOut).toBe(true);
    expect(result.exitCode).not.toBe(0);
  }, 10000);
});
