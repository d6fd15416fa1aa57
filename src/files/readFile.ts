import * as fs from 'node:fs/promises';
import { ReadFailure, errnoCode, errorMessage } from '../errors.js';
import { resolveSandboxPath } from '../security/pathGuard.js';

/**
 * Read a sandbox file as UTF-8 text.
 * Throws PathEscapeError (from the guard) or ReadFailure.
 */
export async function readSandboxFile(
  sandboxRoot: string,
  requested: string,
  denyGlobs: string[] = [],
): Promise<string> {
  const resolved = resolveSandboxPath(sandboxRoot, requested, denyGlobs);
  try {
    return await fs.readFile(resolved, 'utf-8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      throw new ReadFailure('not-found', 'File not found', { cause: err });
    }
    throw new ReadFailure('io', errorMessage(err), { cause: err });
  }
}
