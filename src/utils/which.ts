import { access, constants, stat } from 'node:fs/promises';
import * as path from 'node:path';

async function isExecutableFile(candidate: string): Promise<boolean> {
  try {
    const info = await stat(candidate);
    if (!info.isFile()) return false;
    await access(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Locate an executable the way a shell would: a name containing a separator is
 * checked as given, anything else is searched for on PATH.
 * Returns the absolute path, or null when nothing executable is found.
 */
export async function findExecutable(
  command: string,
  envPath: string | undefined = process.env.PATH,
): Promise<string | null> {
  if (!command) return null;

  if (command.includes('/') || command.includes(path.sep)) {
    const abs = path.resolve(command);
    return (await isExecutableFile(abs)) ? abs : null;
  }

  const extensions = process.platform === 'win32'
    ? (process.env.PATHEXT || '.EXE;.CMD;.BAT').split(';')
    : [''];

  for (const dir of (envPath || '').split(path.delimiter).filter(Boolean)) {
    for (const ext of extensions) {
      const candidate = path.join(dir, command + ext);
      if (await isExecutableFile(candidate)) return candidate;
    }
  }
  return null;
}
