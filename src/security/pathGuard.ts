import * as path from 'node:path';
import * as fs from 'node:fs';
import { minimatch } from 'minimatch';
import { PathEscapeError } from '../errors.js';

/**
 * Resolve a path through symlinks, walking up to the nearest existing ancestor
 * if the path itself doesn't exist yet.
 */
function resolveWithAncestors(targetPath: string): string {
  const absPath = path.resolve(targetPath);
  try {
    return fs.realpathSync(absPath);
  } catch {
    // Walk up until we find an existing directory, then re-append the tail
    let current = absPath;
    const tail: string[] = [];
    while (true) {
      const parent = path.dirname(current);
      tail.unshift(path.basename(current));
      if (parent === current) {
        return absPath;
      }
      current = parent;
      try {
        return path.join(fs.realpathSync(current), ...tail);
      } catch {
        // Keep walking up
      }
    }
  }
}

export function resolveRoot(root: string): string {
  try {
    return fs.realpathSync(path.resolve(root));
  } catch {
    return path.resolve(root);
  }
}

export function isUnderRoot(resolved: string, resolvedRoot: string): boolean {
  if (resolved === resolvedRoot) return true;
  const prefix = resolvedRoot.endsWith(path.sep) ? resolvedRoot : resolvedRoot + path.sep;
  return resolved.startsWith(prefix);
}

/**
 * Resolve a caller-supplied path inside the sandbox root.
 *
 * The requested path is always joined onto the root, so a leading `/` does not
 * make it absolute. Throws PathEscapeError when the canonical result is not the
 * root or a descendant of it, or when it matches one of the deny globs.
 */
export function resolveSandboxPath(
  sandboxRoot: string,
  requested: string,
  denyGlobs: string[] = [],
): string {
  if (!requested || requested.includes('\0')) {
    throw new PathEscapeError(requested, 'invalid path: empty or contains null byte');
  }

  const root = resolveRoot(sandboxRoot);
  const resolved = resolveWithAncestors(path.join(root, requested));

  if (!isUnderRoot(resolved, root)) {
    throw new PathEscapeError(requested, 'path escapes the sandbox root');
  }

  const relative = path.relative(root, resolved).split(path.sep).join('/');
  for (const glob of denyGlobs) {
    if (minimatch(relative, glob, { dot: true })) {
      throw new PathEscapeError(requested, `path matches deny glob: ${glob}`);
    }
  }

  return resolved;
}
