import { realpathSync } from 'node:fs';
import { resolve } from 'node:path';
import { globSync, hasMagic } from 'glob';
import { PathError } from '../errors.js';

/** Resolves a path against the base directory and returns its real path. */
export function canonicalPath(path: string, baseDirectory: string): string {
  try {
    return realpathSync(resolve(baseDirectory, path));
  } catch (err) {
    throw new PathError(path, baseDirectory, undefined, err);
  }
}

/**
 * Expands each pattern against the base directory. Plain paths must exist;
 * glob patterns must match at least one file. Matches are sorted so the
 * load order does not depend on directory listing order.
 */
export function expandPaths(patterns: string | readonly string[], baseDirectory: string): string[] {
  const list = typeof patterns === 'string' ? [patterns] : patterns;
  return list.flatMap((pattern) => {
    if (!hasMagic(pattern)) {
      return [canonicalPath(pattern, baseDirectory)];
    }
    const matches = globSync(pattern, { cwd: baseDirectory, absolute: true, nodir: true }).sort();
    if (matches.length === 0) {
      throw new PathError(pattern, baseDirectory, `Pattern "${pattern}" matched no files in ${baseDirectory}`);
    }
    return matches.map((match) => canonicalPath(match, baseDirectory));
  });
}
