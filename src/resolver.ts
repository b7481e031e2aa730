import { lstat } from 'node:fs/promises';
import { join, parse } from 'node:path';
import { errorCode } from './errors.js';

export async function pathExists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return false;
    }

    throw error;
  }
}

export function numberedPath(path: string, counter: number): string {
  const { dir, name, ext } = parse(path);
  return join(dir, `${name} (${counter})${ext}`);
}

/**
 * Returns `desiredPath` if nothing exists there, otherwise the first free
 * `name (n).ext` sibling counting up from 1.
 *
 * Check-then-use: callers must not run two resolve+move sequences against the
 * same directory at once.
 */
export async function resolveUniquePath(desiredPath: string): Promise<string> {
  if (!(await pathExists(desiredPath))) {
    return desiredPath;
  }

  let counter = 1;
  let candidate = numberedPath(desiredPath, counter);

  while (await pathExists(candidate)) {
    counter++;
    candidate = numberedPath(desiredPath, counter);
  }

  return candidate;
}
