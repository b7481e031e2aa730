import { copyFile, mkdir, rename, rm, unlink, constants } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { MoveResult } from './types.js';
import { errorCode, errorMessage } from './errors.js';

function failure(
  source: string,
  destination: string,
  error: unknown,
  cleanupError: string | null = null
): MoveResult {
  const message = errorMessage(error);

  return {
    success: false,
    source,
    destination,
    error: cleanupError ? `${message} (could not remove ${destination}: ${cleanupError})` : message,
  };
}

async function removePartialCopy(destination: string): Promise<string | null> {
  try {
    await rm(destination, { force: true });
    return null;
  } catch (error) {
    return errorMessage(error);
  }
}

async function copyThenDelete(source: string, destination: string): Promise<MoveResult> {
  try {
    await copyFile(source, destination, constants.COPYFILE_EXCL);
  } catch (error) {
    const cleanupError = errorCode(error) === 'EEXIST' ? null : await removePartialCopy(destination);
    return failure(source, destination, error, cleanupError);
  }

  try {
    await unlink(source);
  } catch (error) {
    // Source still in place: drop the copy so the file is not in two places.
    return failure(source, destination, error, await removePartialCopy(destination));
  }

  return { success: true, source, destination, method: 'copy' };
}

export async function moveFile(source: string, destination: string): Promise<MoveResult> {
  try {
    await mkdir(dirname(destination), { recursive: true });
    await rename(source, destination);

    return { success: true, source, destination, method: 'rename' };
  } catch (error) {
    if (errorCode(error) === 'EXDEV') {
      return copyThenDelete(source, destination);
    }

    return failure(source, destination, error);
  }
}
