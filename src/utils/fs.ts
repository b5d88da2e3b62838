import * as fs from 'node:fs/promises';

const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR']);

export function isErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function isMissing(error: unknown): boolean {
  return (
    isErrnoException(error) &&
    error.code !== undefined &&
    MISSING_CODES.has(error.code)
  );
}

/**
 * Returns true if anything (file, directory, link target) exists at the path.
 * Errors other than "not found" propagate.
 */
export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }
}

export async function isDirectory(target: string): Promise<boolean> {
  try {
    const stats = await fs.stat(target);
    return stats.isDirectory();
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }
}
