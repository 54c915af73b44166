/**
 * Utility functions for file and directory operations
 */

import { mkdir, stat } from 'fs/promises';
import type { Stats } from 'fs';
import { dirname } from 'path';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Ensure the parent directory of a file exists
 */
export async function ensureParentDir(filePath: string): Promise<void> {
  await ensureDir(dirname(filePath));
}

/**
 * Stat a path, following symlinks. Resolves to null when nothing is there
 * or the link is dangling.
 */
export async function statOrNull(filePath: string): Promise<Stats | null> {
  try {
    return await stat(filePath);
  } catch (error) {
    if (isErrnoException(error) && ['ENOENT', 'ENOTDIR', 'ELOOP'].includes(error.code ?? '')) {
      return null;
    }
    throw error;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
