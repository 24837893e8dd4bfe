/**
 * File system helpers used by the config loader and the calendar writer
 */

import { promises as fs } from 'fs';
import { basename, dirname, join } from 'path';
import { randomUUID } from 'crypto';

/**
 * Write `content` to a sibling temp file, then rename it over `filePath`.
 * Readers never observe a half-written file; the temp file is removed
 * if any step fails. Returns the number of bytes written.
 */
export async function atomicWriteFile(filePath: string, content: string): Promise<number> {
  const dir = dirname(filePath);
  await fs.mkdir(dir, { recursive: true });

  const data = Buffer.from(content, 'utf-8');
  const tmpPath = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);
  try {
    await fs.writeFile(tmpPath, data);
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
  return data.byteLength;
}

/**
 * Read a UTF-8 file, returning null when it does not exist
 */
export async function readFileSafe(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
