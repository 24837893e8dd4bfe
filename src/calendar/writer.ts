/**
 * Calendar file output
 */

import { resolve } from 'path';
import { atomicWriteFile } from '../utils/fs.js';

/**
 * The calendar file could not be written. No partial file is left behind.
 */
export class WriteError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'WriteError';
  }
}

export interface WriteResult {
  path: string;
  bytes: number;
}

/**
 * Write calendar text atomically (temp file + rename)
 *
 * @throws WriteError on any filesystem failure
 */
export async function writeCalendar(outPath: string, content: string): Promise<WriteResult> {
  const path = resolve(outPath);
  try {
    const bytes = await atomicWriteFile(path, content);
    return { path, bytes };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new WriteError(`Failed to write ${path}: ${message}`, path, error);
  }
}
