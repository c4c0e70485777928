/**
 * Durable rewrite using write-file-atomic: content lands in a temp file
 * that is renamed over the target.
 */

import writeFileAtomic from 'write-file-atomic';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { EntryStoreError } from '../core/errors.js';
import { StoreErrorCode } from '../types/error-codes.js';

/**
 * Write data to a file atomically.
 * Creates parent directories if they don't exist.
 */
export async function atomicWrite(
  filePath: string,
  data: string,
  options?: { mode?: number },
): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFileAtomic(filePath, data, { encoding: 'utf8', mode: options?.mode });
  } catch (err) {
    throw new EntryStoreError(
      StoreErrorCode.IO_FAILURE,
      `Atomic write failed: ${filePath}`,
      { cause: err },
    );
  }
}
