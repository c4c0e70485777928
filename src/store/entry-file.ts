/**
 * Backing file format and disk sync for entry stores.
 *
 * Format: newline-separated entries, `\r\n` read as `\n`, blank lines ignored.
 * Inserts are appended (append sync); deletes rewrite the whole file from the
 * in-memory set (rewrite sync).
 */

import { open, readFile, writeFile } from 'node:fs/promises';
import { EntryStoreError, hasErrnoCode } from '../core/errors.js';
import { StoreErrorCode } from '../types/error-codes.js';
import { atomicWrite } from './atomic.js';

/**
 * Normalize a raw entry for lookup: trim, then lowercase.
 * Returns an empty string for blank input.
 */
export function normalizeEntry(raw: string): string {
  return raw.trim().toLowerCase();
}

/**
 * Parse backing file content into the set of normalized entries.
 */
export function parseEntries(content: string): Set<string> {
  const entries = new Set<string>();
  for (const line of content.replaceAll('\r\n', '\n').split('\n')) {
    const entry = normalizeEntry(line);
    if (entry !== '') {
      entries.add(entry);
    }
  }
  return entries;
}

/**
 * Serialize entries for a rewrite: one per line, no trailing newline.
 */
export function formatEntries(entries: Iterable<string>): string {
  return Array.from(entries).join('\n');
}

function ioFailure(message: string, cause: unknown, memoryDiverged = false): EntryStoreError {
  return new EntryStoreError(StoreErrorCode.IO_FAILURE, message, {
    cause,
    memoryDiverged,
    ...(memoryDiverged && {
      fix: 'The in-memory set was already updated. Call reload() to resync it with the file.',
    }),
  });
}

/**
 * Read the backing file into normalized entries.
 * A missing file is created empty. Parent directories are not created.
 */
export async function loadEntryFile(
  filePath: string,
  options: { mode: number },
): Promise<Set<string>> {
  try {
    return parseEntries(await readFile(filePath, 'utf8'));
  } catch (err) {
    if (!hasErrnoCode(err, 'ENOENT')) {
      throw ioFailure(`Failed to read: ${filePath}`, err);
    }
  }

  try {
    await writeFile(filePath, '', { mode: options.mode });
  } catch (err) {
    throw ioFailure(`Failed to create: ${filePath}`, err);
  }
  return new Set<string>();
}

/**
 * Append one entry to the end of the backing file, creating it if absent.
 * A newline separator is written first when the file is not empty.
 *
 * Failures are reported with memoryDiverged set, since callers append only
 * after the in-memory insert. When both the write and the close fail, the
 * write error is the one reported.
 */
export async function appendEntry(
  filePath: string,
  item: string,
  options: { mode: number },
): Promise<void> {
  const handle = await open(filePath, 'a', options.mode).catch((err: unknown) => {
    throw ioFailure(`Failed to open for append: ${filePath}`, err, true);
  });

  let failure: EntryStoreError | undefined;
  try {
    const { size } = await handle.stat();
    await handle.write(size > 0 ? `\n${item}` : item, null, 'utf8');
  } catch (err) {
    failure = ioFailure(`Failed to append to: ${filePath}`, err, true);
  }

  try {
    await handle.close();
  } catch (err) {
    failure ??= ioFailure(`Failed to close after append: ${filePath}`, err, true);
  }

  if (failure) {
    throw failure;
  }
}

/**
 * Overwrite the backing file with the given entries.
 *
 * With `atomic`, the content goes through a temp file and rename; otherwise the
 * file is truncated and written in place, so a crash mid-write can lose it.
 */
export async function rewriteEntries(
  filePath: string,
  entries: Iterable<string>,
  options: { mode: number; atomic: boolean },
): Promise<void> {
  const content = formatEntries(entries);
  try {
    if (options.atomic) {
      await atomicWrite(filePath, content, { mode: options.mode });
    } else {
      await writeFile(filePath, content, { encoding: 'utf8', mode: options.mode });
    }
  } catch (err) {
    throw ioFailure(`Failed to rewrite: ${filePath}`, err, true);
  }
}
