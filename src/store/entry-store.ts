/**
 * Persistent case-insensitive set of string entries backed by a text file.
 *
 * The in-memory set holds normalized (trimmed, lowercased) entries and is the
 * authority for lookups. Inserts append the caller's trimmed text to the file;
 * deletes rewrite the file from the in-memory set in normalized form.
 *
 * Every public method holds the store lock for its whole duration, so
 * operations on one store never interleave. A disk sync failure after the
 * in-memory change is reported as IO_FAILURE with memoryDiverged set and is
 * not rolled back; reload() re-reads the file.
 */

import type { Logger } from 'pino';
import { loadConfig } from '../core/config.js';
import { EntryStoreError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { EntryStoreConfig, EntryStoreOptions } from '../types/config.js';
import { StoreErrorCode } from '../types/error-codes.js';
import { appendEntry, loadEntryFile, normalizeEntry, rewriteEntries } from './entry-file.js';
import { createStoreLock, withLock, type StoreLock } from './lock.js';

export class EntryStore {
  private readonly filePath: string;
  private readonly config: EntryStoreConfig;
  private readonly lock: StoreLock = createStoreLock();
  private readonly log: Logger;
  private entries: Set<string>;

  private constructor(filePath: string, config: EntryStoreConfig, entries: Set<string>, log: Logger) {
    this.filePath = filePath;
    this.config = config;
    this.entries = entries;
    this.log = log;
  }

  /**
   * Open the store at `filePath`, creating an empty file if none exists.
   */
  static async open(filePath: string, options?: EntryStoreOptions): Promise<EntryStore> {
    const config = loadConfig(options);
    const log = getLogger('store:entries').child({ file: filePath }, { level: config.logging.level });
    const entries = await loadEntryFile(filePath, { mode: config.fileMode });
    log.debug({ count: entries.size }, 'Entry store loaded');
    return new EntryStore(filePath, config, entries, log);
  }

  /** Path of the backing file. */
  get path(): string {
    return this.filePath;
  }

  /** Level of this store's logger, from `logging.level`. */
  get logLevel(): string {
    return this.log.level;
  }

  /**
   * Add an entry. The trimmed text is appended to the file as given; lookups
   * use its lowercase form.
   */
  async add(item: string): Promise<void> {
    return withLock(this.lock, async () => {
      const trimmed = item.trim();
      if (trimmed === '') {
        throw new EntryStoreError(StoreErrorCode.EMPTY_ENTRY, 'Cannot add empty entry');
      }
      if (/[\r\n]/.test(trimmed)) {
        throw new EntryStoreError(
          StoreErrorCode.INVALID_ENTRY,
          'Entries cannot contain line breaks',
          { fix: 'Add each line as a separate entry.' },
        );
      }

      const normalized = trimmed.toLowerCase();
      if (this.entries.has(normalized)) {
        throw new EntryStoreError(StoreErrorCode.ALREADY_EXISTS, `Entry already exists: ${trimmed}`);
      }

      this.entries.add(normalized);
      await appendEntry(this.filePath, trimmed, { mode: this.config.fileMode });
      this.log.debug({ entry: normalized }, 'Entry appended');
    });
  }

  /**
   * Remove an entry and rewrite the file from the remaining entries.
   */
  async remove(item: string): Promise<void> {
    return withLock(this.lock, async () => {
      const normalized = normalizeEntry(item);
      if (normalized === '') {
        throw new EntryStoreError(StoreErrorCode.EMPTY_ENTRY, 'Cannot remove empty entry');
      }
      if (!this.entries.has(normalized)) {
        throw new EntryStoreError(StoreErrorCode.NOT_FOUND, `Entry not found: ${item.trim()}`);
      }

      this.entries.delete(normalized);
      await rewriteEntries(this.filePath, this.entries, {
        mode: this.config.fileMode,
        atomic: this.config.atomicRewrite,
      });
      this.log.debug({ entry: normalized, remaining: this.entries.size }, 'Entry file rewritten');
    });
  }

  /**
   * Case-insensitive membership test. Blank input is never contained.
   */
  async contains(item: string): Promise<boolean> {
    return withLock(this.lock, () => {
      const normalized = normalizeEntry(item);
      return normalized !== '' && this.entries.has(normalized);
    });
  }

  /**
   * Snapshot of the normalized entries. Order is unspecified.
   */
  async items(): Promise<string[]> {
    return withLock(this.lock, () => Array.from(this.entries));
  }

  /** Number of entries. */
  async size(): Promise<number> {
    return withLock(this.lock, () => this.entries.size);
  }

  /**
   * Replace the in-memory set with the file's current contents.
   * A missing file is recreated empty.
   */
  async reload(): Promise<void> {
    return withLock(this.lock, async () => {
      this.entries = await loadEntryFile(this.filePath, { mode: this.config.fileMode });
      this.log.debug({ count: this.entries.size }, 'Entry store reloaded');
    });
  }
}

/**
 * Open an entry store. Shorthand for EntryStore.open.
 */
export function openEntryStore(filePath: string, options?: EntryStoreOptions): Promise<EntryStore> {
  return EntryStore.open(filePath, options);
}
