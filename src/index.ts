/**
 * entry-store - persistent case-insensitive string sets backed by text files.
 */

// Types
export { StoreErrorCode, getErrorCodeName, isRecoverableCode } from './types/error-codes.js';
export type { EntryStoreConfig, EntryStoreOptions, LoggingConfig, LogLevel } from './types/config.js';

// Core
export { EntryStoreError, isEntryStoreError } from './core/errors.js';
export { loadConfig, getDefaultConfig } from './core/config.js';
export { initLogger, getLogger, closeLogger } from './core/logger.js';

// Store
export { EntryStore, openEntryStore } from './store/entry-store.js';
export { normalizeEntry, parseEntries } from './store/entry-file.js';
