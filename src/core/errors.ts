/**
 * Entry store error type with numeric error codes.
 */

import { StoreErrorCode, getErrorCodeName, isRecoverableCode } from '../types/error-codes.js';

/**
 * Structured error class for entry store operations.
 * Carries an error code, human-readable message, and optional fix suggestion.
 *
 * `memoryDiverged` is set when the in-memory set was already mutated before the
 * disk sync failed. The change is not rolled back; call `reload()` to re-sync.
 */
export class EntryStoreError extends Error {
  readonly code: StoreErrorCode;
  readonly fix?: string;
  readonly memoryDiverged: boolean;

  constructor(
    code: StoreErrorCode,
    message: string,
    options?: {
      fix?: string;
      memoryDiverged?: boolean;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'EntryStoreError';
    this.code = code;
    this.fix = options?.fix;
    this.memoryDiverged = options?.memoryDiverged ?? false;
  }

  /** Whether retrying with different input can succeed. */
  get recoverable(): boolean {
    return isRecoverableCode(this.code);
  }

  /** Structured JSON representation. */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: this.code,
        name: getErrorCodeName(this.code),
        message: this.message,
        ...(this.fix && { fix: this.fix }),
        memoryDiverged: this.memoryDiverged,
      },
    };
  }
}

/**
 * Narrow an unknown value to an EntryStoreError, optionally of a given code.
 */
export function isEntryStoreError(
  err: unknown,
  code?: StoreErrorCode,
): err is EntryStoreError {
  return err instanceof EntryStoreError && (code === undefined || err.code === code);
}

/**
 * Check whether a caught value is a Node errno error with the given code.
 */
export function hasErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
