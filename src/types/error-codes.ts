/**
 * Entry store error codes.
 * Ranges: 1-9 = caller input, 10-19 = storage, 20+ = setup.
 */

export enum StoreErrorCode {
  // === INPUT ERRORS (1-9) ===
  EMPTY_ENTRY = 1,
  INVALID_ENTRY = 2,
  ALREADY_EXISTS = 3,
  NOT_FOUND = 4,

  // === STORAGE ERRORS (10-19) ===
  IO_FAILURE = 10,

  // === SETUP ERRORS (20+) ===
  CONFIG_ERROR = 20,
}

/**
 * Check if an error code is recoverable by retrying with different input.
 * Storage failures are not: the caller has to fix the environment or reload.
 */
export function isRecoverableCode(code: StoreErrorCode): boolean {
  return code < StoreErrorCode.IO_FAILURE;
}

/**
 * Get the symbolic name for an error code.
 */
export function getErrorCodeName(code: StoreErrorCode): string {
  return StoreErrorCode[code] ?? 'UNKNOWN';
}
