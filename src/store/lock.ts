/**
 * Store-wide mutual exclusion for a single process.
 *
 * Every public EntryStore operation runs inside withLock so that no two
 * operations on one store interleave across their awaits. Cross-process
 * locking is out of scope.
 */

import { Mutex } from 'async-mutex';

/** Coarse lock guarding one store. */
export type StoreLock = Mutex;

/** Create a new, unlocked store lock. */
export function createStoreLock(): StoreLock {
  return new Mutex();
}

/**
 * Execute a function while holding the lock.
 * The lock is released when the function completes (or throws).
 */
export async function withLock<T>(
  lock: StoreLock,
  fn: () => T | Promise<T>,
): Promise<T> {
  return lock.runExclusive(fn);
}
