/**
 * In-process exclusive section for registration and tracking toggles
 *
 * Node runs each synchronous block to completion, so a section entered through
 * runExclusive cannot interleave with another caller. The lock is reentrant:
 * a section may call into another section on the same lock.
 */

export interface ExclusiveLock {
  readonly name: string;

  /** Run fn while holding the lock and return its result */
  runExclusive<T>(fn: () => T): T;

  /** True while some section on this lock is executing */
  isHeld(): boolean;
}

/**
 * Create a reentrant in-process lock
 */
export function createExclusiveLock(name: string): ExclusiveLock {
  let depth = 0;

  return {
    name,

    runExclusive<T>(fn: () => T): T {
      depth++;
      try {
        return fn();
      } finally {
        depth--;
      }
    },

    isHeld(): boolean {
      return depth > 0;
    },
  };
}
