/* KeyedGuard
 *
 * Scoped mutable access to one element of a KeyedSet.
 *
 * A plain reference gives the container no chance to notice that the element's
 * key changed, so getMut() and getOrInsertWith() hand out a guard instead. The
 * guard holds the container's exclusive borrow until release(), and release()
 * is where the deferred relocation happens.
 *
 * Design:
 *  - `value` always reads and writes the entry filed under the remembered key
 *  - release() is idempotent; the relocation check runs exactly once
 *  - use(fn) pairs the access with a finally-release, covering early return
 *    and throw
 *  - an unreleased guard keeps the container borrowed, so the missing release
 *    surfaces as KeyedSetBorrowedError on the next container call
 *
 * Usage example:
 * ```typescript
 * const guard = accounts.getMut('alice');
 * if (guard) {
 *   try {
 *     guard.value.handle = 'alice.smith';
 *   } finally {
 *     guard.release(); // now filed under 'alice.smith'
 *   }
 * }
 *
 * // Or, equivalently:
 * accounts.withMut('alice', (account) => {
 *   account.handle = 'alice.smith';
 * });
 * ```
 */
import { GuardReleasedError } from '../errors/errors.js';

/**
 * The slice of a KeyedSet a guard talks to. Created by the container when it
 * issues the guard; never exposed to callers.
 *
 * @internal
 */
export interface GuardHost<T> {
  /** Element currently filed under the guard's key. */
  read(): T;
  /** Replace the element filed under the guard's key. */
  write(element: T): void;
  /** End the borrow and relocate the element if its key changed. */
  settle(): void;
}

export class KeyedGuard<T, K> {
  /**
   * Tracks whether release() has run.
   */
  private released = false;

  /**
   * @param host - Container callbacks bound to the guarded entry
   * @param key - Key the guarded element was filed under when the guard was issued
   */
  constructor(
    private readonly host: GuardHost<T>,
    readonly key: K
  ) {}

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * The guarded element.
   *
   * @throws {GuardReleasedError} after release()
   */
  get value(): T {
    if (this.released) throw new GuardReleasedError(this.key);
    return this.host.read();
  }

  /**
   * Replace the guarded element. The replacement may report a different key;
   * it is relocated on release like any other key change.
   *
   * @throws {GuardReleasedError} after release()
   */
  set value(next: T) {
    if (this.released) throw new GuardReleasedError(this.key);
    this.host.write(next);
  }

  /**
   * End the guard's scope: re-read the element's key, relocate it if it
   * changed, and return exclusive access to the container.
   *
   * Safe to call multiple times - subsequent calls are no-ops.
   */
  release(): void {
    if (this.released) return;
    this.released = true;
    this.host.settle();
  }

  /**
   * Run `fn` against the guarded element, then release the guard whatever
   * way `fn` exits.
   *
   * @returns whatever `fn` returns
   */
  use<R>(fn: (value: T) => R): R {
    try {
      return fn(this.value);
    } finally {
      this.release();
    }
  }
}
