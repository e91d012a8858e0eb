/*
 * Borrow Flag System
 * ------------------
 * Runtime stand-in for exclusive-borrow checking. A KeyedSet keeps one small
 * integer describing who currently holds exclusive access:
 *
 *   Bit 0: a closure borrow (modify/modifyAll/retain callback, or a
 *          getOrInsertWith factory) is running
 *   Bit 1: a guard from getMut/getOrInsertWith is outstanding
 *
 * Any container call made while a bit is set throws KeyedSetBorrowedError.
 * The bits never combine: a guard cannot be issued from inside a callback and
 * a callback cannot start while a guard is out.
 */

/** No borrow in progress; the container is free. */
export const BORROW_NONE = 0;

/** A mutation callback or element factory is running. */
export const BORROW_CLOSURE = 1 << 0;

/** A mutable-access guard is outstanding. */
export const BORROW_GUARD = 1 << 1;

/**
 * Human-readable borrow holder for error messages.
 */
export function describeBorrow(flags: number): string {
  if (flags & BORROW_GUARD) return 'an outstanding guard';
  if (flags & BORROW_CLOSURE) return 'a running mutation callback';
  return 'nothing';
}
