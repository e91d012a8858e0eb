import type { KeyHash } from '../core/key-hash.js';

/**
 * What getOrInsertWith() does when its factory builds an element whose key()
 * differs from the requested key.
 *
 *   - **Defer** (default): file the element under the requested key anyway and
 *     let the next relocation check move it (guard release, modify, retain,
 *     reindex)
 *   - **Warn**: same as Defer, and log the mismatch with console.warn
 *   - **Error**: throw FactoryKeyMismatchError and insert nothing
 *
 * @example
 * ```typescript
 * const strict = new KeyedSet<Account>({ mismatchPolicy: MismatchPolicy.Error });
 * ```
 */
export const MismatchPolicy = {
  Defer: 'defer',
  Warn: 'warn',
  Error: 'error',
} as const;

export type MismatchPolicyType = (typeof MismatchPolicy)[keyof typeof MismatchPolicy];
export type MismatchPolicy = MismatchPolicyType;

/**
 * Payload of the onRelocate hook.
 */
export interface RelocationEvent<T, K> {
  /** The element that moved. */
  element: T;
  /** Key it was filed under before the move. */
  from: K;
  /** Key it is filed under now. */
  to: K;
  /** Previous occupant of the destination slot, dropped by the move. */
  displaced?: T;
}

/**
 * KeyedSet configuration passed to the constructor.
 */
export interface KeyedSetConfig<T, K> {
  /**
   * Optional name for error messages and log lines.
   *
   * @default 'KeyedSet'
   */
  name?: string;

  /**
   * Initial contents, inserted in iteration order. Later elements displace
   * earlier ones with the same key.
   */
  elements?: Iterable<T>;

  /**
   * Derives the index key a key is stored under. Use `structuralKey` for
   * tuple or record keys.
   *
   * @default identityKey
   */
  keyHash?: KeyHash<K>;

  /**
   * Copies a key before the set remembers it (as an entry's filed key, a
   * guard's key, or the `from` of a relocation event). Needed when elements
   * return an internal array or object from key() and edit it in place.
   *
   * @default structuralCopy when keyHash is structuralKey, otherwise the key itself
   */
  cloneKey?: (key: K) => K;

  /**
   * Handling of getOrInsertWith() factories that report the wrong key.
   *
   * @default 'defer'
   */
  mismatchPolicy?: MismatchPolicy;

  /**
   * Optional hook invoked after an element is relocated by a mutation
   * protocol. Useful for auditing key changes.
   */
  onRelocate?: (event: RelocationEvent<T, K>) => void;
}
