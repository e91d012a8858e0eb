/**
 * Contract for values that carry their own index key.
 *
 * `key()` must be pure and cheap, but it may reflect mutable state: when a
 * mutation changes what it returns, the owning {@link KeyedSet} relocates the
 * element as part of the mutation protocol that made the change.
 *
 * Keys are compared by reference under the default `identityKey`, so a
 * `key()` that builds a fresh array or object on each call never matches
 * itself. Use `structuralKey` for tuple and record keys.
 *
 * @template K - Key type reported by the element
 *
 * @example
 * ```typescript
 * class Account implements Keyed<string> {
 *   constructor(public handle: string, public balance: number) {}
 *   key() {
 *     return this.handle;
 *   }
 * }
 * ```
 */
export interface Keyed<K = unknown> {
  key(): K;
}

/**
 * Key type reported by a {@link Keyed} element type.
 */
export type KeyOf<T> = T extends Keyed<infer K> ? K : never;

/**
 * Runtime check for the Keyed contract.
 */
export function isKeyed(x: unknown): x is Keyed {
  return typeof x === 'object' && x !== null && 'key' in x && typeof x.key === 'function';
}
