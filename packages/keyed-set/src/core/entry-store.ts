/*
 * EntryStore
 * ----------
 * The associative store behind a KeyedSet: index key -> Entry.
 *
 * Responsibilities
 *  - own the Entry records (the authoritative data)
 *  - report displaced occupants on set() and removed entries on delete()
 *  - stamp every structural change so open sequences can detect it
 *
 * Design notes
 *  - Entry objects are stable: relocation moves the same record to another
 *    slot instead of allocating a new one, so a guard can keep a reference to
 *    its record while the element inside it changes.
 *  - The store knows nothing about keys, hashing or coherence; KeyedSet decides
 *    which slot an entry belongs in.
 */
import type { IndexKey } from './key-hash.js';

/**
 * A stored element together with the key it was filed under.
 *
 * `key` and `element.key()` agree whenever no mutation protocol is running,
 * unless the element was changed behind the container's back.
 */
export type Entry<T, K> = {
  key: K;
  element: T;
};

export class EntryStore<T, K> {
  /** Primary storage: index key -> Entry */
  private readonly entries = new Map<IndexKey, Entry<T, K>>();

  /** Structural change counter (insert, delete, clear). */
  private version = 0;

  /**
   * Number of stored entries.
   */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Current version stamp. Changes on every insert, delete or clear.
   */
  get stamp(): number {
    return this.version;
  }

  get(slot: IndexKey): Entry<T, K> | undefined {
    return this.entries.get(slot);
  }

  has(slot: IndexKey): boolean {
    return this.entries.has(slot);
  }

  /**
   * File an entry under a slot.
   *
   * @returns the entry previously filed there, if any
   */
  set(slot: IndexKey, entry: Entry<T, K>): Entry<T, K> | undefined {
    const displaced = this.entries.get(slot);
    this.entries.set(slot, entry);
    this.version++;
    return displaced;
  }

  delete(slot: IndexKey): Entry<T, K> | undefined {
    const entry = this.entries.get(slot);
    if (entry === undefined) return undefined;
    this.entries.delete(slot);
    this.version++;
    return entry;
  }

  clear(): void {
    if (this.entries.size === 0) return;
    this.entries.clear();
    this.version++;
  }

  /**
   * Iterator of [slot, entry] pairs in insertion order.
   */
  *slots(): IterableIterator<[IndexKey, Entry<T, K>]> {
    yield* this.entries.entries();
  }

  *values(): IterableIterator<Entry<T, K>> {
    yield* this.entries.values();
  }
}
