import {
  ConcurrentModificationError,
  FactoryKeyMismatchError,
  InvalidElementError,
  InvalidKeyedSetConfigError,
  KeyNotFoundError,
  KeyedSetBorrowedError,
  formatKey,
} from '../errors/errors.js';
import { MismatchPolicy, type KeyedSetConfig, type RelocationEvent } from '../types/types.js';
import { EntryStore, type Entry } from './entry-store.js';
import { BORROW_CLOSURE, BORROW_GUARD, BORROW_NONE, describeBorrow } from './flags.js';
import { KeyedGuard, type GuardHost } from './guard.js';
import {
  identityKey,
  sameIndexKey,
  structuralCopy,
  structuralKey,
  type IndexKey,
  type KeyHash,
} from './key-hash.js';
import { isKeyed, type Keyed, type KeyOf } from './keyed.js';

// ---------- Internal constants ----------
const DEFAULT_NAME = 'KeyedSet';
const MISMATCH_POLICIES: ReadonlySet<string> = new Set(Object.values(MismatchPolicy));

/**
 * Development mode flag for conditional validation.
 * In production builds, element validation is skipped.
 */
const IS_DEV = process.env.NODE_ENV !== 'production';

function assertValidElement(element: unknown): void {
  if (!IS_DEV) return;
  if (!isKeyed(element)) throw new InvalidElementError(element);
}

const keepKey = <K>(key: K): K => key;

type ResolvedConfig<T, K> = Readonly<{
  name: string;
  keyHash: KeyHash<K>;
  cloneKey: (key: K) => K;
  mismatchPolicy: MismatchPolicy;
  onRelocate?: (event: RelocationEvent<T, K>) => void;
}>;

/** A kept retain() entry waiting to be re-filed under its new key. */
type PendingMove<T, K> = {
  entry: Entry<T, K>;
  from: K;
  to: IndexKey;
};

/*
 * KeyedSet: a set of elements indexed by the key each element reports.
 *
 * Unlike a Map, changing an element's key is not a logic error, provided the
 * change happens through a mutation protocol:
 *  - closures: modify(), modifyAll(), retain()
 *  - guards:   getMut(), getOrInsertWith() (plus withMut()/withOrInsert())
 * Each protocol re-reads the key when it finishes and moves the element to
 * its new slot before control returns. While a protocol runs, the container
 * is borrowed and rejects every other call.
 */
export class KeyedSet<T extends Keyed<K>, K = KeyOf<T>> implements Iterable<T> {
  /**
   * Build a set from existing elements.
   *
   * @example
   * ```typescript
   * const accounts = KeyedSet.from([new Account('alice', 10), new Account('bob', 5)]);
   * ```
   */
  static from<T extends Keyed<K>, K = KeyOf<T>>(
    elements: Iterable<T>,
    config?: Omit<KeyedSetConfig<T, K>, 'elements'>
  ): KeyedSet<T, K> {
    return new KeyedSet<T, K>({ ...config, elements });
  }

  private readonly store = new EntryStore<T, K>();
  private readonly config: ResolvedConfig<T, K>;

  // Borrow state, see flags.ts
  private borrow = BORROW_NONE;

  // Set once the unstable-key warning has been logged
  private warnedUnstableKey = false;

  constructor(config?: KeyedSetConfig<T, K>) {
    this.config = this._validateAndFreezeConfig(config);
    if (config?.elements !== undefined) this.extend(config.elements);
  }

  /**
   * Validate configuration and return a frozen copy with defaults applied.
   *
   * @throws {InvalidKeyedSetConfigError} on malformed options
   */
  private _validateAndFreezeConfig(rawCfg?: KeyedSetConfig<T, K>): ResolvedConfig<T, K> {
    if (rawCfg !== undefined && (typeof rawCfg !== 'object' || rawCfg === null)) {
      throw new InvalidKeyedSetConfigError('config must be an object.');
    }
    const cfg: KeyedSetConfig<T, K> = rawCfg ?? {};
    const name = cfg.name ?? DEFAULT_NAME;
    const keyHash = cfg.keyHash ?? identityKey;
    const cloneKey = cfg.cloneKey ?? (keyHash === structuralKey ? structuralCopy : keepKey);
    const mismatchPolicy = cfg.mismatchPolicy ?? MismatchPolicy.Defer;

    if (typeof name !== 'string' || name.length === 0) {
      throw new InvalidKeyedSetConfigError(`'name' must be a non-empty string.`);
    }
    if (typeof keyHash !== 'function') {
      throw new InvalidKeyedSetConfigError(`'keyHash' must be a function.`);
    }
    if (typeof cloneKey !== 'function') {
      throw new InvalidKeyedSetConfigError(`'cloneKey' must be a function.`);
    }
    if (!MISMATCH_POLICIES.has(mismatchPolicy)) {
      throw new InvalidKeyedSetConfigError(
        `'mismatchPolicy' must be one of: ${Array.from(MISMATCH_POLICIES).join(', ')}.`
      );
    }
    if (cfg.onRelocate !== undefined && typeof cfg.onRelocate !== 'function') {
      throw new InvalidKeyedSetConfigError(`'onRelocate' must be a function.`);
    }
    if (cfg.elements !== undefined && typeof cfg.elements[Symbol.iterator] !== 'function') {
      throw new InvalidKeyedSetConfigError(`'elements' must be iterable.`);
    }

    return Object.freeze({ name, keyHash, cloneKey, mismatchPolicy, onRelocate: cfg.onRelocate });
  }

  getName(): string {
    return this.config.name;
  }

  /**
   * Whether a mutation callback or a guard currently holds the container.
   * The only member that stays readable during a borrow.
   */
  get isBorrowed(): boolean {
    return this.borrow !== BORROW_NONE;
  }

  get size(): number {
    this.assertAccess();
    return this.store.size;
  }

  get isEmpty(): boolean {
    return this.size === 0;
  }

  /**
   * Store an element under its current key.
   *
   * @returns the element previously filed under that key, which is dropped
   * @throws {InvalidElementError} when `element` has no key() method (development only)
   */
  insert(element: T): T | undefined {
    this.assertAccess();
    assertValidElement(element);
    const key = element.key();
    const slot = this.config.keyHash(key);
    if (IS_DEV) this.checkKeyStability(slot, element);
    return this.store.set(slot, { key: this.config.cloneKey(key), element })?.element;
  }

  /**
   * Insert every element in order. Later elements displace earlier ones with
   * the same key.
   */
  extend(elements: Iterable<T>): void {
    for (const element of elements) this.insert(element);
  }

  get(key: K): T | undefined {
    this.assertAccess();
    return this.store.get(this.config.keyHash(key))?.element;
  }

  has(key: K): boolean {
    this.assertAccess();
    return this.store.has(this.config.keyHash(key));
  }

  /**
   * Indexed access for keys the caller already knows are present.
   *
   * @throws {KeyNotFoundError} if nothing is filed under `key`
   */
  at(key: K): T {
    this.assertAccess();
    const entry = this.store.get(this.config.keyHash(key));
    if (entry === undefined) throw new KeyNotFoundError(key, this.config.name);
    return entry.element;
  }

  remove(key: K): T | undefined {
    this.assertAccess();
    return this.store.delete(this.config.keyHash(key))?.element;
  }

  clear(): void {
    this.assertAccess();
    this.store.clear();
  }

  /**
   * Lazy sequence of the stored elements' keys, in no particular order.
   *
   * Each call returns a fresh sequence. Stepping a sequence after the set was
   * structurally changed (insert, remove, relocation, clear) throws
   * ConcurrentModificationError.
   */
  keys(): IterableIterator<K> {
    return this.walk((entry) => entry.element.key());
  }

  /**
   * Lazy sequence of the stored elements. Same rules as keys().
   */
  values(): IterableIterator<T> {
    return this.walk((entry) => entry.element);
  }

  entries(): IterableIterator<[K, T]> {
    return this.walk((entry): [K, T] => [entry.element.key(), entry.element]);
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.values();
  }

  /**
   * Move every element out of the set. The set is empty when this returns;
   * the returned iterator is independent of it.
   */
  drain(): IterableIterator<T> {
    this.assertAccess();
    const drained = Array.from(this.store.values(), (entry) => entry.element);
    this.store.clear();
    return drained.values();
  }

  /**
   * Copy the set, with the same configuration, passing each element through
   * `copy`. Elements must not be shared between sets: a key change made
   * through one set would go unnoticed by the other.
   */
  clone(copy: (element: T) => T): KeyedSet<T, K> {
    this.assertAccess();
    const twin = new KeyedSet<T, K>(this.config);
    this.lend(() => {
      for (const entry of this.store.values()) twin.insert(copy(entry.element));
    });
    return twin;
  }

  /**
   * Apply `f` to the element filed under `key`, then relocate the element if
   * `f` changed its key. Relocation also happens when `f` throws.
   *
   * @returns `f`'s result, or undefined if nothing is filed under `key`
   *
   * @example
   * ```typescript
   * accounts.modify('alice', (account) => {
   *   account.handle = 'alice.smith';
   * });
   * accounts.has('alice'); // false
   * accounts.has('alice.smith'); // true
   * ```
   */
  modify<R>(key: K, f: (element: T) => R): R | undefined {
    this.assertAccess();
    const slot = this.config.keyHash(key);
    const entry = this.store.get(slot);
    if (entry === undefined) return undefined;

    try {
      return this.lend(() => f(entry.element));
    } finally {
      this.relocate(slot, entry);
    }
  }

  /**
   * Apply `f` to every element, relocating each one whose key changed.
   */
  modifyAll(f: (element: T) => void): void {
    this.retain((element) => {
      f(element);
      return true;
    });
  }

  /**
   * Keep only the elements for which `predicate` returns true.
   *
   * The predicate may change keys. Each element present when retain() starts
   * is visited exactly once; kept elements whose key changed are re-filed
   * after every predicate has run, displacing in visiting order when several
   * land on one key. If the predicate throws, its element is kept, everything
   * visited so far is reconciled, and the error propagates.
   */
  retain(predicate: (element: T) => boolean): void {
    this.assertAccess();
    const snapshot = Array.from(this.store.slots());
    const moves: PendingMove<T, K>[] = [];

    try {
      for (const [slot, entry] of snapshot) {
        let keep = true;
        try {
          keep = this.lend(() => predicate(entry.element));
        } finally {
          this.detach(slot, entry, keep, moves);
        }
      }
    } finally {
      this.refile(moves);
    }
  }

  /**
   * Keys of entries whose element no longer reports the key it is filed
   * under. Empty unless an element was mutated outside modify(), retain()
   * and the guards.
   */
  staleKeys(): K[] {
    this.assertAccess();
    const stale: K[] = [];
    for (const [slot, entry] of this.store.slots()) {
      if (!sameIndexKey(slot, this.config.keyHash(entry.element.key()))) stale.push(entry.key);
    }
    return stale;
  }

  /**
   * Relocate every stale entry.
   *
   * @returns number of entries that were stale
   */
  reindex(): number {
    const stale = this.staleKeys().length;
    if (stale > 0) this.modifyAll(() => undefined);
    return stale;
  }

  /**
   * Mutable access to the element filed under `key`, through a guard that
   * relocates the element on release(). The set is borrowed until then.
   *
   * @returns a guard, or undefined if nothing is filed under `key`
   */
  getMut(key: K): KeyedGuard<T, K> | undefined {
    this.assertAccess();
    const slot = this.config.keyHash(key);
    const entry = this.store.get(slot);
    if (entry === undefined) return undefined;
    return this.lease(slot, entry);
  }

  /**
   * Like getMut(), but first files `factory(key)` under `key` when nothing is
   * there. `factory` is not called when `key` is present.
   *
   * The factory's element should report `key`. What happens when it does not
   * depends on `mismatchPolicy`.
   *
   * @throws {FactoryKeyMismatchError} under mismatchPolicy 'error'
   */
  getOrInsertWith(key: K, factory: (key: K) => T): KeyedGuard<T, K> {
    this.assertAccess();
    const slot = this.config.keyHash(key);
    let entry = this.store.get(slot);
    if (entry === undefined) {
      const element = this.lend(() => factory(key));
      assertValidElement(element);
      this.checkFactoryKey(key, slot, element);
      entry = { key: this.config.cloneKey(key), element };
      this.store.set(slot, entry);
    }
    return this.lease(slot, entry);
  }

  /**
   * Scoped form of getMut(): runs `fn` on the element and releases the guard
   * however `fn` exits.
   *
   * @returns `fn`'s result, or undefined if nothing is filed under `key`
   */
  withMut<R>(key: K, fn: (element: T) => R): R | undefined {
    return this.getMut(key)?.use(fn);
  }

  /**
   * Scoped form of getOrInsertWith().
   */
  withOrInsert<R>(key: K, factory: (key: K) => T, fn: (element: T) => R): R {
    return this.getOrInsertWith(key, factory).use(fn);
  }

  // ---------- Internals ----------

  private assertAccess(): void {
    if (this.borrow !== BORROW_NONE) {
      throw new KeyedSetBorrowedError(this.config.name, describeBorrow(this.borrow));
    }
  }

  /** Run a caller-supplied callback under a closure borrow. */
  private lend<R>(fn: () => R): R {
    this.borrow = BORROW_CLOSURE;
    try {
      return fn();
    } finally {
      this.borrow = BORROW_NONE;
    }
  }

  private *track<U>(stamp: number, project: (entry: Entry<T, K>) => U): IterableIterator<U> {
    for (const entry of this.store.values()) {
      this.assertAccess();
      if (this.store.stamp !== stamp) throw new ConcurrentModificationError(this.config.name);
      yield project(entry);
    }
    if (this.store.stamp !== stamp) throw new ConcurrentModificationError(this.config.name);
  }

  private walk<U>(project: (entry: Entry<T, K>) => U): IterableIterator<U> {
    this.assertAccess();
    return this.track(this.store.stamp, project);
  }

  /**
   * Move `entry` from `from` to the slot of its current key, if that differs.
   * The caller guarantees `entry` is the one filed under `from`.
   */
  private relocate(from: IndexKey, entry: Entry<T, K>): void {
    const previous = entry.key;
    const key = entry.element.key();
    const to = this.config.keyHash(key);
    entry.key = this.config.cloneKey(key);
    if (sameIndexKey(from, to)) return;

    this.store.delete(from);
    const displaced = this.store.set(to, entry);
    this.config.onRelocate?.({
      element: entry.element,
      from: previous,
      to: entry.key,
      displaced: displaced?.element,
    });
  }

  /** retain() step: take a visited entry out of its slot when it is dropped or moving. */
  private detach(
    slot: IndexKey,
    entry: Entry<T, K>,
    keep: boolean,
    moves: PendingMove<T, K>[]
  ): void {
    const key = entry.element.key();
    const to = this.config.keyHash(key);
    const moving = !sameIndexKey(slot, to);
    if (keep && !moving) {
      entry.key = this.config.cloneKey(key);
      return;
    }
    this.store.delete(slot);
    if (keep) moves.push({ entry, from: entry.key, to });
  }

  /** retain() epilogue: file moved entries under their new keys, then report. */
  private refile(moves: PendingMove<T, K>[]): void {
    const events: RelocationEvent<T, K>[] = [];
    for (const { entry, from, to } of moves) {
      const displaced = this.store.set(to, entry);
      entry.key = this.config.cloneKey(entry.element.key());
      events.push({ element: entry.element, from, to: entry.key, displaced: displaced?.element });
    }
    const hook = this.config.onRelocate;
    if (hook) for (const event of events) hook(event);
  }

  private lease(slot: IndexKey, entry: Entry<T, K>): KeyedGuard<T, K> {
    this.borrow = BORROW_GUARD;
    const host: GuardHost<T> = {
      read: () => entry.element,
      write: (element) => {
        assertValidElement(element);
        entry.element = element;
      },
      settle: () => {
        this.borrow = BORROW_NONE;
        this.relocate(slot, entry);
      },
    };
    return new KeyedGuard<T, K>(host, entry.key);
  }

  /**
   * Warn once per set when key() hands back a value its keyHash does not map
   * to the same slot twice, e.g. a fresh array per call under identityKey.
   * Such elements look stale to every relocation check.
   */
  private checkKeyStability(slot: IndexKey, element: T): void {
    if (this.warnedUnstableKey) return;
    const again = element.key();
    if (sameIndexKey(slot, this.config.keyHash(again))) return;

    this.warnedUnstableKey = true;
    console.warn(
      `[keyed-set] '${this.config.name}' holds an element whose key() is not stable under its keyHash (${formatKey(again)}); every relocation check will move it. Use keyHash: structuralKey for tuple or record keys.`
    );
  }

  private checkFactoryKey(requested: K, slot: IndexKey, element: T): void {
    if (this.config.mismatchPolicy === MismatchPolicy.Defer) return;

    const produced = element.key();
    if (sameIndexKey(slot, this.config.keyHash(produced))) return;

    if (this.config.mismatchPolicy === MismatchPolicy.Error) {
      throw new FactoryKeyMismatchError(requested, produced);
    }
    console.warn(
      `[keyed-set] getOrInsertWith(${formatKey(requested)}) on '${this.config.name}' built an element keyed ${formatKey(produced)}; filed under the requested key until the next relocation.`
    );
  }
}
