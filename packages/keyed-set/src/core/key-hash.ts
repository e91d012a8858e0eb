/*
 * Key hashing
 * -----------
 * A KeyedSet never indexes by the key object itself; it indexes by the value
 * returned from its `keyHash` function. Two keys share a slot exactly when
 * their index keys are equal under SameValueZero (Map semantics).
 *
 *  - identityKey: the key is its own index key. Right for strings, numbers,
 *    bigints, booleans, and for objects compared by reference.
 *  - structuralKey: compound keys (tuples, records, dates) are encoded into a
 *    canonical string so that equal-shaped keys collide on purpose.
 *
 * Encoded keys start with NUL so they cannot meet a top-level string key
 * unless that string itself starts with NUL.
 */
import { UnhashableKeyError } from '../errors/errors.js';

/**
 * Value a KeyedSet files an entry under. Compared with SameValueZero.
 */
export type IndexKey = unknown;

/**
 * Maps a key to the index key it is stored under.
 */
export type KeyHash<K> = (key: K) => IndexKey;

const STRUCTURAL_PREFIX = '\u0000';

export function identityKey<K>(key: K): IndexKey {
  return key;
}

/**
 * Index keys by structure instead of identity.
 *
 * @example
 * ```typescript
 * const cells = new KeyedSet<Cell>({ keyHash: structuralKey });
 * cells.insert(new Cell(2, 3));
 * cells.has([2, 3]); // true, although [2, 3] is a fresh array
 * ```
 *
 * @throws {UnhashableKeyError} for symbols, functions and class instances
 *   nested inside a compound key
 */
export function structuralKey(key: unknown): IndexKey {
  if (key === null || typeof key !== 'object') return key;
  return STRUCTURAL_PREFIX + encode(key, key, new Set());
}

/**
 * Deep copy of a compound key, so the container can remember a key that
 * later in-place edits to the element's own key object cannot reach.
 * Primitives come back unchanged. Paired with structuralKey by default.
 */
export function structuralCopy<K>(key: K): K {
  if (key === null || typeof key !== 'object') return key;
  return structuredClone(key);
}

function encode(value: unknown, root: unknown, path: Set<object>): string {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number':
      // -0 and 0 share a slot, as they do in a Map
      return Object.is(value, -0) ? '0' : String(value);
    case 'bigint':
      return `${value}n`;
    case 'boolean':
      return value ? 'true' : 'false';
    case 'undefined':
      return 'undefined';
    case 'symbol':
      throw new UnhashableKeyError(root, 'symbols have no stable encoding');
    case 'function':
      throw new UnhashableKeyError(root, 'functions have no stable encoding');
  }

  if (typeof value !== 'object' || value === null) return 'null';
  if (value instanceof Date) return `D${value.getTime()}`;
  if (path.has(value)) {
    throw new UnhashableKeyError(root, 'cyclic keys have no stable encoding');
  }

  path.add(value);
  try {
    return encodeCompound(value, root, path);
  } finally {
    path.delete(value);
  }
}

function encodeCompound(value: object, root: unknown, path: Set<object>): string {
  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => encode(item, root, path)).join(',')}]`;
  }

  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) {
    throw new UnhashableKeyError(root, 'class instances are compared by reference');
  }

  const fields = Object.entries(value)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(
      ([name, field]: [string, unknown]) => `${JSON.stringify(name)}:${encode(field, root, path)}`
    );
  return `{${fields.join(',')}}`;
}

/**
 * SameValueZero, the comparison Map applies to index keys.
 */
export function sameIndexKey(a: IndexKey, b: IndexKey): boolean {
  return a === b || (a !== a && b !== b);
}
