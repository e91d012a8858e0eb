export { KeyedSet } from './core/keyed-set.js';
export { KeyedGuard } from './core/guard.js';
export { isKeyed } from './core/keyed.js';
export type { Keyed, KeyOf } from './core/keyed.js';
export { identityKey, sameIndexKey, structuralCopy, structuralKey } from './core/key-hash.js';
export type { IndexKey, KeyHash } from './core/key-hash.js';

export { MismatchPolicy } from './types/types.js';
export type { KeyedSetConfig, MismatchPolicyType, RelocationEvent } from './types/types.js';

// Errors
export {
  ConcurrentModificationError,
  FactoryKeyMismatchError,
  GuardReleasedError,
  InvalidElementError,
  InvalidKeyedSetConfigError,
  KeyNotFoundError,
  KeyedSetBorrowedError,
  UnhashableKeyError,
  formatKey,
} from './errors/errors.js';
