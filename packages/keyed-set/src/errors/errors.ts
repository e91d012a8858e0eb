const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

/**
 * Render a key (or any diagnostic value) for an error message.
 * Strings are quoted, everything else goes through JSON with a String() fallback.
 */
export function formatKey(key: unknown): string {
  if (typeof key === 'string') return `'${key}'`;
  if (typeof key === 'bigint') return `${key}n`;
  if (typeof key === 'symbol' || typeof key === 'function' || key === undefined) {
    return String(key);
  }
  try {
    return JSON.stringify(key) ?? String(key);
  } catch {
    return String(key);
  }
}

/**
 * Indexed access on a key that is not present.
 */
export class KeyNotFoundError extends Error {
  constructor(
    public key: unknown,
    public setName: string
  ) {
    const keyStr = formatKey(key);
    const dev = [
      `Key not found: ${keyStr}`,
      '',
      `'${setName}' has no element filed under ${keyStr}.`,
      '',
      'at() is for keys already known to be present. To fix this:',
      `  1. Use get(${keyStr}) and handle undefined`,
      `  2. Or check has(${keyStr}) before calling at()`,
    ];
    super(format(`Key not found: ${keyStr}`, dev));
    this.name = 'KeyNotFoundError';
  }
}

/**
 * A container call arrived while a callback or guard held exclusive access.
 */
export class KeyedSetBorrowedError extends Error {
  constructor(
    public setName: string,
    public holder: string
  ) {
    const dev = [
      `'${setName}' is borrowed by ${holder}.`,
      '',
      'Only the holder of the borrow may touch the container until it ends.',
      '',
      'To fix this:',
      '  1. Release the guard returned by getMut()/getOrInsertWith() first',
      '  2. Or use withMut()/guard.use() so release happens automatically',
      '  3. Do not call back into the container from modify()/retain() callbacks',
    ];
    super(format(`'${setName}' is borrowed by ${holder}.`, dev));
    this.name = 'KeyedSetBorrowedError';
  }
}

export class GuardReleasedError extends Error {
  constructor(public key: unknown) {
    const keyStr = formatKey(key);
    const dev = [
      'Guard released',
      '',
      `The guard for ${keyStr} has been released. Acquire a new one with getMut(${keyStr}).`,
    ];
    super(format(`Guard for ${keyStr} has been released.`, dev));
    this.name = 'GuardReleasedError';
  }
}

/**
 * A getOrInsertWith() factory produced an element that reports a different key.
 */
export class FactoryKeyMismatchError extends Error {
  constructor(
    public requested: unknown,
    public produced: unknown
  ) {
    const requestedStr = formatKey(requested);
    const producedStr = formatKey(produced);
    const dev = [
      'Factory key mismatch',
      '',
      `getOrInsertWith(${requestedStr}) received an element whose key() is ${producedStr}.`,
      '',
      'The factory must build an element that reports the requested key.',
      `Set mismatchPolicy: 'defer' to file it anyway and relocate on release.`,
    ];
    super(format(`Factory for ${requestedStr} produced key ${producedStr}.`, dev));
    this.name = 'FactoryKeyMismatchError';
  }
}

export class ConcurrentModificationError extends Error {
  constructor(public setName: string) {
    const dev = [
      'Concurrent modification',
      '',
      `'${setName}' changed structurally while a keys()/values()/entries() sequence was open.`,
      'Collect what you need first (e.g. Array.from(set.keys())), then mutate.',
    ];
    super(format(`'${setName}' was modified during iteration.`, dev));
    this.name = 'ConcurrentModificationError';
  }
}

export class InvalidElementError extends Error {
  constructor(public element: unknown) {
    let elementString: string;
    try {
      elementString = JSON.stringify(element, null, 2) ?? String(element);
    } catch {
      elementString = String(element);
    }

    const dev = [
      'Invalid element',
      '',
      `Elements must be objects exposing a key() method.`,
      '',
      'Received:',
      elementString,
    ];
    super(format('Invalid element: missing key() method.', dev));
    this.name = 'InvalidElementError';
  }
}

export class UnhashableKeyError extends Error {
  constructor(
    public key: unknown,
    public reason: string
  ) {
    const dev = [
      'Unhashable key',
      '',
      `structuralKey() cannot encode ${formatKey(key)}: ${reason}.`,
      '',
      'Supported components: primitives, arrays, plain objects and Dates.',
      'Supply a custom keyHash for anything else.',
    ];
    super(format(`Unhashable key: ${reason}.`, dev));
    this.name = 'UnhashableKeyError';
  }
}

export class InvalidKeyedSetConfigError extends Error {
  constructor(public reason: string) {
    const dev = ['Invalid keyed set configuration', '', `Invalid keyed set configuration: ${reason}`];
    super(format(`Invalid keyed set configuration: ${reason}`, dev));
    this.name = 'InvalidKeyedSetConfigError';
  }
}
