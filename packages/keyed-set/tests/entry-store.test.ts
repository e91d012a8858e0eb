import { describe, expect, it } from 'vitest';

import { EntryStore, type Entry } from '../src/core/entry-store.js';
import { Counter } from './fixtures.js';

const createEntry = (label: string, value = 0): Entry<Counter, string> => ({
  key: label,
  element: new Counter(label, value),
});

describe('EntryStore', () => {
  it('stores and retrieves entries by slot', () => {
    const store = new EntryStore<Counter, string>();
    const entry = createEntry('a');

    expect(store.set('a', entry)).toBeUndefined();

    expect(store.size).toBe(1);
    expect(store.has('a')).toBe(true);
    expect(store.get('a')).toBe(entry);
    expect(Array.from(store.slots())).toEqual([['a', entry]]);
    expect(Array.from(store.values())).toEqual([entry]);
  });

  it('returns the displaced entry when a slot is reused', () => {
    const store = new EntryStore<Counter, string>();
    const first = createEntry('a', 1);
    const second = createEntry('a', 2);

    store.set('a', first);

    expect(store.set('a', second)).toBe(first);
    expect(store.size).toBe(1);
  });

  it('stamps structural changes only', () => {
    const store = new EntryStore<Counter, string>();
    const start = store.stamp;

    store.set('a', createEntry('a'));
    expect(store.stamp).toBe(start + 1);

    expect(store.delete('missing')).toBeUndefined();
    store.get('a');
    expect(store.stamp).toBe(start + 1);

    expect(store.delete('a')?.key).toBe('a');
    expect(store.stamp).toBe(start + 2);

    store.clear();
    expect(store.stamp).toBe(start + 2);

    store.set('b', createEntry('b'));
    store.clear();
    expect(store.size).toBe(0);
    expect(store.stamp).toBe(start + 4);
  });
});
