import { describe, expect, it, vi } from 'vitest';

import {
  KeyedSet,
  KeyedSetBorrowedError,
  structuralKey,
  type RelocationEvent,
} from '../src/index.js';
import { Counter, Tile, digits } from './fixtures.js';

describe('KeyedSet closure mutation', () => {
  it('keeps index coherence through modify and retain', () => {
    const set = KeyedSet.from(digits(10));

    expect(set.at('3').label).toBe('3');
    expect(set.at('3').value).toBe(3);
    expect(set.at('4').label).toBe('4');
    expect(set.at('4').value).toBe(4);

    set.modify('3', (c) => {
      c.value += 1;
    });
    set.modify('4', (c) => {
      c.label = 'four';
    });

    expect(set.at('3').label).toBe('3');
    expect(set.at('3').value).toBe(4);
    expect(set.has('4')).toBe(false);
    expect(set.at('four').label).toBe('four');
    expect(set.at('four').value).toBe(4);
    expect(set.size).toBe(10);

    set.retain((c) => {
      c.label = String(c.value * 2);
      return c.value % 2 === 0;
    });

    expect(set.size).toBe(5);
    expect(Array.from(set.keys()).sort()).toEqual(['0', '12', '16', '4', '8']);
    for (const counter of set) {
      expect(counter.value % 2).toBe(0);
      expect(set.get(counter.label)).toBe(counter);
      expect(counter.label).toBe(String(counter.value * 2));
    }
    expect(set.has('2')).toBe(false);
    expect(set.has('6')).toBe(false);
  });

  describe('modify', () => {
    it("returns the callback's result and calls it exactly once", () => {
      const set = KeyedSet.from(digits(2));
      const f = vi.fn((c: Counter) => c.value * 10);

      expect(set.modify('1', f)).toBe(10);
      expect(f).toHaveBeenCalledTimes(1);
      expect(f).toHaveBeenCalledWith(set.at('1'));
    });

    it('moves the element when the callback changes its key', () => {
      const set = KeyedSet.from(digits(2));
      const one = set.at('1');

      set.modify('1', (c) => {
        c.label = 'one';
        c.value = 11;
      });

      expect(set.has('1')).toBe(false);
      expect(set.has('one')).toBe(true);
      expect(set.at('one')).toBe(one);
      expect(one.value).toBe(11);
      expect(set.size).toBe(2);
    });

    it('still relocates when the callback throws', () => {
      const set = KeyedSet.from(digits(2));

      expect(() =>
        set.modify('1', (c) => {
          c.label = 'one';
          throw new Error('boom');
        })
      ).toThrowError('boom');

      expect(set.isBorrowed).toBe(false);
      expect(set.has('1')).toBe(false);
      expect(set.get('one')?.value).toBe(1);
    });

    it('displaces the occupant of the destination key', () => {
      const events: RelocationEvent<Counter, string>[] = [];
      const set = KeyedSet.from(digits(3), { onRelocate: (event) => events.push(event) });
      const one = set.at('1');
      const two = set.at('2');

      set.modify('1', (c) => {
        c.label = '2';
      });

      expect(set.size).toBe(2);
      expect(set.at('2')).toBe(one);
      expect(events).toEqual([{ element: one, from: '1', to: '2', displaced: two }]);
    });

    it('does not report unchanged keys', () => {
      const onRelocate = vi.fn();
      const set = KeyedSet.from(digits(2), { onRelocate });

      set.modify('0', (c) => {
        c.value = 50;
      });

      expect(onRelocate).not.toHaveBeenCalled();
      expect(set.at('0').value).toBe(50);
    });

    it('rejects calls back into the set from the callback', () => {
      const set = KeyedSet.from(digits(2));

      expect(() => set.modify('1', () => set.get('0'))).toThrowError(KeyedSetBorrowedError);
      expect(() => set.modify('1', () => set.insert(new Counter('5', 5)))).toThrowError(
        /borrowed by a running mutation callback/
      );

      expect(set.isBorrowed).toBe(false);
      expect(set.has('5')).toBe(false);
      expect(set.size).toBe(2);
    });
  });

  describe('modifyAll', () => {
    it('relocates every element whose key changed', () => {
      const set = KeyedSet.from(digits(3));

      set.modifyAll((c) => {
        if (c.value > 0) c.label = `n${c.label}`;
      });

      expect(Array.from(set.keys()).sort()).toEqual(['0', 'n1', 'n2']);
      expect(set.at('n2').value).toBe(2);
    });
  });

  describe('retain', () => {
    it('drops exactly the rejected elements', () => {
      const set = KeyedSet.from(digits(6));

      set.retain((c) => c.value % 3 === 0);

      expect(set.size).toBe(2);
      expect(Array.from(set.keys()).sort()).toEqual(['0', '3']);
    });

    it('visits each element once when keys shift onto unvisited slots', () => {
      const set = KeyedSet.from(digits(3));
      const predicate = vi.fn((c: Counter) => {
        c.label = String(Number(c.label) + 1);
        c.value += 100;
        return true;
      });

      set.retain(predicate);

      expect(predicate).toHaveBeenCalledTimes(3);
      expect(Array.from(set.keys()).sort()).toEqual(['1', '2', '3']);
      expect(set.at('1').value).toBe(100);
      expect(set.at('2').value).toBe(101);
      expect(set.at('3').value).toBe(102);
    });

    it('lets a moved element displace an unchanged one', () => {
      const set = KeyedSet.from(digits(3));
      const zero = set.at('0');
      const predicate = vi.fn((c: Counter) => {
        if (c.label === '0') c.label = '1';
        return true;
      });

      set.retain(predicate);

      expect(predicate).toHaveBeenCalledTimes(3);
      expect(set.size).toBe(2);
      expect(set.at('1')).toBe(zero);
    });

    it('reports relocations once every element is filed again', () => {
      const set = KeyedSet.from(digits(10));
      set.modify('3', (c) => {
        c.value += 1;
      });
      set.modify('4', (c) => {
        c.label = 'four';
      });
      const fromThree = set.at('3');
      const fromFour = set.at('four');

      const seen: string[] = [];
      const events: RelocationEvent<Counter, string>[] = [];
      const watched = KeyedSet.from(set.drain(), {
        onRelocate: (event) => {
          seen.push(...watched.keys());
          events.push(event);
        },
      });

      watched.retain((c) => {
        c.label = String(c.value * 2);
        return c.value % 2 === 0;
      });

      expect(events.map((e) => `${e.from}->${e.to}`)).toEqual([
        '2->4',
        '3->8',
        '6->12',
        '8->16',
        'four->8',
      ]);
      expect(events[1]).toEqual({ element: fromThree, from: '3', to: '8', displaced: undefined });
      expect(events[4]).toEqual({ element: fromFour, from: 'four', to: '8', displaced: fromThree });
      expect(watched.at('8')).toBe(fromFour);
      expect(seen.length).toBe(25);
    });

    it('keeps the element whose predicate threw and reconciles the rest', () => {
      const set = KeyedSet.from(digits(4));

      expect(() =>
        set.retain((c) => {
          if (c.label === '2') {
            c.label = 'two';
            throw new Error('stop');
          }
          c.label = `x${c.label}`;
          return c.value !== 1;
        })
      ).toThrowError('stop');

      expect(set.isBorrowed).toBe(false);
      expect(Array.from(set.keys()).sort()).toEqual(['3', 'two', 'x0']);
      expect(set.staleKeys()).toEqual([]);
    });
  });

  describe('key objects edited in place', () => {
    it('reports the key an element moved from', () => {
      const events: RelocationEvent<Tile, number[]>[] = [];
      const tiles = new KeyedSet<Tile>({
        keyHash: structuralKey,
        elements: [new Tile([2, 3], 'a')],
        onRelocate: (event) => events.push(event),
      });

      tiles.modify([2, 3], (t) => {
        t.pos[1] = 4;
      });

      expect(tiles.has([2, 3])).toBe(false);
      expect(tiles.get([2, 4])?.name).toBe('a');
      expect(events.length).toBe(1);
      expect(events[0]?.from).toEqual([2, 3]);
      expect(events[0]?.to).toEqual([2, 4]);
    });

    it('lists stale elements under the key they are filed under', () => {
      const moved = new Tile([0, 1], 'b');
      const tiles = new KeyedSet<Tile>({
        keyHash: structuralKey,
        elements: [new Tile([0, 0], 'a'), moved],
      });

      moved.pos[0] = 9;
      const [filed] = tiles.staleKeys();

      expect(filed).toEqual([0, 1]);
      expect(tiles.modify(filed, (t) => t.name)).toBe('b');
      expect(tiles.has([9, 1])).toBe(true);
      expect(tiles.staleKeys()).toEqual([]);
    });
  });

  describe('staleKeys and reindex', () => {
    it('finds and repairs elements mutated outside the protocols', () => {
      const set = KeyedSet.from(digits(3));
      const one = set.at('1');

      one.label = 'one';

      expect(set.staleKeys()).toEqual(['1']);
      expect(set.has('one')).toBe(false);

      expect(set.reindex()).toBe(1);
      expect(set.staleKeys()).toEqual([]);
      expect(set.at('one')).toBe(one);
      expect(set.reindex()).toBe(0);
    });
  });
});
