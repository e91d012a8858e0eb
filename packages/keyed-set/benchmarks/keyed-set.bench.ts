import { Bench } from 'tinybench';
import { KeyedSet, structuralKey, type Keyed } from '../src/index.js';

/**
 * KeyedSet Performance Benchmark
 *
 * Measures lookups against a plain Map baseline, then the mutation
 * protocols on top, so the cost of borrow tracking and relocation checks
 * is visible.
 */

class Account implements Keyed<string> {
  constructor(
    public handle: string,
    public balance: number
  ) {}
  key() {
    return this.handle;
  }
}

class Cell implements Keyed<[number, number]> {
  constructor(
    public row: number,
    public col: number
  ) {}
  key(): [number, number] {
    return [this.row, this.col];
  }
}

const SIZE = 10_000;
const handles = Array.from({ length: SIZE }, (_, i) => `user-${i}`);

function seed(): KeyedSet<Account> {
  return KeyedSet.from(handles.map((h, i) => new Account(h, i)));
}

async function runKeyedSetBenchmark() {
  console.log('=== KeyedSet Performance Benchmark ===\n');

  const set = seed();
  const map = new Map(handles.map((h, i) => [h, new Account(h, i)] as const));
  const cells = KeyedSet.from(
    Array.from({ length: 100 }, (_, i) => new Cell(Math.floor(i / 10), i % 10)),
    { keyHash: structuralKey }
  );
  let cursor = 0;
  const next = () => handles[cursor++ % SIZE];

  const bench = new Bench({ time: 1000 });

  bench
    .add('T1: Map.get (baseline)', () => {
      map.get(next());
    })
    .add('T2: KeyedSet.get', () => {
      set.get(next());
    })
    .add('T3: KeyedSet.modify (key kept)', () => {
      set.modify(next(), (a) => {
        a.balance++;
      });
    })
    .add('T4: KeyedSet.modify (key changed and back)', () => {
      const handle = next();
      set.modify(handle, (a) => {
        a.handle = `${handle}!`;
      });
      set.modify(`${handle}!`, (a) => {
        a.handle = handle;
      });
    })
    .add('T5: KeyedSet.withMut (key kept)', () => {
      set.withMut(next(), (a) => {
        a.balance--;
      });
    })
    .add('T6: structuralKey lookup', () => {
      cells.has([cursor++ % 10, 3]);
    })
    .add('T7: retain over 10k elements', () => {
      const scratch = seed();
      scratch.retain((a) => a.balance % 2 === 0);
    });

  console.log(`[phase] running ${bench.tasks.length} tasks...`);
  await bench.run();
  console.table(bench.table());

  const getNs = (name: string) => {
    const task = bench.tasks.find((t) => t.name === name);
    return (task?.result?.mean ?? 0) * 1_000_000;
  };

  console.log('\nProtocol overhead:');
  console.log(
    `  get vs Map.get:            +${(getNs('T2: KeyedSet.get') - getNs('T1: Map.get (baseline)')).toFixed(0)} ns`
  );
  console.log(
    `  modify (kept) vs get:      +${(getNs('T3: KeyedSet.modify (key kept)') - getNs('T2: KeyedSet.get')).toFixed(0)} ns`
  );
}

runKeyedSetBenchmark().catch(console.error);
