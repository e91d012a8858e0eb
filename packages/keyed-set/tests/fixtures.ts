import type { Keyed } from '../src/index.js';

/**
 * Test element whose key is its mutable label.
 */
export class Counter implements Keyed<string> {
  constructor(
    public label: string,
    public value: number
  ) {}

  key(): string {
    return this.label;
  }
}

/** Counters labelled '0'..String(count - 1), each holding its own index. */
export const digits = (count: number): Counter[] =>
  Array.from({ length: count }, (_, i) => new Counter(String(i), i));

/** Test element that hands out its own position array as its key. */
export class Tile implements Keyed<number[]> {
  constructor(
    public pos: number[],
    public name: string
  ) {}

  key(): number[] {
    return this.pos;
  }
}
