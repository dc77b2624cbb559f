// Seedable RNG utilities.
// The server uses Math.random by default; tests pass a seeded RNG.

export type RandomSource = () => number;

export function mulberry32(seed: number): RandomSource {
  let a = seed >>> 0;
  return function () {
    a |= 0;
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export class RNG {
  private readonly nextFn: RandomSource;

  constructor(source: RandomSource = Math.random) {
    this.nextFn = source;
  }

  static seeded(seed: number): RNG {
    return new RNG(mulberry32(seed));
  }

  next(): number {
    return this.nextFn();
  }

  /** Inclusive on both ends. */
  int(minInclusive: number, maxInclusive: number): number {
    const r = this.next();
    const span = maxInclusive - minInclusive + 1;
    return minInclusive + Math.floor(r * span);
  }

  pick<T>(arr: readonly T[]): T {
    const item = arr[this.int(0, arr.length - 1)];
    if (item === undefined) throw new Error('RNG.pick on empty array');
    return item;
  }
}
