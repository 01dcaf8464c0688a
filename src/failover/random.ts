/**
 * Random sources for the one-time endpoint shuffle.
 *
 * @module
 */

/** Returns a float in `[0, 1)`, like `Math.random`. */
export type RandomSource = () => number;

/**
 * Small deterministic LCG, good enough to spread clients across endpoints.
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    // Nearby seeds (consecutive timestamps) must not give nearby sequences.
    this.state = mix32(seed >>> 0) || 0x9e3779b9;
  }

  next(): number {
    this.state = (Math.imul(this.state, 1664525) + 1013904223) >>> 0;
    return this.state / 0x100000000;
  }

  /** Bind as a {@link RandomSource}. */
  asSource(): RandomSource {
    return () => this.next();
  }
}

function mix32(h: number): number {
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

/**
 * Random source seeded from the wall clock, so that clients starting at
 * different moments pick different first endpoints.
 */
export function timeSeededRandom(now: () => number = Date.now): RandomSource {
  return new SeededRandom(now()).asSource();
}

/**
 * Uniform in-place Fisher–Yates shuffle.
 *
 * @throws {RangeError} if `random` returns anything outside `[0, 1)`
 */
export function shuffleInPlace<T>(items: T[], random: RandomSource): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const r = random();
    if (!(r >= 0 && r < 1)) {
      throw new RangeError(`Random source returned ${r}, expected a number in [0, 1)`);
    }
    const j = Math.min(Math.floor(r * (i + 1)), i);
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}
