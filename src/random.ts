import { LCG_INCREMENT, LCG_MODULUS, LCG_MULTIPLIER } from './constants';
import { InvalidConfigurationError } from './errors';
import { getMD5Hash } from './hashing';

export type Seed = number | string;

// 2^15: splitting the state into two 15 bit halves keeps every product below 2^53
const HALF = 32768;

/**
 * Derive an integer seed from a seed and any number of keys.
 *
 * Used wherever one seed has to produce several independent streams (one per cycle, one per
 * composed environment, ...).
 */
export function deriveSeed(seed: Seed, ...keys: Array<string | number>): number {
  const hashOutput = getMD5Hash([seed, ...keys].join('-'));
  // the first 8 hex characters are the first 4 bytes of the hash
  return parseInt(hashOutput.slice(0, 8), 16) % LCG_MODULUS;
}

/** Throws unless `seed` is usable; lets random filters reject bad seeds when they are built. */
export function assertSeed(seed: Seed | undefined): void {
  if (seed !== undefined && typeof seed !== 'string' && !Number.isInteger(seed)) {
    throw new InvalidConfigurationError('A seed must be an integer or a string', { seed });
  }
}

/**
 * A linear congruential generator.
 *
 * JavaScript's Math.random cannot be seeded, and interaction streams must be identical for a
 * given seed on every platform and release, so the generator is spelled out here.
 */
export class SeededRandom {
  readonly seed: number;
  private state: number;

  constructor(seed?: Seed) {
    if (seed === undefined) {
      this.seed = Math.floor(Math.random() * LCG_MODULUS);
    } else if (typeof seed === 'string') {
      this.seed = deriveSeed(seed);
    } else {
      assertSeed(seed);
      this.seed = ((seed % LCG_MODULUS) + LCG_MODULUS) % LCG_MODULUS;
    }
    this.state = this.seed;
  }

  /** A uniform random number in [0, 1]. */
  random(): number {
    return this.next() / (LCG_MODULUS - 1);
  }

  randoms(n: number): number[] {
    const numbers: number[] = [];
    for (let i = 0; i < n; i++) {
      numbers.push(this.random());
    }
    return numbers;
  }

  /** A uniform random integer in [min, max]. */
  randint(min: number, max: number): number {
    return Math.min(Math.floor((max - min + 1) * this.random()), max - min) + min;
  }

  choice<T>(items: readonly T[]): T {
    if (!items.length) {
      throw new InvalidConfigurationError('Cannot choose from an empty sequence');
    }
    return items[this.randint(0, items.length - 1)];
  }

  /** A shuffled copy of `items`; the input is left untouched. */
  shuffle<T>(items: readonly T[]): T[] {
    const shuffled = [...items];
    const n = shuffled.length;
    for (let i = 0; i < n; i++) {
      // min() handles the edge case of random() returning exactly 1
      const j = Math.min(Math.floor(i + this.random() * (n - i)), n - 1);
      [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
    }
    return shuffled;
  }

  /** A normally distributed number (Box-Muller). */
  gauss(mu = 0, sigma = 1): number {
    const u1 = Math.max(this.random(), Number.EPSILON);
    const u2 = this.random();
    return mu + sigma * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  }

  private next(): number {
    const high = Math.floor(this.state / HALF);
    const low = this.state % HALF;
    const product = ((LCG_MULTIPLIER * high) % HALF) * HALF + LCG_MULTIPLIER * low;
    this.state = (product + LCG_INCREMENT) % LCG_MODULUS;
    return this.state;
  }
}
