// src/random/rng.ts
import { randomInt as cryptoRandomInt } from 'node:crypto';

/** Source of uniform random integers. One instance is shared across a whole run. */
export interface RandomSource {
  /** Uniform integer in [min, max], both inclusive. */
  nextInt(min: number, max: number): number;
}

const TWO_POW_32 = 0x1_0000_0000;

/** Fold a safe integer (possibly negative or above 2^32) into 32 bits of state. */
function foldSeed(seed: number): number {
  const low = seed >>> 0;
  const high = Math.floor(seed / TWO_POW_32) >>> 0;
  return (low ^ Math.imul(high, 0x9e3779b9)) >>> 0;
}

/**
 * Mulberry32 generator. The same seed always yields the same stream, so a
 * run over the same input with the same seed reproduces its output exactly.
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    if (!Number.isSafeInteger(seed)) {
      throw new RangeError(`Seed must be a safe integer, got ${seed}`);
    }
    this.state = foldSeed(seed);
  }

  /** Uniform float in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / TWO_POW_32;
  }

  nextInt(min: number, max: number): number {
    if (!Number.isInteger(min) || !Number.isInteger(max) || max < min) {
      throw new RangeError(`Invalid integer range [${min}, ${max}]`);
    }
    return min + Math.floor(this.next() * (max - min + 1));
  }
}

/** Seeded generator for `seed`, or one seeded from the OS entropy pool when unset. */
export function createRandomSource(seed?: number): SeededRandom {
  return new SeededRandom(seed ?? cryptoRandomInt(0, 2 ** 47));
}
