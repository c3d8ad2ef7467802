import type { RandomSource } from '@traffic-vault/domain';

/**
 * Seedable pseudo-random number generator (mulberry32).
 * Same seed, same commute traces.
 */
export class SeededRng implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }
}

/** Unseeded source for one-off runs. */
export const mathRandomSource: RandomSource = { next: () => Math.random() };

export function createRandomSource(seed?: number): RandomSource {
  return seed === undefined ? mathRandomSource : new SeededRng(seed);
}
