import type { RandomSource } from '../ports/outbound/random-source.port.js';

/** Always the middle of the range: every jitter collapses to zero. */
export const centeredRng: RandomSource = { next: () => 0.5 };

/** Small LCG so tests get varied but reproducible values without the adapters package. */
export function lcg(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next() {
      state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
      return state / 0x100000000;
    },
  };
}
