/** Uniform random source; injected so simulations can run under a fixed seed. */
export interface RandomSource {
  /** Returns a float in [0, 1). */
  next(): number;
}
