/**
 * Deterministic clock for tests and reproducible runs.
 * Each call to `now()` returns the current instant, then advances by `tickMs`.
 */
export class DeterministicClock {
  private currentMs: number;

  constructor(
    epochMs: number,
    private readonly tickMs: number = 1_000,
  ) {
    this.currentMs = epochMs;
  }

  now = (): Date => {
    const ts = new Date(this.currentMs);
    this.currentMs += this.tickMs;
    return ts;
  };
}

/** Wall-clock implementation. */
export function wallClockNow(): Date {
  return new Date();
}
