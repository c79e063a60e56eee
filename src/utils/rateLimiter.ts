export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((r) => setTimeout(r, ms)),
};

/**
 * Spaces calls to `wait()` at least `minIntervalMs` apart. The first call
 * after construction or `reset()` never waits.
 */
export class RateLimiter {
  private last: number | undefined;

  constructor(private readonly minIntervalMs = 1000, private readonly clock: Clock = systemClock) {}

  /** Resolves with the number of milliseconds slept. */
  async wait(): Promise<number> {
    let slept = 0;
    if (this.minIntervalMs > 0 && this.last !== undefined) {
      const remaining = this.minIntervalMs - (this.clock.now() - this.last);
      if (remaining > 0) {
        await this.clock.sleep(remaining);
        slept = remaining;
      }
    }
    this.last = this.clock.now();
    return slept;
  }

  reset(): void {
    this.last = undefined;
  }
}
