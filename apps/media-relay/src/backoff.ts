export interface BackoffOptions {
  initialMs: number;
  maxMs: number;
  jitterMs: number;
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Delays for consecutive backpressure answers on one file:
 * initialMs, then min(initialMs * 2^n, maxMs) + jitter, never shrinking
 * from one attempt to the next and never above maxMs + jitterMs.
 */
export class BackoffSchedule {
  private attempt = 0;
  private previous = 0;

  constructor(private readonly opts: BackoffOptions, private readonly random: () => number = Math.random) {}

  /** Backpressure answers seen since the last reset */
  get attempts(): number {
    return this.attempt;
  }

  nextDelay(): number {
    const n = this.attempt++;
    let delay: number;
    if (n === 0) {
      delay = this.opts.initialMs;
    } else {
      const base = Math.min(this.opts.initialMs * 2 ** n, this.opts.maxMs);
      delay = base + Math.floor(this.random() * this.opts.jitterMs);
    }
    delay = Math.min(Math.max(delay, this.previous), this.opts.maxMs + this.opts.jitterMs);
    this.previous = delay;
    return delay;
  }

  reset(): void {
    this.attempt = 0;
    this.previous = 0;
  }
}
