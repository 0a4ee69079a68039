/**
 * Pacing for data-provider calls.
 *
 * Free market-data tiers cap requests per minute; the gate keeps a
 * minimum interval between consecutive calls instead of sleeping after
 * every fetch.
 */

export interface PacingGate {
  /** Resolves once the next call is allowed */
  wait(): Promise<void>;
}

export interface IntervalGateOptions {
  intervalMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Minimum delay between consecutive calls; the first call passes immediately */
export class IntervalGate implements PacingGate {
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastCall: number | null = null;

  constructor(options: IntervalGateOptions) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs < 0) {
      throw new RangeError(`intervalMs must be >= 0, got ${options.intervalMs}`);
    }
    this.intervalMs = options.intervalMs;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
  }

  async wait(): Promise<void> {
    if (this.lastCall !== null) {
      const elapsed = this.now() - this.lastCall;
      if (elapsed < this.intervalMs) {
        await this.sleep(this.intervalMs - elapsed);
      }
    }
    this.lastCall = this.now();
  }
}

/** Gate that never waits */
export class NoopGate implements PacingGate {
  async wait(): Promise<void> {}
}

export function createPacingGate(intervalMs: number): PacingGate {
  return intervalMs > 0 ? new IntervalGate({ intervalMs }) : new NoopGate();
}
