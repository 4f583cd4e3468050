export interface BackoffOptions {
  /** First delay after a failure. @default 1000 */
  floorMs?: number;
  /** Upper bound for any delay. @default 30000 */
  ceilingMs?: number;
  /** Growth per consecutive failure. @default 2 */
  factor?: number;
}

/**
 * Geometric reconnect delays: `min(floor * factor^n, ceiling)` for the n-th
 * consecutive failure, counting from zero. Owns no timers; the caller
 * schedules.
 */
export class BackoffPolicy {
  readonly floorMs: number;
  readonly ceilingMs: number;
  readonly factor: number;
  private failures = 0;

  constructor(options: BackoffOptions = {}) {
    this.floorMs = options.floorMs ?? 1_000;
    this.ceilingMs = options.ceilingMs ?? 30_000;
    this.factor = options.factor ?? 2;

    if (!(this.floorMs > 0)) throw new TypeError(`Backoff floor must be positive, got ${this.floorMs}`);
    if (!(this.ceilingMs >= this.floorMs)) {
      throw new TypeError(`Backoff ceiling ${this.ceilingMs} is below the floor ${this.floorMs}`);
    }
    if (!(this.factor > 1)) throw new TypeError(`Backoff factor must be greater than 1, got ${this.factor}`);
  }

  /** Delay before the next attempt; advances the failure count. */
  next(): number {
    const delay = Math.min(this.floorMs * this.factor ** this.failures, this.ceilingMs);
    this.failures++;
    return delay;
  }

  /** Call once a connection has been established. */
  reset(): void {
    this.failures = 0;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }
}
