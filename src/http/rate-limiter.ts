/**
 * Minimum-interval rate limiter shared by all concurrent requests.
 */

export interface RateLimiterOptions {
  /** Monotonic clock in milliseconds (default: performance.now) */
  now?: () => number;
  /** Sleep implementation (default: setTimeout) */
  sleep?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Grants at most one request per `minIntervalMs`.
 *
 * Callers are served strictly one at a time through a promise chain: a caller
 * reads and updates the last-granted stamp only after every earlier caller has
 * been granted, so no two grants are ever less than the interval apart.
 * An interval of zero or less disables waiting.
 */
export class RateLimiter {
  readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastGrantedAt = Number.NEGATIVE_INFINITY;
  private queue: Promise<void> = Promise.resolve();

  constructor(minIntervalMs: number, options: RateLimiterOptions = {}) {
    this.minIntervalMs = Math.max(0, minIntervalMs);
    this.now = options.now ?? (() => performance.now());
    this.sleep = options.sleep ?? sleep;
  }

  /** Resolve once the caller may issue its request. */
  wait(): Promise<void> {
    if (this.minIntervalMs <= 0) return Promise.resolve();
    const turn = this.queue.then(() => this.grant());
    // A failed sleep rejects only its own caller; later callers keep their turn.
    this.queue = turn.catch(() => undefined);
    return turn;
  }

  private async grant(): Promise<void> {
    const waitMs = this.lastGrantedAt + this.minIntervalMs - this.now();
    if (waitMs > 0) {
      await this.sleep(waitMs);
    }
    this.lastGrantedAt = this.now();
  }
}
