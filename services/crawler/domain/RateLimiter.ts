/**
 * RateLimiter caps requests per wall-clock minute and keeps a minimum
 * spacing between consecutive requests.
 */

import { getLogger } from '../../../shared/infrastructure/logging.js';

const logger = getLogger();

const MINUTE_MS = 60_000;

/**
 * Time source used by the limiter
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise(resolve => setTimeout(resolve, ms))
};

export interface RateLimiterOptions {
  /** Requests allowed per minute */
  limit: number;

  /** Minimum milliseconds between two requests */
  minInterval?: number;

  clock?: Clock;
}

export class RateLimiter {
  private limit: number;
  private readonly minInterval: number;
  private readonly clock: Clock;
  private currentMinute: number;
  private counter = 0;
  private lastRequestTime: number | null = null;

  /** Callers take their turn in arrival order */
  private tail: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions) {
    this.limit = Math.max(1, options.limit);
    this.minInterval = options.minInterval ?? 100;
    this.clock = options.clock ?? systemClock;
    this.currentMinute = Math.floor(this.clock.now() / MINUTE_MS);
  }

  setLimit(limit: number): void {
    this.limit = Math.max(1, limit);
  }

  /**
   * Resolve when the caller may send its request
   */
  wait(): Promise<void> {
    const turn = this.tail.then(() => this.acquire());
    this.tail = turn;
    return turn;
  }

  private async acquire(): Promise<void> {
    let now = this.clock.now();
    const minute = Math.floor(now / MINUTE_MS);
    if (minute !== this.currentMinute) {
      this.currentMinute = minute;
      this.counter = 0;
    }

    this.counter++;

    if (this.counter > this.limit) {
      // Sleep past the next minute boundary, plus one second of slack
      const waitMs = MINUTE_MS - (now % MINUTE_MS) + 1000;
      logger.info(`Rate limit of ${this.limit}/min reached, waiting ${waitMs}ms`, 'RateLimiter');
      await this.clock.sleep(waitMs);
      now = this.clock.now();
      this.currentMinute = Math.floor(now / MINUTE_MS);
      this.counter = 1;
    } else if (this.lastRequestTime !== null) {
      const elapsed = now - this.lastRequestTime;
      if (elapsed < this.minInterval) {
        await this.clock.sleep(this.minInterval - elapsed);
        now = this.clock.now();
      }
    }

    this.lastRequestTime = now;
  }
}
