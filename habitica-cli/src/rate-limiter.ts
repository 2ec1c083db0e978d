import { sleep } from './utils.js';

export const HABITICA_REQUEST_WAIT_MS = 500;

export interface RateLimiter {
  /** Resolves once the next request may be sent. */
  acquire(): Promise<void>;
}

export interface FixedDelayOptions {
  delayMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Spaces consecutive requests at least `delayMs` apart.
 * The first request is never delayed.
 */
export class FixedDelayRateLimiter implements RateLimiter {
  private readonly delayMs: number;
  private readonly now: () => number;
  private readonly wait: (ms: number) => Promise<void>;
  private last: number | null = null;

  constructor(options: FixedDelayOptions = {}) {
    this.delayMs = Math.max(0, options.delayMs ?? HABITICA_REQUEST_WAIT_MS);
    this.now = options.now ?? Date.now;
    this.wait = options.sleep ?? sleep;
  }

  async acquire(): Promise<void> {
    if (this.last !== null) {
      const remaining = this.last + this.delayMs - this.now();
      if (remaining > 0) {
        await this.wait(remaining);
      }
    }
    this.last = this.now();
  }
}
