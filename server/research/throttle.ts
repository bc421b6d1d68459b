import { sleep } from '../utils/async';

/**
 * Enforces a minimum gap between requests to the same domain.
 *
 * The next slot is reserved before the caller suspends, so concurrent callers
 * for one domain queue behind each other instead of both seeing a free slot.
 * Domains never wait on each other.
 */
export class DomainThrottle {
  private readonly lastRequestAt = new Map<string, number>();
  readonly minIntervalMs: number;

  constructor(requestsPerSecond: number) {
    if (!(requestsPerSecond > 0)) {
      throw new Error(`requestsPerSecond must be positive, got ${requestsPerSecond}`);
    }
    this.minIntervalMs = 1000 / requestsPerSecond;
  }

  /** Resolves with the number of milliseconds the caller was held back. */
  async acquire(domain: string, signal?: AbortSignal): Promise<number> {
    const key = domain.toLowerCase();
    const now = Date.now();
    const last = this.lastRequestAt.get(key);
    const slot = last === undefined ? now : Math.max(now, last + this.minIntervalMs);
    this.lastRequestAt.set(key, slot);

    const waitMs = slot - now;
    if (waitMs > 0) {
      await sleep(waitMs, signal);
    }
    return waitMs;
  }

  reset(): void {
    this.lastRequestAt.clear();
  }
}
