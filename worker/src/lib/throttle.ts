import { KeyedMutex } from "./mutex.js";
import { systemClock, uniformDelay } from "./time.js";
import type { Clock } from "./types.js";

export interface RateLimiterOptions {
  minDelayMs: number;
  maxDelayMs: number;
  clock?: Clock;
  random?: () => number;
}

interface DomainRateState {
  lastRequestAt: number;
}

/**
 * Spaces out requests per domain. State is shared by every job in the
 * process, so the read of `lastRequestAt`, the wait and the write of the new
 * timestamp happen under the domain's lock.
 */
export class RateLimiter {
  private readonly states = new Map<string, DomainRateState>();
  private readonly locks = new KeyedMutex();
  private readonly clock: Clock;
  private readonly random: () => number;

  constructor(private readonly options: RateLimiterOptions) {
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
  }

  /**
   * Resolves once a request to `domain` may be sent, and records it as sent.
   * `floorMs` (e.g. a robots.txt Crawl-delay) raises both delay bounds.
   */
  awaitTurn(domain: string, floorMs = 0): Promise<number> {
    return this.locks.runExclusive(domain, async () => {
      const state = this.states.get(domain);

      if (state) {
        const delay = uniformDelay(
          Math.max(this.options.minDelayMs, floorMs),
          Math.max(this.options.maxDelayMs, floorMs),
          this.random
        );
        const waitMs = state.lastRequestAt + delay - this.clock.now();
        if (waitMs > 0) await this.clock.sleep(waitMs);
      }

      const now = this.clock.now();
      this.states.set(domain, { lastRequestAt: now });
      return now;
    });
  }

  lastRequestAt(domain: string): number | undefined {
    return this.states.get(domain)?.lastRequestAt;
  }
}
