import { setTimeout as delay } from "node:timers/promises";

export interface Clock {
  /** Milliseconds, monotonic. */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: async (ms) => {
    await delay(ms);
  },
};

/**
 * Leaky-bucket pacing shared by every exchange of one transport. The allowance
 * refills at `requestsPerSecond`, holds at most one second's worth and starts
 * empty. Callers are released one at a time: the read-modify-write of the
 * allowance runs inside a promise chain, so a caller waiting for its unit holds
 * the chain until it is released.
 */
export class RateLimiter {
  private readonly rate: number | null;
  private readonly clock: Clock;
  private allowance = 0;
  private lastCheck: number;
  private tail: Promise<void> = Promise.resolve();

  constructor(requestsPerSecond: number | null, clock: Clock = systemClock) {
    this.rate = requestsPerSecond && requestsPerSecond > 0 ? requestsPerSecond : null;
    this.clock = clock;
    this.lastCheck = clock.now();
  }

  wait(): Promise<void> {
    const rate = this.rate;
    if (rate === null) {
      return Promise.resolve();
    }
    const turn = this.tail.then(() => this.take(rate));
    this.tail = turn;
    return turn;
  }

  private async take(rate: number): Promise<void> {
    const current = this.clock.now();
    this.allowance = Math.min(
      rate,
      this.allowance + ((current - this.lastCheck) / 1000) * rate
    );
    this.lastCheck = current;

    if (this.allowance >= 1) {
      this.allowance -= 1;
      return;
    }

    await this.clock.sleep(((1 - this.allowance) / rate) * 1000);
    this.allowance = 0;
    this.lastCheck = this.clock.now();
  }
}
