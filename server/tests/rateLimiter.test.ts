import { describe, expect, it } from "vitest";
import { RateLimiter } from "../src/rateLimiter.js";
import type { Clock } from "../src/rateLimiter.js";

class FakeClock implements Clock {
  time = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
  }
}

describe("RateLimiter", () => {
  it("does not pace when no rate is configured", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(null, clock);

    await limiter.wait();
    await limiter.wait();

    expect(clock.sleeps).toEqual([]);
  });

  it("treats a zero rate as unlimited", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(0, clock);

    await limiter.wait();

    expect(clock.sleeps).toEqual([]);
  });

  it("starts empty and waits for one full unit", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(2, clock);

    await limiter.wait();
    await limiter.wait();

    expect(clock.sleeps).toEqual([500, 500]);
    expect(clock.time).toBe(1000);
  });

  it("caps the idle allowance at one second's worth", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(2, clock);
    clock.time = 5000;

    await limiter.wait();
    await limiter.wait();
    await limiter.wait();

    expect(clock.sleeps).toEqual([500]);
  });

  it("waits only for the missing fraction of a unit", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(4, clock);
    clock.time = 100;

    await limiter.wait();

    expect(clock.sleeps).toHaveLength(1);
    expect(clock.sleeps[0]).toBeCloseTo(150);
  });

  it("releases concurrent callers one at a time in arrival order", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(2, clock);
    const released: Array<{ caller: number; at: number }> = [];

    await Promise.all(
      [1, 2, 3].map(async (caller) => {
        await limiter.wait();
        released.push({ caller, at: clock.time });
      })
    );

    expect(released).toEqual([
      { caller: 1, at: 500 },
      { caller: 2, at: 1000 },
      { caller: 3, at: 1500 },
    ]);
  });
});
