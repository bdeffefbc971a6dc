import { describe, expect, it } from "vitest";
import { RateLimiter } from "../src/lib/throttle.js";
import { fakeClock } from "./support.js";

describe("RateLimiter", () => {
  it("lets the first request to a domain through at once", async () => {
    const clock = fakeClock(1000);
    const limiter = new RateLimiter({ minDelayMs: 2000, maxDelayMs: 4000, clock });

    expect(await limiter.awaitTurn("example.com")).toBe(1000);
    expect(clock.sleeps).toEqual([]);
    expect(limiter.lastRequestAt("example.com")).toBe(1000);
  });

  it("spaces concurrent callers on one domain by at least the minimum", async () => {
    const clock = fakeClock(1000);
    const limiter = new RateLimiter({
      minDelayMs: 2000,
      maxDelayMs: 4000,
      clock,
      random: () => 0,
    });

    const times = await Promise.all([
      limiter.awaitTurn("example.com"),
      limiter.awaitTurn("example.com"),
      limiter.awaitTurn("example.com"),
    ]);

    expect(times).toEqual([1000, 3000, 5000]);
  });

  it("does not hold back other domains", async () => {
    const clock = fakeClock(0);
    const limiter = new RateLimiter({ minDelayMs: 2000, maxDelayMs: 4000, clock });

    const times = await Promise.all([
      limiter.awaitTurn("a.example.com"),
      limiter.awaitTurn("b.example.com"),
    ]);

    expect(times).toEqual([0, 0]);
    expect(clock.sleeps).toEqual([]);
  });

  it("draws the delay from the configured range", async () => {
    const clock = fakeClock(0);
    const limiter = new RateLimiter({
      minDelayMs: 1000,
      maxDelayMs: 3000,
      clock,
      random: () => 0.5,
    });

    await limiter.awaitTurn("example.com");
    expect(await limiter.awaitTurn("example.com")).toBe(2000);
  });

  it("raises the delay to a crawl-delay floor", async () => {
    const clock = fakeClock(0);
    const limiter = new RateLimiter({
      minDelayMs: 100,
      maxDelayMs: 200,
      clock,
      random: () => 0,
    });

    await limiter.awaitTurn("example.com", 5000);
    expect(await limiter.awaitTurn("example.com", 5000)).toBe(5000);
  });

  it("does not wait when the gap has already passed", async () => {
    const clock = fakeClock(0);
    const limiter = new RateLimiter({ minDelayMs: 1000, maxDelayMs: 2000, clock });

    await limiter.awaitTurn("example.com");
    clock.advance(10_000);

    expect(await limiter.awaitTurn("example.com")).toBe(10_000);
    expect(clock.sleeps).toEqual([]);
  });
});
