import { afterEach, describe, expect, it, vi } from "vitest";
import {
  DEFAULT_OPTIONS,
  isIdentifiableUserAgent,
  normalizeOptions,
  optionsFromEnv,
} from "../src/lib/options.js";

describe("options", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("normalizeOptions fills defaults", () => {
    expect(normalizeOptions()).toEqual(DEFAULT_OPTIONS);
  });

  it("normalizeOptions overrides defaults", () => {
    const out = normalizeOptions({
      minDelayMs: 100,
      maxRetries: 1,
    });
    expect(out.minDelayMs).toBe(100);
    expect(out.maxRetries).toBe(1);
    // untouched defaults remain
    expect(out.maxDelayMs).toBe(DEFAULT_OPTIONS.maxDelayMs);
    expect(out.userAgent).toBe(DEFAULT_OPTIONS.userAgent);
  });

  it("ignores undefined overrides", () => {
    expect(normalizeOptions({ minDelayMs: undefined })).toEqual(DEFAULT_OPTIONS);
  });

  it("clamps out-of-range values", () => {
    const out = normalizeOptions({
      minDelayMs: 3000,
      maxDelayMs: 1000,
      maxRetries: -2,
      concurrency: 0,
    });
    expect(out.minDelayMs).toBe(3000);
    expect(out.maxDelayMs).toBe(3000);
    expect(out.maxRetries).toBe(0);
    expect(out.concurrency).toBe(1);
  });

  it("warns about a user agent without bot name and contact", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    normalizeOptions({ userAgent: "Mozilla/5.0" });
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("recognizes identifiable user agents", () => {
    expect(
      isIdentifiableUserAgent("RealEstateResearchBot/1.0 (+contact: you@example.com)")
    ).toBe(true);
    expect(isIdentifiableUserAgent("Mozilla/5.0")).toBe(false);
    expect(isIdentifiableUserAgent("bot")).toBe(false);
  });

  it("optionsFromEnv reads numbers and skips junk", () => {
    const out = optionsFromEnv({
      SCRAPER_MIN_DELAY_MS: "100",
      SCRAPER_MAX_RETRIES: "lots",
      SCRAPER_CONCURRENCY: " ",
      SCRAPER_USER_AGENT: "TestBot/1.0 (+contact: ops@example.com)",
    });
    expect(out.minDelayMs).toBe(100);
    expect(out.maxRetries).toBeUndefined();
    expect(out.concurrency).toBeUndefined();
    expect(out.userAgent).toBe("TestBot/1.0 (+contact: ops@example.com)");
  });

  it("an empty environment yields the defaults", () => {
    expect(normalizeOptions(optionsFromEnv({}))).toEqual(DEFAULT_OPTIONS);
  });
});
