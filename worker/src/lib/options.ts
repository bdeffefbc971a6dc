import type { ScraperOptions } from "./types.js";

export const DEFAULT_OPTIONS: Required<ScraperOptions> = {
  minDelayMs: 2000,
  maxDelayMs: 5000,
  userAgent: "RealEstateResearchBot/1.0 (+contact: you@example.com)",
  robotsTtlMs: 60 * 60 * 1000,
  maxRetries: 3,
  baseBackoffMs: 2000,
  maxBackoffMs: 60_000,
  requestTimeoutMs: 30_000,
  concurrency: 1,
};

// "BotName/Version (+contact...)"
const IDENTIFIABLE_USER_AGENT = /^\S+\/\S+.*\(\+.+\)/;

export function isIdentifiableUserAgent(userAgent: string): boolean {
  return IDENTIFIABLE_USER_AGENT.test(userAgent);
}

export function normalizeOptions(
  options?: ScraperOptions
): Required<ScraperOptions> {
  const merged: Required<ScraperOptions> = {
    ...DEFAULT_OPTIONS,
    ...stripUndefined(options ?? {}),
  };

  merged.minDelayMs = Math.max(0, merged.minDelayMs);
  merged.maxDelayMs = Math.max(merged.minDelayMs, merged.maxDelayMs);
  merged.maxRetries = Math.max(0, Math.floor(merged.maxRetries));
  merged.concurrency = Math.max(1, Math.floor(merged.concurrency));

  if (!isIdentifiableUserAgent(merged.userAgent)) {
    console.warn(
      `User-Agent "${merged.userAgent}" does not identify the bot. Recommended: "BotName/1.0 (+contact: email@example.com)"`
    );
  }

  return merged;
}

function stripUndefined(options: ScraperOptions): ScraperOptions {
  const out: ScraperOptions = {};
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}

function numberFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function optionsFromEnv(
  env: NodeJS.ProcessEnv = process.env
): ScraperOptions {
  return {
    minDelayMs: numberFromEnv(env.SCRAPER_MIN_DELAY_MS),
    maxDelayMs: numberFromEnv(env.SCRAPER_MAX_DELAY_MS),
    userAgent: env.SCRAPER_USER_AGENT || undefined,
    robotsTtlMs: numberFromEnv(env.SCRAPER_ROBOTS_TTL_MS),
    maxRetries: numberFromEnv(env.SCRAPER_MAX_RETRIES),
    baseBackoffMs: numberFromEnv(env.SCRAPER_BASE_BACKOFF_MS),
    maxBackoffMs: numberFromEnv(env.SCRAPER_MAX_BACKOFF_MS),
    requestTimeoutMs: numberFromEnv(env.SCRAPER_REQUEST_TIMEOUT_MS),
    concurrency: numberFromEnv(env.SCRAPER_CONCURRENCY),
  };
}
