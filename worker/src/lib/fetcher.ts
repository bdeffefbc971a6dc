import {
  HttpNonRetriableError,
  HttpRetriableError,
} from "./errors.js";
import {
  backoffDelay,
  classifyStatus,
  isTimeoutError,
  parseRetryAfter,
} from "./http.js";
import { systemClock } from "./time.js";
import type { Clock, FetchLike, ScraperOptions } from "./types.js";

export interface FetchSuccess {
  ok: true;
  url: string;
  status: number;
  attempts: number;
  body: string;
}

export interface FetchFailure {
  ok: false;
  url: string;
  /** Last HTTP status seen, absent for transport errors. */
  status?: number;
  attempts: number;
  body: null;
  error: HttpNonRetriableError | HttpRetriableError;
}

/** A 3xx with a Location header. Redirects are never followed here. */
export interface FetchRedirect {
  ok: false;
  url: string;
  status: number;
  attempts: number;
  body: null;
  /** Resolved against `url`. */
  location: string;
}

export type FetchOutcome = FetchSuccess | FetchRedirect | FetchFailure;

export function isRedirect(outcome: FetchOutcome): outcome is FetchRedirect {
  return "location" in outcome;
}

export interface FetchHooks {
  /**
   * Awaited after the backoff wait and before every retry, e.g. to take the
   * domain's rate-limit turn. Returning false stops retrying.
   */
  beforeRetry?: (attempt: number) => Promise<boolean>;
}

export type FetcherOptions = Pick<
  Required<ScraperOptions>,
  | "userAgent"
  | "maxRetries"
  | "baseBackoffMs"
  | "maxBackoffMs"
  | "requestTimeoutMs"
>;

export interface FetcherDeps {
  fetch?: FetchLike;
  clock?: Clock;
}

export function requestHeaders(userAgent: string): Record<string, string> {
  return {
    "User-Agent": userAgent,
    Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    "Accept-Language": "en-US,en;q=0.9",
  };
}

async function discardBody(response: Response): Promise<void> {
  // Unread bodies keep the connection busy
  await response.body?.cancel().catch(() => undefined);
}

function resolveLocation(header: string | null, base: string): string | undefined {
  if (!header) return undefined;
  try {
    return new URL(header, base).href;
  } catch {
    return undefined;
  }
}

/**
 * Single GET with retries. Never throws for HTTP or transport problems: the
 * outcome says what happened and how many attempts it took. Redirects come
 * back as outcomes so the caller can vet the target.
 */
export class Fetcher {
  private readonly fetchImpl: FetchLike;
  private readonly clock: Clock;

  constructor(
    private readonly options: FetcherOptions,
    deps: FetcherDeps = {}
  ) {
    this.fetchImpl = deps.fetch ?? fetch;
    this.clock = deps.clock ?? systemClock;
  }

  async fetch(url: string, hooks: FetchHooks = {}): Promise<FetchOutcome> {
    const maxAttempts = Math.max(0, this.options.maxRetries) + 1;

    for (let attempt = 1; ; attempt++) {
      let failure: FetchFailure;
      let retryAfterMs: number | undefined;

      try {
        const response = await this.fetchImpl(url, {
          method: "GET",
          redirect: "manual",
          signal: AbortSignal.timeout(this.options.requestTimeoutMs),
          headers: requestHeaders(this.options.userAgent),
        });

        const location = resolveLocation(response.headers.get("location"), url);
        if (response.status >= 300 && response.status < 400 && location) {
          await discardBody(response);
          return {
            ok: false,
            url,
            status: response.status,
            attempts: attempt,
            body: null,
            location,
          };
        }

        const statusClass = classifyStatus(response.status);

        if (statusClass === "success") {
          const body = await response.text();
          return { ok: true, url, status: response.status, attempts: attempt, body };
        }

        await discardBody(response);

        if (statusClass === "non_retriable") {
          console.warn(`HTTP ${response.status} for ${url}, not retrying`);
          return {
            ok: false,
            url,
            status: response.status,
            attempts: attempt,
            body: null,
            error: new HttpNonRetriableError(url, response.status),
          };
        }

        retryAfterMs = parseRetryAfter(
          response.headers.get("retry-after"),
          this.clock.now()
        );
        failure = {
          ok: false,
          url,
          status: response.status,
          attempts: attempt,
          body: null,
          error: new HttpRetriableError(url, "status", attempt, response.status),
        };
      } catch (error) {
        failure = {
          ok: false,
          url,
          attempts: attempt,
          body: null,
          error: new HttpRetriableError(
            url,
            isTimeoutError(error) ? "timeout" : "network",
            attempt,
            undefined,
            error instanceof Error ? error.message : String(error)
          ),
        };
      }

      if (attempt >= maxAttempts) {
        console.error(failure.error.message);
        return failure;
      }

      const delay = Math.min(
        this.options.maxBackoffMs,
        Math.max(
          backoffDelay(attempt, this.options.baseBackoffMs, this.options.maxBackoffMs),
          retryAfterMs ?? 0
        )
      );
      console.warn(
        `${failure.error.message}, retrying in ${Math.round(delay)}ms (${attempt}/${this.options.maxRetries})`
      );
      await this.clock.sleep(delay);

      if (hooks.beforeRetry && !(await hooks.beforeRetry(attempt + 1))) {
        return failure;
      }
    }
  }
}
