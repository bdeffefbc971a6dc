export type StatusClass = "success" | "retriable" | "non_retriable";

export function classifyStatus(statusCode: number): StatusClass {
  if (statusCode >= 200 && statusCode < 300) return "success";
  // Throttled or server-side trouble: worth another attempt
  if (statusCode === 429 || (statusCode >= 500 && statusCode < 600)) {
    return "retriable";
  }
  return "non_retriable";
}

/**
 * Wait before retry number `attempt` (1-based): base, 2·base, 4·base, ...
 */
export function backoffDelay(
  attempt: number,
  baseMs: number,
  maxMs: number = Number.POSITIVE_INFINITY
): number {
  if (attempt < 1 || baseMs <= 0) return 0;
  return Math.min(maxMs, baseMs * 2 ** (attempt - 1));
}

/**
 * Retry-After in delta-seconds or HTTP-date form, as milliseconds from `now`.
 */
export function parseRetryAfter(
  header: string | null,
  now: number
): number | undefined {
  if (!header) return undefined;
  const value = header.trim();

  if (/^\d+$/.test(value)) return Number(value) * 1000;

  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

export function isTimeoutError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}
