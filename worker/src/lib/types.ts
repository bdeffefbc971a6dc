export interface ScraperOptions {
  /**
   * Lower bound (ms) of the randomized delay between two requests to the same
   * domain.
   */
  minDelayMs?: number;
  /**
   * Upper bound (ms) of the randomized delay between two requests to the same
   * domain.
   */
  maxDelayMs?: number;
  /**
   * Sent with every request. Should name the bot and a contact, e.g.
   * "ListingBot/1.0 (+contact: ops@example.com)".
   */
  userAgent?: string;
  /**
   * How long a fetched robots.txt (or a failed attempt) is cached per domain.
   */
  robotsTtlMs?: number;
  /**
   * Retries after the first attempt for 429/5xx/transport failures.
   */
  maxRetries?: number;
  /**
   * Delay before the first retry; doubles with every further attempt.
   */
  baseBackoffMs?: number;
  /**
   * Upper bound for a single backoff wait.
   */
  maxBackoffMs?: number;
  /**
   * Per-attempt request timeout.
   */
  requestTimeoutMs?: number;
  /**
   * URLs taken from the frontier per batch (lower is gentler).
   */
  concurrency?: number;
}

export type PaginationType =
  | "html_next"
  | "query_param"
  | "incremental_path"
  | "template";

export interface FieldSelector {
  /** CSS selector, evaluated inside the listing element. */
  selector: string;
  /** Read this attribute instead of the element text. */
  attribute?: string;
  /** A listing without this field is skipped and counted as a parse error. */
  required?: boolean;
}

export interface SiteConfig {
  key: string;
  baseDomain: string;
  /** May contain `{page}`, replaced by the page number (1 for the seed). */
  seedUrlTemplate: string;
  /** Matches one element per listing on a results page. */
  listingSelector: string;
  fields: Record<string, FieldSelector>;
  paginationSelector?: string;
  paginationType?: PaginationType;
  paginationParam?: string;
  maxPages?: number;
  /**
   * For sites whose results pages only link to listings: matched inside each
   * listing element, its href is fetched as a detail page and `fields` are
   * read from that page.
   */
  listingLinkSelector?: string;
  /** Records (or listing links) whose URL does not match are dropped. */
  linkPattern?: string;
  active: boolean;
}

export interface ListingRecord {
  siteKey: string;
  pageUrl: string;
  sourceUrl: string;
  title?: string;
  price?: string;
  address?: string;
  description?: string;
  attributes: Record<string, string>;
  /**
   * Set when no `url` field was found, so `sourceUrl` only names a slot on
   * the page and does not identify the listing across runs.
   */
  positional?: boolean;
}

export interface RecordSink {
  emit(jobId: string, record: ListingRecord): void | Promise<void>;
}

export interface SiteConfigProvider {
  get(siteKey: string): Promise<SiteConfig | undefined>;
}

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export type FetchLike = (
  input: string,
  init?: RequestInit
) => Promise<Response>;
