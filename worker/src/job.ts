import {
  computedPageUrl,
  domainOf,
  expandSeedUrl,
  isHttpUrl,
  isOnDomain,
  normalizeUrl,
} from "./lib/crawl.js";
import { Deduplicator } from "./lib/dedupe.js";
import {
  Fetcher,
  isRedirect,
  type FetchFailure,
  type FetchSuccess,
} from "./lib/fetcher.js";
import { normalizeOptions } from "./lib/options.js";
import {
  parseDetailPage,
  parsePage,
  type ParsedDetailPage,
  type ParsedPage,
} from "./lib/parser.js";
import { RobotsPolicyCache, type RobotsDecision } from "./lib/robots.js";
import { DEFAULT_MAX_PAGES, validateSiteConfig } from "./lib/site.js";
import { isTerminal, transition, type JobStatus } from "./lib/state.js";
import { RateLimiter } from "./lib/throttle.js";
import { systemClock } from "./lib/time.js";
import type {
  Clock,
  FetchLike,
  ListingRecord,
  RecordSink,
  ScraperOptions,
  SiteConfig,
} from "./lib/types.js";

export type { JobStatus } from "./lib/state.js";
export type { ScraperOptions, SiteConfig, ListingRecord } from "./lib/types.js";

export interface JobProgress {
  urlsVisited: number;
  recordsFound: number;
  errors: number;
  /** Skipped because robots.txt disallowed them or could not be loaded. */
  blocked: number;
  /** Distinct normalized URLs ever put on the frontier. */
  urlsEnqueued: number;
}

export type LogLevel = "error" | "warning" | "info";

export interface JobLogEntry {
  level: LogLevel;
  message: string;
  url?: string;
  timestamp: string;
}

export type ListingUrlStatus = "found" | "scraped" | "failed";

/** Detail page of one listing, for sites crawled in two levels. */
export interface JobUrlEntry {
  url: string;
  status: ListingUrlStatus;
  timestamp: string;
}

export interface JobSnapshot {
  id: string;
  siteKey: string;
  status: JobStatus;
  progress: Readonly<JobProgress>;
  cancelRequested: boolean;
  error?: string;
  log: readonly JobLogEntry[];
  urls: readonly JobUrlEntry[];
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
}

export interface ProgressView {
  status: JobStatus;
  urlsVisited: number;
  recordsFound: number;
  errors: number;
  blocked: number;
}

export interface JobHooks {
  onRunning?: (job: JobSnapshot) => void | Promise<void>;
  onProgress?: (job: JobSnapshot) => void | Promise<void>;
  onCompleted?: (job: JobSnapshot) => void | Promise<void>;
  onFailed?: (job: JobSnapshot, error: string) => void | Promise<void>;
  onCancelled?: (job: JobSnapshot) => void | Promise<void>;
}

export interface JobHandle {
  jobId: string;
  /** Settles with the final snapshot; never rejects. */
  done: Promise<JobSnapshot>;
}

export interface OrchestratorDeps {
  sink: RecordSink;
  options?: ScraperOptions;
  fetch?: FetchLike;
  clock?: Clock;
  random?: () => number;
  /** Share these between orchestrators to share per-domain state. */
  robots?: RobotsPolicyCache;
  rateLimiter?: RateLimiter;
}

export const MAX_LOG_ENTRIES = 100;
export const MAX_REDIRECTS = 5;

export function emptyProgress(): Readonly<JobProgress> {
  return Object.freeze({
    urlsVisited: 0,
    recordsFound: 0,
    errors: 0,
    blocked: 0,
    urlsEnqueued: 0,
  });
}

/** Progress is never mutated in place; readers may hold on to old copies. */
export function incrementProgress(
  progress: Readonly<JobProgress>,
  counter: keyof JobProgress,
  by = 1
): Readonly<JobProgress> {
  return Object.freeze({ ...progress, [counter]: progress[counter] + by });
}

/** Appends, dropping the oldest entries beyond MAX_LOG_ENTRIES. */
export function appendLog(log: JobLogEntry[], entry: JobLogEntry): void {
  log.push(entry);
  if (log.length > MAX_LOG_ENTRIES) log.splice(0, log.length - MAX_LOG_ENTRIES);
}

export function toProgressView(
  status: JobStatus,
  progress: Readonly<JobProgress>
): ProgressView {
  const { urlsVisited, recordsFound, errors, blocked } = progress;
  return { status, urlsVisited, recordsFound, errors, blocked };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function siteKeyOf(config: unknown): string {
  if (typeof config === "object" && config !== null && "key" in config) {
    return String(config.key);
  }
  return "";
}

interface Job {
  id: string;
  siteKey: string;
  status: JobStatus;
  progress: Readonly<JobProgress>;
  cancelRequested: boolean;
  error?: string;
  log: JobLogEntry[];
  urls: Map<string, JobUrlEntry>;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
}

type PageKind = "results" | "detail";

interface FrontierEntry {
  url: string;
  page: number;
  kind: PageKind;
}

interface CrawlState {
  site: SiteConfig;
  frontier: FrontierEntry[];
  enqueued: Set<string>;
  /** Results pages fetched; detail pages do not count. */
  pagesFetched: number;
  maxPages: number;
}

interface FetchedPage {
  /** Where the body came from, after redirects. */
  url: string;
  outcome: FetchSuccess | FetchFailure;
}

/**
 * Runs scrape jobs: one async task per job, sharing robots and rate-limit
 * state per domain across all of them.
 */
export class JobOrchestrator {
  private readonly jobs = new Map<string, Job>();
  private readonly dedupe = new Deduplicator();
  private readonly options: Required<ScraperOptions>;
  private readonly fetcher: Fetcher;
  private readonly robots: RobotsPolicyCache;
  private readonly rateLimiter: RateLimiter;
  private readonly clock: Clock;
  private readonly sink: RecordSink;

  constructor(deps: OrchestratorDeps) {
    this.options = normalizeOptions(deps.options);
    this.clock = deps.clock ?? systemClock;
    this.sink = deps.sink;
    this.fetcher = new Fetcher(this.options, {
      fetch: deps.fetch,
      clock: this.clock,
    });
    this.robots =
      deps.robots ??
      new RobotsPolicyCache({
        userAgent: this.options.userAgent,
        ttlMs: this.options.robotsTtlMs,
        requestTimeoutMs: this.options.requestTimeoutMs,
        fetch: deps.fetch,
        clock: this.clock,
      });
    this.rateLimiter =
      deps.rateLimiter ??
      new RateLimiter({
        minDelayMs: this.options.minDelayMs,
        maxDelayMs: this.options.maxDelayMs,
        clock: this.clock,
        random: deps.random,
      });
  }

  get settings(): Readonly<Required<ScraperOptions>> {
    return this.options;
  }

  /**
   * Registers the job and starts it in the background. An invalid or missing
   * site config fails the job before anything is fetched.
   */
  launchJob(jobId: string, siteConfig: unknown, hooks: JobHooks = {}): JobHandle {
    if (this.jobs.has(jobId)) {
      throw new Error(`Job ${jobId} already exists`);
    }

    const job: Job = {
      id: jobId,
      siteKey: siteKeyOf(siteConfig),
      status: "pending",
      progress: emptyProgress(),
      cancelRequested: false,
      log: [],
      urls: new Map(),
      createdAt: new Date(this.clock.now()),
    };
    this.jobs.set(jobId, job);
    console.log(`Job ${jobId} created for site "${job.siteKey}"`);

    return { jobId, done: this.run(job, siteConfig, hooks) };
  }

  /** False when the job is unknown or already finished. */
  cancelJob(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job || isTerminal(job.status)) return false;
    job.cancelRequested = true;
    console.log(`Job ${jobId}: cancellation requested`);
    return true;
  }

  getProgress(jobId: string): ProgressView | undefined {
    const job = this.jobs.get(jobId);
    return job ? toProgressView(job.status, job.progress) : undefined;
  }

  getJob(jobId: string): JobSnapshot | undefined {
    const job = this.jobs.get(jobId);
    return job ? this.snapshot(job) : undefined;
  }

  listJobs(): JobSnapshot[] {
    return Array.from(this.jobs.values(), (job) => this.snapshot(job));
  }

  /** Drops a finished job from memory. Running jobs are kept. */
  removeJob(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job || !isTerminal(job.status)) return false;
    return this.jobs.delete(jobId);
  }

  private snapshot(job: Job): JobSnapshot {
    return Object.freeze({
      id: job.id,
      siteKey: job.siteKey,
      status: job.status,
      progress: job.progress,
      cancelRequested: job.cancelRequested,
      error: job.error,
      log: job.log.slice(),
      urls: Array.from(job.urls.values(), (entry) => ({ ...entry })),
      createdAt: job.createdAt,
      startedAt: job.startedAt,
      completedAt: job.completedAt,
    });
  }

  private async run(job: Job, rawConfig: unknown, hooks: JobHooks): Promise<JobSnapshot> {
    let site: SiteConfig;
    try {
      site = validateSiteConfig(rawConfig);
    } catch (error) {
      await this.fail(job, hooks, error);
      return this.snapshot(job);
    }

    try {
      this.setStatus(job, "running");
      await this.callHook(job, () => hooks.onRunning?.(this.snapshot(job)));

      await this.crawl(job, site, hooks);

      if (job.cancelRequested) {
        this.setStatus(job, "cancelled");
        console.log(`Job ${job.id} cancelled`);
        await this.callHook(job, () => hooks.onCancelled?.(this.snapshot(job)));
      } else {
        this.setStatus(job, "completed");
        const { urlsVisited, recordsFound, errors, blocked } = job.progress;
        console.log(
          `Job ${job.id} completed: ${urlsVisited} pages, ${recordsFound} records, ${errors} errors, ${blocked} blocked`
        );
        await this.callHook(job, () => hooks.onCompleted?.(this.snapshot(job)));
      }
    } catch (error) {
      await this.fail(job, hooks, error);
    } finally {
      this.dedupe.forget(job.id);
    }

    return this.snapshot(job);
  }

  private async fail(job: Job, hooks: JobHooks, error: unknown): Promise<void> {
    if (isTerminal(job.status)) return;
    const message = errorMessage(error);
    job.error = message;
    this.setStatus(job, "failed");
    console.error(`Job ${job.id} failed:`, message);
    await this.callHook(job, () => hooks.onFailed?.(this.snapshot(job), message));
  }

  private setStatus(job: Job, to: JobStatus): void {
    job.status = transition(job.status, to);
    const now = new Date(this.clock.now());
    if (to === "running") job.startedAt = now;
    if (isTerminal(to)) job.completedAt = now;
  }

  private async callHook(
    job: Job,
    hook: () => void | Promise<void> | undefined
  ): Promise<void> {
    try {
      await hook();
    } catch (error) {
      console.error(`Job ${job.id}: lifecycle hook failed:`, error);
    }
  }

  private bump(job: Job, counter: keyof JobProgress, by = 1): void {
    job.progress = incrementProgress(job.progress, counter, by);
  }

  private addLog(job: Job, level: LogLevel, message: string, url?: string): void {
    appendLog(job.log, {
      level,
      message,
      url,
      timestamp: new Date(this.clock.now()).toISOString(),
    });
  }

  private trackListing(job: Job, url: string, status: ListingUrlStatus): void {
    job.urls.set(url, {
      url,
      status,
      timestamp: new Date(this.clock.now()).toISOString(),
    });
  }

  private block(job: Job, decision: Extract<RobotsDecision, { allowed: false }>, url: string): void {
    this.bump(job, "blocked");
    this.addLog(
      job,
      "warning",
      decision.reason === "unavailable"
        ? "robots.txt unavailable, domain blocked"
        : "Disallowed by robots.txt",
      url
    );
  }

  /** False when the URL was already queued or visited. */
  private enqueue(job: Job, state: CrawlState, entry: FrontierEntry): boolean {
    const key = normalizeUrl(entry.url);
    if (state.enqueued.has(key) || this.dedupe.has(job.id, entry.url)) return false;
    state.enqueued.add(key);
    state.frontier.push(entry);
    this.bump(job, "urlsEnqueued");
    return true;
  }

  private async crawl(job: Job, site: SiteConfig, hooks: JobHooks): Promise<void> {
    const state: CrawlState = {
      site,
      frontier: [],
      enqueued: new Set(),
      pagesFetched: 0,
      maxPages: site.maxPages ?? DEFAULT_MAX_PAGES,
    };
    this.enqueue(job, state, {
      url: expandSeedUrl(site.seedUrlTemplate, 1),
      page: 1,
      kind: "results",
    });

    while (state.frontier.length > 0) {
      if (job.cancelRequested) {
        console.log(
          `Job ${job.id}: cancelled with ${state.frontier.length} URL(s) still queued`
        );
        return;
      }

      const batch = state.frontier.splice(0, this.options.concurrency);
      await Promise.all(batch.map((entry) => this.visit(job, state, entry)));
      await this.callHook(job, () => hooks.onProgress?.(this.snapshot(job)));
    }
  }

  private async visit(job: Job, state: CrawlState, entry: FrontierEntry): Promise<void> {
    const { url, kind } = entry;

    if (!this.dedupe.markIfNew(job.id, url)) {
      console.log(`Job ${job.id}: skipping already visited URL ${url}`);
      return;
    }

    const decision = await this.robots.check(url);
    if (!decision.allowed) {
      this.block(job, decision, url);
      if (kind === "detail") this.trackListing(job, url, "failed");
      return;
    }

    if (kind === "results") {
      if (state.pagesFetched >= state.maxPages) {
        this.addLog(job, "info", `Page limit (${state.maxPages}) reached, skipping`, url);
        return;
      }
      state.pagesFetched++;
    }

    const fetched = await this.fetchPage(job, state, url, decision.crawlDelayMs);
    if (!fetched) {
      if (kind === "detail" && !job.cancelRequested) this.trackListing(job, url, "failed");
      return;
    }

    const { outcome } = fetched;
    if (!outcome.ok) {
      this.bump(job, "errors");
      this.addLog(job, "error", outcome.error.message, url);
      if (kind === "detail") this.trackListing(job, url, "failed");
      return;
    }

    this.bump(job, "urlsVisited");

    if (kind === "detail") {
      await this.handleDetailPage(job, state, url, fetched.url, outcome.body);
    } else {
      await this.handleResultsPage(job, state, entry, fetched.url, outcome.body);
    }
  }

  /**
   * Every request, retries and redirect hops included, takes the domain's
   * rate-limit turn. Redirect targets are vetted like any other URL. Returns
   * undefined when there is nothing to process; what happened is already
   * counted and logged.
   */
  private async fetchPage(
    job: Job,
    state: CrawlState,
    url: string,
    crawlDelayMs: number | undefined
  ): Promise<FetchedPage | undefined> {
    let target = url;
    let floorMs = crawlDelayMs;

    for (let hop = 0; ; hop++) {
      const domain = domainOf(target);
      const targetFloorMs = floorMs;

      if (job.cancelRequested) return undefined;
      await this.rateLimiter.awaitTurn(domain, targetFloorMs);
      if (job.cancelRequested) return undefined;

      console.log(`Job ${job.id}: fetching ${target}`);
      const outcome = await this.fetcher.fetch(target, {
        beforeRetry: async () => {
          if (job.cancelRequested) return false;
          await this.rateLimiter.awaitTurn(domain, targetFloorMs);
          return !job.cancelRequested;
        },
      });

      if (job.cancelRequested) {
        console.log(`Job ${job.id}: discarding result for ${target} (cancelled)`);
        return undefined;
      }

      if (!isRedirect(outcome)) return { url: target, outcome };

      const next = outcome.location;
      if (hop >= MAX_REDIRECTS) {
        this.bump(job, "errors");
        this.addLog(job, "error", `Too many redirects, last to ${next}`, url);
        return undefined;
      }
      if (!isHttpUrl(next) || !isOnDomain(next, state.site.baseDomain)) {
        this.addLog(job, "info", `Not following off-site redirect to ${next}`, url);
        return undefined;
      }
      // A redirect that only changes what normalization ignores is the same page
      if (normalizeUrl(next) !== normalizeUrl(target) && !this.dedupe.markIfNew(job.id, next)) {
        console.log(`Job ${job.id}: redirect to already visited URL ${next}`);
        return undefined;
      }

      const decision = await this.robots.check(next);
      if (!decision.allowed) {
        this.block(job, decision, next);
        return undefined;
      }
      floorMs = decision.crawlDelayMs;
      target = next;
    }
  }

  /** False when the sink threw; the failure is counted and logged. */
  private async emit(job: Job, pageUrl: string, record: ListingRecord): Promise<boolean> {
    try {
      await this.sink.emit(job.id, record);
      this.bump(job, "recordsFound");
      return true;
    } catch (error) {
      this.bump(job, "errors");
      this.addLog(
        job,
        "error",
        `Failed to store record ${record.sourceUrl}: ${errorMessage(error)}`,
        pageUrl
      );
      return false;
    }
  }

  private async handleResultsPage(
    job: Job,
    state: CrawlState,
    entry: FrontierEntry,
    pageUrl: string,
    body: string
  ): Promise<void> {
    let parsed: ParsedPage;
    try {
      parsed = parsePage(body, state.site, pageUrl);
    } catch (error) {
      this.bump(job, "errors");
      this.addLog(job, "error", `Failed to parse page: ${errorMessage(error)}`, pageUrl);
      return;
    }

    for (const error of parsed.errors) {
      this.bump(job, "errors");
      this.addLog(job, "warning", error.message, pageUrl);
    }

    for (const record of parsed.records) {
      await this.emit(job, pageUrl, record);
    }

    for (const link of parsed.listingLinks) {
      if (!isHttpUrl(link) || !isOnDomain(link, state.site.baseDomain)) {
        this.addLog(job, "info", `Not following off-site listing link ${link}`, pageUrl);
        continue;
      }
      if (this.enqueue(job, state, { url: link, page: entry.page, kind: "detail" })) {
        this.trackListing(job, link, "found");
      }
    }

    const found = parsed.records.length + parsed.listingLinks.length;
    const nextUrl =
      (state.site.paginationType ?? "html_next") === "html_next"
        ? parsed.nextUrl
        : found > 0
          ? computedPageUrl(state.site, entry.page + 1)
          : undefined;

    if (!nextUrl) return;
    if (!isHttpUrl(nextUrl) || !isOnDomain(nextUrl, state.site.baseDomain)) {
      this.addLog(job, "info", `Not following off-site page link ${nextUrl}`, pageUrl);
      return;
    }
    if (state.pagesFetched >= state.maxPages) return;
    this.enqueue(job, state, { url: nextUrl, page: entry.page + 1, kind: "results" });
  }

  private async handleDetailPage(
    job: Job,
    state: CrawlState,
    listingUrl: string,
    pageUrl: string,
    body: string
  ): Promise<void> {
    let parsed: ParsedDetailPage;
    try {
      parsed = parseDetailPage(body, state.site, pageUrl);
    } catch (error) {
      this.bump(job, "errors");
      this.addLog(job, "error", `Failed to parse listing: ${errorMessage(error)}`, pageUrl);
      this.trackListing(job, listingUrl, "failed");
      return;
    }

    for (const error of parsed.errors) {
      this.bump(job, "errors");
      this.addLog(job, "warning", error.message, pageUrl);
    }

    const stored = parsed.record ? await this.emit(job, pageUrl, parsed.record) : false;
    this.trackListing(job, listingUrl, stored ? "scraped" : "failed");
  }
}
