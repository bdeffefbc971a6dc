import { domainOf } from "./crawl.js";
import { RobotsUnavailableError } from "./errors.js";
import { requestHeaders } from "./fetcher.js";
import { systemClock } from "./time.js";
import type { Clock, FetchLike } from "./types.js";

export interface RobotsRule {
  allow: boolean;
  pattern: string;
}

export interface RobotsGroup {
  agents: string[];
  rules: RobotsRule[];
  crawlDelayMs?: number;
}

export interface ParsedRobots {
  groups: RobotsGroup[];
  sitemaps: string[];
}

export interface RobotsPolicy {
  kind: "policy";
  domain: string;
  /** Rules of the group that applies to our user agent. */
  rules: RobotsRule[];
  crawlDelayMs?: number;
  sitemaps: string[];
  fetchedAt: number;
  expiresAt: number;
}

export interface DeniedAll {
  kind: "denied";
  domain: string;
  error: RobotsUnavailableError;
  fetchedAt: number;
  expiresAt: number;
}

export type RobotsEntry = RobotsPolicy | DeniedAll;

export type RobotsDecision =
  | { allowed: true; crawlDelayMs?: number }
  | { allowed: false; reason: "disallowed" | "unavailable" };

const DIRECTIVE = /^\s*([A-Za-z-]+)\s*:\s*(.*?)\s*$/;

/**
 * Throws when the text has content but not a single directive we know
 * (typically an HTML page served at /robots.txt).
 */
export function parseRobotsTxt(robotsTxt: string): ParsedRobots {
  const groups: RobotsGroup[] = [];
  const sitemaps: string[] = [];
  let current: RobotsGroup | undefined;
  let lastWasAgent = false;
  let contentLines = 0;
  let recognized = 0;

  for (const rawLine of robotsTxt.split(/\r\n|\r|\n/)) {
    const line = rawLine.replace(/#.*$/, "").trim();
    if (!line) continue;
    contentLines++;

    const match = line.match(DIRECTIVE);
    if (!match) continue;

    const field = match[1].toLowerCase();
    const value = match[2];

    switch (field) {
      case "user-agent": {
        recognized++;
        if (!current || !lastWasAgent) {
          current = { agents: [], rules: [] };
          groups.push(current);
        }
        current.agents.push(value.toLowerCase());
        lastWasAgent = true;
        continue;
      }
      case "allow":
      case "disallow": {
        recognized++;
        lastWasAgent = false;
        // Empty Disallow means "allow everything"; an empty pattern never matches
        if (current && value) {
          current.rules.push({ allow: field === "allow", pattern: value });
        }
        continue;
      }
      case "crawl-delay": {
        recognized++;
        lastWasAgent = false;
        const seconds = Number(value);
        if (current && Number.isFinite(seconds) && seconds >= 0) {
          current.crawlDelayMs = seconds * 1000;
        }
        continue;
      }
      case "sitemap": {
        recognized++;
        if (value) sitemaps.push(value);
        continue;
      }
      default:
        lastWasAgent = false;
    }
  }

  if (contentLines > 0 && recognized === 0) {
    throw new Error("no robots.txt directives found");
  }

  return { groups, sitemaps };
}

/**
 * Product token of a User-Agent: "ListingBot/1.0 (+...)" -> "listingbot".
 */
export function productToken(userAgent: string): string {
  return userAgent.trim().split(/[\s/]/)[0].toLowerCase();
}

/**
 * Groups whose agent has our product token (compared without any `/version`)
 * or, failing that, the `*` groups. Rules of all selected groups are merged.
 */
export function selectGroup(
  robots: ParsedRobots,
  token: string
): { rules: RobotsRule[]; crawlDelayMs?: number } {
  const names = (group: RobotsGroup) => group.agents.map(productToken);

  let selected = robots.groups.filter((g) => names(g).includes(token));
  if (selected.length === 0) {
    selected = robots.groups.filter((g) => g.agents.includes("*"));
  }

  return {
    rules: selected.flatMap((g) => g.rules),
    crawlDelayMs: selected.find((g) => g.crawlDelayMs !== undefined)?.crawlDelayMs,
  };
}

function patternToRegExp(pattern: string): RegExp {
  const anchored = pattern.endsWith("$");
  const body = anchored ? pattern.slice(0, -1) : pattern;
  const source = body
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${source}${anchored ? "$" : ""}`);
}

/**
 * Longest matching pattern decides; on equal length Allow wins. No match
 * means allowed.
 */
export function isPathAllowed(rules: RobotsRule[], path: string): boolean {
  if (path === "/robots.txt") return true;

  let decision: RobotsRule | undefined;
  for (const rule of rules) {
    if (!patternToRegExp(rule.pattern).test(path)) continue;
    if (
      !decision ||
      rule.pattern.length > decision.pattern.length ||
      (rule.pattern.length === decision.pattern.length && rule.allow)
    ) {
      decision = rule;
    }
  }

  return decision?.allow ?? true;
}

export interface RobotsPolicyCacheOptions {
  userAgent: string;
  ttlMs: number;
  requestTimeoutMs: number;
  fetch?: FetchLike;
  clock?: Clock;
}

/**
 * Process-wide robots.txt cache. Concurrent lookups for one domain share a
 * single load; a failed load denies the whole domain until the entry expires.
 */
export class RobotsPolicyCache {
  private readonly entries = new Map<string, RobotsEntry>();
  private readonly loading = new Map<string, Promise<RobotsEntry>>();
  private readonly fetchImpl: FetchLike;
  private readonly clock: Clock;
  private readonly token: string;

  constructor(private readonly options: RobotsPolicyCacheOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.clock = options.clock ?? systemClock;
    this.token = productToken(options.userAgent);
  }

  resolve(domain: string): Promise<RobotsEntry> {
    const cached = this.entries.get(domain);
    if (cached && cached.expiresAt > this.clock.now()) {
      return Promise.resolve(cached);
    }

    const pending = this.loading.get(domain);
    if (pending) return pending;

    const load = this.load(domain).finally(() => {
      this.loading.delete(domain);
    });
    this.loading.set(domain, load);
    return load;
  }

  async check(url: string): Promise<RobotsDecision> {
    const parsed = new URL(url);
    const entry = await this.resolve(domainOf(url));

    if (entry.kind === "denied") {
      console.warn(`Blocking ${url}: robots.txt not loaded (fail-closed)`);
      return { allowed: false, reason: "unavailable" };
    }

    if (!isPathAllowed(entry.rules, parsed.pathname + parsed.search)) {
      console.log(`Blocked by robots.txt: ${url}`);
      return { allowed: false, reason: "disallowed" };
    }

    return { allowed: true, crawlDelayMs: entry.crawlDelayMs };
  }

  async isAllowed(url: string): Promise<boolean> {
    return (await this.check(url)).allowed;
  }

  peek(domain: string): RobotsEntry | undefined {
    return this.entries.get(domain);
  }

  private async load(domain: string): Promise<RobotsEntry> {
    const robotsUrl = `https://${domain}/robots.txt`;
    const fetchedAt = this.clock.now();
    const expiresAt = fetchedAt + this.options.ttlMs;
    let entry: RobotsEntry;

    try {
      const response = await this.fetchImpl(robotsUrl, {
        method: "GET",
        redirect: "follow",
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
        headers: { ...requestHeaders(this.options.userAgent), Accept: "text/plain,*/*;q=0.8" },
      });
      if (!response.ok) {
        await response.body?.cancel().catch(() => undefined);
        throw new Error(`HTTP ${response.status}`);
      }

      const robots = parseRobotsTxt(await response.text());
      const group = selectGroup(robots, this.token);
      entry = {
        kind: "policy",
        domain,
        rules: group.rules,
        crawlDelayMs: group.crawlDelayMs,
        sitemaps: robots.sitemaps,
        fetchedAt,
        expiresAt,
      };
      console.log(`Loaded robots.txt from ${robotsUrl}`);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      entry = {
        kind: "denied",
        domain,
        error: new RobotsUnavailableError(domain, reason),
        fetchedAt,
        expiresAt,
      };
      console.warn(
        `Failed to load ${robotsUrl}: ${reason}. Blocking all requests to ${domain} (fail-closed)`
      );
    }

    this.entries.set(domain, entry);
    return entry;
  }
}
