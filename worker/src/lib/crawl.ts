import type { SiteConfig } from "./types.js";

const TRACKING_PARAMS = new Set(["gclid", "fbclid", "msclkid"]);

function isTrackingParam(key: string): boolean {
  const lower = key.toLowerCase();
  return lower.startsWith("utm_") || TRACKING_PARAMS.has(lower);
}

/**
 * Canonical form used for per-job dedupe.
 *
 * - Lowercase scheme and host, default port dropped (WHATWG URL does both)
 * - Fragment dropped
 * - Tracking params dropped, remaining params sorted by key
 * - Trailing slash dropped, except for the root path
 *
 * Strings that do not parse as URLs are returned trimmed.
 */
export function normalizeUrl(raw: string): string {
  const trimmed = raw.trim();

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    return trimmed;
  }

  parsed.hash = "";

  if (parsed.search !== "") {
    for (const key of Array.from(parsed.searchParams.keys())) {
      if (isTrackingParam(key)) {
        parsed.searchParams.delete(key);
      }
    }
    parsed.searchParams.sort();
    if (parsed.searchParams.toString() === "") parsed.search = "";
  }

  if (parsed.pathname !== "/" && parsed.pathname.endsWith("/")) {
    parsed.pathname = parsed.pathname.replace(/\/+$/, "") || "/";
  }

  return parsed.href;
}

/**
 * Sharing key for robots policy and rate limiting: the URL's host (with port
 * when it is not the default one).
 */
export function domainOf(url: string): string {
  return new URL(url).host.toLowerCase();
}

export function isHttpUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === "http:" || parsed.protocol === "https:";
  } catch {
    return false;
  }
}

/** Exact host match or a subdomain of `baseDomain`. */
export function isOnDomain(url: string, baseDomain: string): boolean {
  let hostname: string;
  try {
    hostname = new URL(url).hostname.toLowerCase();
  } catch {
    return false;
  }
  const base = baseDomain.toLowerCase().replace(/^\.+/, "");
  return hostname === base || hostname.endsWith(`.${base}`);
}

export function expandSeedUrl(template: string, page: number): string {
  return template.replaceAll("{page}", String(page));
}

/**
 * URL of results page `page` (1-based) for sites whose pagination is computed
 * rather than linked. Returns undefined for `html_next`.
 */
export function computedPageUrl(
  site: Pick<SiteConfig, "seedUrlTemplate" | "paginationType" | "paginationParam">,
  page: number
): string | undefined {
  const seed = expandSeedUrl(site.seedUrlTemplate, 1);

  switch (site.paginationType ?? "html_next") {
    case "html_next":
      return undefined;
    case "template":
      return expandSeedUrl(site.seedUrlTemplate, page);
    case "incremental_path": {
      const url = new URL(seed);
      url.pathname = `${url.pathname.replace(/\/+$/, "")}/${page}`;
      return url.href;
    }
    case "query_param": {
      if (!site.paginationParam) return undefined;
      const url = new URL(seed);
      url.searchParams.set(site.paginationParam, String(page));
      return url.href;
    }
  }
}
