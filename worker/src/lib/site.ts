import * as cheerio from "cheerio";
import { expandSeedUrl, isHttpUrl } from "./crawl.js";
import { JobConfigInvalidError } from "./errors.js";
import type { FieldSelector, PaginationType, SiteConfig } from "./types.js";

export const DEFAULT_MAX_PAGES = 10;
export const MAX_PAGES_LIMIT = 100;

const PAGINATION_TYPES: readonly PaginationType[] = [
  "html_next",
  "query_param",
  "incremental_path",
  "template",
];

const emptyDocument = cheerio.load("");

/** Selectors are compiled when first used; a bad one throws there. */
function isValidSelector(selector: string): boolean {
  try {
    emptyDocument(selector);
    return true;
  } catch {
    return false;
  }
}

function checkSelector(label: string, selector: string | undefined, problems: string[]): void {
  if (selector && selector.trim() && !isValidSelector(selector)) {
    problems.push(`${label} is not a valid CSS selector`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPaginationType(value: unknown): value is PaginationType {
  return typeof value === "string" && (PAGINATION_TYPES as readonly string[]).includes(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value : undefined;
}

function readFields(value: unknown, problems: string[]): Record<string, FieldSelector> {
  const fields: Record<string, FieldSelector> = {};
  if (!isRecord(value) || Object.keys(value).length === 0) {
    problems.push("fields must map at least one field name to a selector");
    return fields;
  }

  for (const [name, raw] of Object.entries(value)) {
    // Shorthand: "price": ".price"
    if (typeof raw === "string") {
      checkSelector(`fields.${name}.selector`, raw, problems);
      fields[name] = { selector: raw };
      continue;
    }
    if (!isRecord(raw) || typeof raw.selector !== "string") {
      problems.push(`fields.${name}.selector must be a string`);
      continue;
    }
    checkSelector(`fields.${name}.selector`, raw.selector, problems);
    fields[name] = {
      selector: raw.selector,
      attribute: optionalString(raw.attribute),
      required: raw.required === true,
    };
  }

  return fields;
}

/**
 * Checks a site config coming from storage before a job may use it.
 * Collects every problem instead of stopping at the first one.
 */
export function validateSiteConfig(input: unknown): SiteConfig {
  const problems: string[] = [];

  if (!isRecord(input)) {
    throw new JobConfigInvalidError(["site config is missing"]);
  }

  const key = optionalString(input.key);
  if (!key) problems.push("key is required");

  const baseDomain = optionalString(input.baseDomain);
  if (!baseDomain) problems.push("baseDomain is required");

  const seedUrlTemplate = optionalString(input.seedUrlTemplate);
  if (!seedUrlTemplate) {
    problems.push("seedUrlTemplate is required");
  } else if (!isHttpUrl(expandSeedUrl(seedUrlTemplate, 1))) {
    problems.push("seedUrlTemplate must expand to an http(s) URL");
  }

  const listingSelector = optionalString(input.listingSelector);
  if (!listingSelector) problems.push("listingSelector is required");
  checkSelector("listingSelector", listingSelector, problems);

  const listingLinkSelector = optionalString(input.listingLinkSelector);
  checkSelector("listingLinkSelector", listingLinkSelector, problems);

  const fields = readFields(input.fields, problems);

  const paginationSelector = optionalString(input.paginationSelector);
  checkSelector("paginationSelector", paginationSelector, problems);

  let paginationType: PaginationType = "html_next";
  const rawPagination = input.paginationType;
  if (rawPagination !== undefined && rawPagination !== null) {
    if (isPaginationType(rawPagination)) {
      paginationType = rawPagination;
    } else {
      problems.push(`paginationType must be one of ${PAGINATION_TYPES.join(", ")}`);
    }
  }

  const paginationParam = optionalString(input.paginationParam);
  if (paginationType === "query_param" && !paginationParam) {
    problems.push("paginationParam is required for query_param pagination");
  }
  if (
    paginationType === "template" &&
    seedUrlTemplate &&
    !seedUrlTemplate.includes("{page}")
  ) {
    problems.push("seedUrlTemplate must contain {page} for template pagination");
  }

  let maxPages = DEFAULT_MAX_PAGES;
  const rawMaxPages = input.maxPages;
  if (rawMaxPages !== undefined && rawMaxPages !== null) {
    if (
      typeof rawMaxPages === "number" &&
      Number.isInteger(rawMaxPages) &&
      rawMaxPages >= 1 &&
      rawMaxPages <= MAX_PAGES_LIMIT
    ) {
      maxPages = rawMaxPages;
    } else {
      problems.push(`maxPages must be an integer between 1 and ${MAX_PAGES_LIMIT}`);
    }
  }

  const linkPattern = optionalString(input.linkPattern);
  if (linkPattern) {
    try {
      new RegExp(linkPattern);
    } catch {
      problems.push("linkPattern is not a valid regular expression");
    }
  }

  const active = input.active !== false;
  if (!active) problems.push(`site "${key ?? "?"}" is not active`);

  if (
    problems.length > 0 ||
    !key ||
    !baseDomain ||
    !seedUrlTemplate ||
    !listingSelector
  ) {
    throw new JobConfigInvalidError(problems);
  }

  return {
    key,
    baseDomain,
    seedUrlTemplate,
    listingSelector,
    fields,
    paginationSelector,
    paginationType,
    paginationParam,
    maxPages,
    listingLinkSelector,
    linkPattern,
    active,
  };
}
