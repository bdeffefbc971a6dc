import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { ParseFieldMissingError } from "./errors.js";
import type { FieldSelector, ListingRecord, SiteConfig } from "./types.js";

export interface ParsedPage {
  records: ListingRecord[];
  /** Detail page URLs, for sites with a `listingLinkSelector`. */
  listingLinks: string[];
  nextUrl?: string;
  /** One entry per listing skipped for a missing required field. */
  errors: ParseFieldMissingError[];
}

export interface ParsedDetailPage {
  record?: ListingRecord;
  errors: ParseFieldMissingError[];
}

type ParserSite = Pick<
  SiteConfig,
  | "key"
  | "listingSelector"
  | "fields"
  | "paginationSelector"
  | "listingLinkSelector"
  | "linkPattern"
>;

const NAMED_FIELDS = ["title", "price", "address", "description"] as const;
type NamedField = (typeof NAMED_FIELDS)[number];

function isNamedField(name: string): name is NamedField {
  return (NAMED_FIELDS as readonly string[]).includes(name);
}

const URL_ATTRIBUTES = new Set(["href", "src", "data-src", "data-href"]);

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function resolveUrl(value: string, base: string): string {
  try {
    return new URL(value, base).href;
  } catch {
    return value;
  }
}

/**
 * One record per element matching `scopeSelector`. `sourceUrl` is `stableUrl`
 * when given, else the `url` field, else a positional URL.
 */
function extractRecords(
  $: CheerioAPI,
  scopeSelector: string,
  site: ParserSite,
  pageUrl: string,
  stableUrl?: string
): Pick<ParsedPage, "records" | "errors"> {
  const records: ListingRecord[] = [];
  const errors: ParseFieldMissingError[] = [];
  const linkPattern = site.linkPattern ? new RegExp(site.linkPattern) : undefined;

  $(scopeSelector).each((index, element) => {
    const $item = $(element);

    const read = (name: string, field: FieldSelector): string | undefined => {
      const target = field.selector.trim()
        ? $item.find(field.selector).first()
        : $item;
      if (target.length === 0) return undefined;

      const raw = field.attribute ? target.attr(field.attribute) : target.text();
      const value = raw === undefined ? "" : collapse(raw);
      if (!value) return undefined;

      const isUrl =
        name === "url" ||
        (field.attribute !== undefined && URL_ATTRIBUTES.has(field.attribute));
      return isUrl ? resolveUrl(value, pageUrl) : value;
    };

    const values: Record<string, string> = {};
    for (const [name, field] of Object.entries(site.fields)) {
      const value = read(name, field);
      if (value === undefined) {
        if (field.required) {
          errors.push(new ParseFieldMissingError(name, index));
          return;
        }
        continue;
      }
      values[name] = value;
    }

    if (
      !stableUrl &&
      linkPattern &&
      values.url !== undefined &&
      !linkPattern.test(values.url)
    ) {
      return;
    }

    const sourceUrl = stableUrl ?? values.url;
    const record: ListingRecord = {
      siteKey: site.key,
      pageUrl,
      sourceUrl: sourceUrl ?? `${pageUrl}#listing-${index}`,
      attributes: {},
    };
    if (sourceUrl === undefined) record.positional = true;

    for (const [name, value] of Object.entries(values)) {
      if (name === "url") continue;
      if (isNamedField(name)) record[name] = value;
      else record.attributes[name] = value;
    }
    records.push(record);
  });

  return { records, errors };
}

function extractListingLinks(
  $: CheerioAPI,
  site: ParserSite,
  linkSelector: string,
  pageUrl: string
): string[] {
  const linkPattern = site.linkPattern ? new RegExp(site.linkPattern) : undefined;
  const links: string[] = [];

  $(site.listingSelector).each((_index, element) => {
    for (const anchor of $(element).find(linkSelector).toArray()) {
      const href = $(anchor).attr("href")?.trim();
      if (!href) continue;
      const url = resolveUrl(href, pageUrl);
      if (linkPattern && !linkPattern.test(url)) continue;
      if (!links.includes(url)) links.push(url);
    }
  });

  return links;
}

/**
 * Applies a site's selectors to one results page. Pure: no I/O, no state.
 *
 * A field's selector is evaluated inside the listing element; an empty
 * selector reads the listing element itself. Sites with a
 * `listingLinkSelector` get listing links instead of records.
 */
export function parsePage(
  html: string,
  site: ParserSite,
  pageUrl: string
): ParsedPage {
  const $ = cheerio.load(html);

  let records: ListingRecord[] = [];
  let errors: ParseFieldMissingError[] = [];
  let listingLinks: string[] = [];

  if (site.listingLinkSelector) {
    listingLinks = extractListingLinks($, site, site.listingLinkSelector, pageUrl);
  } else {
    ({ records, errors } = extractRecords($, site.listingSelector, site, pageUrl));
  }

  let nextUrl: string | undefined;
  if (site.paginationSelector) {
    for (const element of $(site.paginationSelector).toArray()) {
      const href = $(element).attr("href")?.trim();
      if (href) {
        nextUrl = resolveUrl(href, pageUrl);
        break;
      }
    }
  }

  return { records, listingLinks, nextUrl, errors };
}

/** Reads `fields` from a whole listing detail page; `sourceUrl` is the page. */
export function parseDetailPage(
  html: string,
  site: ParserSite,
  pageUrl: string
): ParsedDetailPage {
  const $ = cheerio.load(html);
  const { records, errors } = extractRecords($, "body", site, pageUrl, pageUrl);
  return { record: records[0], errors };
}
