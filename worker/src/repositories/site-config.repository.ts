import { eq } from "drizzle-orm";
import { db } from "../db/index.js";
import { siteConfigs, type SiteConfigRow } from "../db/schema.js";
import type { SiteConfig, SiteConfigProvider } from "../lib/types.js";

export async function findSiteConfigByKey(
  key: string
): Promise<SiteConfigRow | undefined> {
  const [row] = await db
    .select()
    .from(siteConfigs)
    .where(eq(siteConfigs.key, key))
    .limit(1);
  return row;
}

export function toSiteConfig(row: SiteConfigRow): SiteConfig {
  return {
    key: row.key,
    baseDomain: row.baseDomain,
    seedUrlTemplate: row.seedUrlTemplate,
    listingSelector: row.listingSelector,
    fields: row.fields,
    paginationSelector: row.paginationSelector ?? undefined,
    listingLinkSelector: row.listingLinkSelector ?? undefined,
    paginationType: row.paginationType ?? undefined,
    paginationParam: row.paginationParam ?? undefined,
    maxPages: row.maxPages ?? undefined,
    linkPattern: row.linkPattern ?? undefined,
    active: row.active,
  };
}

export const siteConfigProvider: SiteConfigProvider = {
  async get(siteKey) {
    const row = await findSiteConfigByKey(siteKey);
    return row ? toSiteConfig(row) : undefined;
  },
};
