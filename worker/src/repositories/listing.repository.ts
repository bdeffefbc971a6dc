import { db } from "../db/index.js";
import { listings, type Listing } from "../db/schema.js";
import type { ListingRecord, RecordSink } from "../lib/types.js";

/**
 * Insert or refresh a listing. `source_url` identifies a listing across jobs.
 */
export async function upsertListing(
  jobId: string,
  record: ListingRecord
): Promise<Listing> {
  const values = {
    jobId,
    siteKey: record.siteKey,
    sourceUrl: record.sourceUrl,
    pageUrl: record.pageUrl,
    title: record.title ?? null,
    price: record.price ?? null,
    address: record.address ?? null,
    description: record.description ?? null,
    attributes: record.attributes,
  };

  const [listing] = await db
    .insert(listings)
    .values(values)
    .onConflictDoUpdate({
      target: listings.sourceUrl,
      set: { ...values, scrapedAt: new Date() },
    })
    .returning();
  return listing;
}

/**
 * Records without a URL of their own are not stored: the positional URL they
 * carry is not a stable key across jobs.
 */
export function createListingSink(
  store: (jobId: string, record: ListingRecord) => Promise<unknown> = upsertListing
): RecordSink {
  return {
    async emit(jobId, record) {
      if (record.positional) {
        console.warn(
          `Job ${jobId}: not storing ${record.sourceUrl}, the listing has no URL field`
        );
        return;
      }
      await store(jobId, record);
    },
  };
}

export const listingSink = createListingSink();
