import {
  pgSchema,
  uuid,
  text,
  timestamp,
  jsonb,
  boolean,
  integer,
} from "drizzle-orm/pg-core";
import type { JobProgress, JobLogEntry, JobUrlEntry } from "../job.js";
import type { JobStatus } from "../lib/state.js";
import type { FieldSelector, PaginationType, ScraperOptions } from "../lib/types.js";

export const workerSchema = pgSchema("worker");

export type { JobStatus };

export const jobs = workerSchema.table("jobs", {
  id: uuid("id").primaryKey().defaultRandom(),
  siteKey: text("site_key").notNull(),
  status: text("status").$type<JobStatus>().notNull().default("pending"),
  options: jsonb("options").$type<ScraperOptions>().notNull(),
  progress: jsonb("progress").$type<JobProgress>(),
  log: jsonb("log").$type<JobLogEntry[]>(),
  urls: jsonb("urls").$type<JobUrlEntry[]>(),
  error: text("error"),
  createdAt: timestamp("created_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
  startedAt: timestamp("started_at", { withTimezone: true }),
  completedAt: timestamp("completed_at", { withTimezone: true }),
});

export const siteConfigs = workerSchema.table("site_configs", {
  key: text("key").primaryKey(),
  baseDomain: text("base_domain").notNull(),
  seedUrlTemplate: text("seed_url_template").notNull(),
  listingSelector: text("listing_selector").notNull(),
  fields: jsonb("fields").$type<Record<string, FieldSelector>>().notNull(),
  paginationSelector: text("pagination_selector"),
  listingLinkSelector: text("listing_link_selector"),
  paginationType: text("pagination_type").$type<PaginationType>(),
  paginationParam: text("pagination_param"),
  maxPages: integer("max_pages"),
  linkPattern: text("link_pattern"),
  active: boolean("active").notNull().default(true),
  updatedAt: timestamp("updated_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});

export const listings = workerSchema.table("listings", {
  id: uuid("id").primaryKey().defaultRandom(),
  jobId: uuid("job_id").notNull(),
  siteKey: text("site_key").notNull(),
  sourceUrl: text("source_url").notNull().unique(),
  pageUrl: text("page_url").notNull(),
  title: text("title"),
  price: text("price"),
  address: text("address"),
  description: text("description"),
  attributes: jsonb("attributes").$type<Record<string, string>>().notNull(),
  scrapedAt: timestamp("scraped_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});

export type Job = typeof jobs.$inferSelect;
export type NewJob = typeof jobs.$inferInsert;
export type SiteConfigRow = typeof siteConfigs.$inferSelect;
export type Listing = typeof listings.$inferSelect;
export type NewListing = typeof listings.$inferInsert;
