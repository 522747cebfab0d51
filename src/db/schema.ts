import { pgTable, text, timestamp, jsonb, index } from "drizzle-orm/pg-core";

// ── Feed cache (one row per feed URL) ────────────────────────────

export const feedCache = pgTable(
  "feed_cache",
  {
    url: text("url").primaryKey(),
    fetchedAt: timestamp("fetched_at", { withTimezone: true }).notNull(),
    validator: jsonb("validator").$type<{ etag?: string; lastModified?: string } | null>(),
    // base64, same encoding as the file store
    rawPayload: text("raw_payload").notNull(),
    payloadHash: text("payload_hash"),
  },
  (t) => [index("feed_cache_fetched_at_idx").on(t.fetchedAt)],
);
