import { FetchScheduler } from "./fetch-scheduler.js";
import { merge } from "./merger.js";
import { ConfigError } from "./errors.js";
import { FeedItem, FeedRunError, FeedRunRecord, FeedSpec, TimelineResult } from "./types.js";
import { logger } from "../logger.js";

const log = logger.child({ module: "feed-service" });

export interface TimelineQuery {
  limit?: number;
  /** Case-insensitive match on feed name or url. */
  source?: string;
}

export interface FeedServiceOptions {
  maxItemAgeHours?: number;
  now?: () => Date;
}

function collectErrors(records: FeedRunRecord[]): FeedRunError[] {
  const errors: FeedRunError[] = [];
  for (const record of records) {
    const { spec, outcome } = record;
    const failure = outcome.error;
    if (failure) {
      errors.push({ name: spec.name, url: spec.url, ...failure, usedCache: outcome.ok });
    }
    if (record.cacheError) {
      errors.push({ name: spec.name, url: spec.url, ...record.cacheError, usedCache: false });
    }
  }
  return errors;
}

/** Stale items are a failed feed's last-known state and always pass. */
export function filterByAge(items: FeedItem[], now: Date, maxAgeHours: number): FeedItem[] {
  if (maxAgeHours <= 0) return items;
  const cutoff = now.getTime() - maxAgeHours * 3600_000;
  return items.filter((item) => item.stale || new Date(item.publishedAt).getTime() >= cutoff);
}

export class FeedService {
  private maxItemAgeHours: number;
  private now: () => Date;

  constructor(
    private scheduler: FetchScheduler,
    private loadFeeds: () => Promise<FeedSpec[]>,
    options: FeedServiceOptions = {},
  ) {
    this.maxItemAgeHours = options.maxItemAgeHours ?? 24;
    this.now = options.now ?? (() => new Date());
  }

  async listFeeds(): Promise<FeedSpec[]> {
    return this.loadFeeds();
  }

  // ── Timeline ─────────────────────────────────────────────────

  async getTimeline(query: TimelineQuery = {}): Promise<TimelineResult> {
    let feeds = await this.loadFeeds();
    if (feeds.length === 0) {
      throw new ConfigError("No feeds configured");
    }

    if (query.source) {
      const needle = query.source.toLowerCase();
      feeds = feeds.filter(
        (f) => f.name.toLowerCase().includes(needle) || f.url.toLowerCase().includes(needle),
      );
      if (feeds.length === 0) {
        throw new ConfigError(`No configured feed matches "${query.source}"`);
      }
    }

    const startedAt = this.now();
    const t0 = Date.now();
    const records = await this.scheduler.run(feeds);
    const merged = merge(records.map((r) => [r.spec, r.outcome] as const));
    let items = filterByAge(merged, startedAt, this.maxItemAgeHours);
    if (query.limit !== undefined) items = items.slice(0, Math.max(query.limit, 0));

    const errors = collectErrors(records);
    const durationMs = Date.now() - t0;
    log.info(
      { feeds: records.length, items: items.length, errors: errors.length, durationMs },
      "timeline ready",
    );

    return { items, errors, records, startedAt: startedAt.toISOString(), durationMs };
  }
}
