import { RssFeedAdapter } from "./adapters/rss.js";
import { FeedService } from "./core/feed-service.js";
import { FetchScheduler } from "./core/fetch-scheduler.js";
import { FeedTransport, HttpFeedTransport } from "./core/transport.js";
import { CacheStore, FileCacheStore, PgCacheStore } from "./stores/cache-store.js";
import { ensureSchema } from "./db/index.js";
import { Settings, loadFeeds } from "./config.js";
import { errorMessage } from "./core/errors.js";
import { logger } from "./logger.js";

export const VERSION = "1.0.0";

export interface AppOverrides {
  transport?: FeedTransport;
  cache?: CacheStore;
  /** Prepares the Postgres cache table; defaults to `ensureSchema`. */
  prepareDb?: (connectionString: string) => Promise<void>;
}

const log = logger.child({ module: "app" });

export interface App {
  settings: Settings;
  cache: CacheStore;
  feedService: FeedService;
}

/** Postgres when configured and reachable, otherwise the file cache. */
async function openCache(
  settings: Settings,
  prepareDb: (connectionString: string) => Promise<void>,
): Promise<CacheStore> {
  if (!settings.databaseUrl) return new FileCacheStore(settings.cacheDir);
  try {
    await prepareDb(settings.databaseUrl);
    return new PgCacheStore(settings.databaseUrl);
  } catch (err) {
    log.warn({ err: errorMessage(err), cacheDir: settings.cacheDir }, "Postgres cache unavailable, using file cache");
    return new FileCacheStore(settings.cacheDir);
  }
}

export async function createApp(settings: Settings, overrides: AppOverrides = {}): Promise<App> {
  const cache = overrides.cache ?? (await openCache(settings, overrides.prepareDb ?? ensureSchema));

  const transport = overrides.transport ?? new HttpFeedTransport({ userAgent: `tidefeed/${VERSION}` });
  const scheduler = new FetchScheduler(transport, cache, new RssFeedAdapter(), {
    concurrency: settings.concurrency,
    fetchTimeoutMs: settings.fetchTimeoutMs,
    runTimeoutMs: settings.runTimeoutMs,
    cacheTtlMs: settings.cacheTtlMs,
    retries: settings.retries,
    retryDelayMs: settings.retryDelayMs,
  });
  const feedService = new FeedService(
    scheduler,
    async () => (await loadFeeds(settings.feedListPaths)).feeds,
    { maxItemAgeHours: settings.maxItemAgeHours },
  );

  return { settings, cache, feedService };
}
