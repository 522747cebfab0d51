import { createHash } from "node:crypto";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { eq } from "drizzle-orm";
import { z } from "zod";
import { CacheEntry, CacheValidator } from "../core/types.js";
import { FeedError, errorMessage } from "../core/errors.js";
import { getDb, schema } from "../db/index.js";
import { logger } from "../logger.js";

const log = logger.child({ module: "cache" });

export interface CacheStore {
  get(url: string): Promise<CacheEntry | null>;
  put(entry: CacheEntry): Promise<void>;
}

export function isFresh(entry: CacheEntry, now: Date, ttlMs: number): boolean {
  const fetchedAt = new Date(entry.fetchedAt).getTime();
  if (Number.isNaN(fetchedAt)) return false;
  return now.getTime() - fetchedAt < ttlMs;
}

export function hashPayload(payload: Buffer): string {
  return createHash("sha256").update(payload).digest("hex");
}

function urlKey(url: string): string {
  return createHash("sha256").update(url).digest("hex");
}

// ── Serialized record (file and Postgres share it) ───────────────

interface CacheRecord {
  url: string;
  fetchedAt: string;
  validator: CacheValidator | null;
  rawPayload: string;
  payloadHash: string | null;
}

export function entryToRecord(entry: CacheEntry): CacheRecord {
  return {
    url: entry.url,
    fetchedAt: entry.fetchedAt,
    validator: entry.validator ?? null,
    rawPayload: entry.rawPayload.toString("base64"),
    payloadHash: entry.payloadHash ?? hashPayload(entry.rawPayload),
  };
}

const CacheRecordSchema = z.object({
  url: z.string(),
  fetchedAt: z.string().refine((v) => !Number.isNaN(new Date(v).getTime())),
  validator: z
    .object({ etag: z.string().optional(), lastModified: z.string().optional() })
    .nullish()
    .catch(undefined),
  rawPayload: z.string(),
  payloadHash: z.string().nullish(),
});

/** Returns null for anything that is not a well-formed record. */
export function recordToEntry(value: unknown): CacheEntry | null {
  const parsed = CacheRecordSchema.safeParse(value);
  if (!parsed.success) return null;
  const r = parsed.data;

  const rawPayload = Buffer.from(r.rawPayload, "base64");
  const payloadHash = r.payloadHash ?? undefined;
  if (payloadHash && payloadHash !== hashPayload(rawPayload)) return null;

  return {
    url: r.url,
    fetchedAt: r.fetchedAt,
    validator: r.validator ?? undefined,
    rawPayload,
    payloadHash,
  };
}

// ── File store: one JSON record per URL ──────────────────────────

export class FileCacheStore implements CacheStore {
  private dir: string;

  constructor(cacheDir: string) {
    this.dir = join(cacheDir, "feeds");
  }

  pathFor(url: string): string {
    return join(this.dir, `${urlKey(url)}.json`);
  }

  async get(url: string): Promise<CacheEntry | null> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(url), "utf-8");
    } catch (err) {
      if (!isNotFound(err)) log.debug({ url, err: errorMessage(err) }, "cache read failed, treating as miss");
      return null;
    }
    try {
      const entry = recordToEntry(JSON.parse(raw));
      if (!entry || entry.url !== url) {
        log.debug({ url }, "cache record unusable, treating as miss");
        return null;
      }
      return entry;
    } catch (err) {
      log.debug({ url, err: errorMessage(err) }, "cache record corrupt, treating as miss");
      return null;
    }
  }

  async put(entry: CacheEntry): Promise<void> {
    const target = this.pathFor(entry.url);
    const tmp = `${target}.${process.pid}.tmp`;
    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(tmp, JSON.stringify(entryToRecord(entry)));
      await rename(tmp, target);
    } catch (err) {
      throw new FeedError("CacheIOError", `Failed to write cache for ${entry.url}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

// ── In-memory store (tests, ephemeral runs) ──────────────────────

export class InMemoryCacheStore implements CacheStore {
  private entries = new Map<string, CacheEntry>();

  async get(url: string): Promise<CacheEntry | null> {
    const entry = this.entries.get(url);
    return entry ? { ...entry, rawPayload: Buffer.from(entry.rawPayload) } : null;
  }

  async put(entry: CacheEntry): Promise<void> {
    this.entries.set(entry.url, { ...entry, rawPayload: Buffer.from(entry.rawPayload) });
  }

  size(): number {
    return this.entries.size;
  }
}

// ── PostgreSQL store: one row per URL ────────────────────────────

export class PgCacheStore implements CacheStore {
  constructor(private connectionString?: string) {}

  async get(url: string): Promise<CacheEntry | null> {
    try {
      const db = getDb(this.connectionString);
      const [row] = await db
        .select()
        .from(schema.feedCache)
        .where(eq(schema.feedCache.url, url))
        .limit(1);
      return row ? rowToEntry(row) : null;
    } catch (err) {
      log.debug({ url, err: errorMessage(err) }, "cache read failed, treating as miss");
      return null;
    }
  }

  async put(entry: CacheEntry): Promise<void> {
    const record = entryToRecord(entry);
    const values = {
      url: record.url,
      fetchedAt: new Date(record.fetchedAt),
      validator: record.validator,
      rawPayload: record.rawPayload,
      payloadHash: record.payloadHash,
    };
    try {
      const db = getDb(this.connectionString);
      await db
        .insert(schema.feedCache)
        .values(values)
        .onConflictDoUpdate({
          target: schema.feedCache.url,
          set: {
            fetchedAt: values.fetchedAt,
            validator: values.validator,
            rawPayload: values.rawPayload,
            payloadHash: values.payloadHash,
          },
        });
    } catch (err) {
      throw new FeedError("CacheIOError", `Failed to write cache for ${entry.url}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}

export function rowToEntry(row: typeof schema.feedCache.$inferSelect): CacheEntry | null {
  return recordToEntry({
    url: row.url,
    fetchedAt: row.fetchedAt.toISOString(),
    validator: row.validator ?? undefined,
    rawPayload: row.rawPayload,
    payloadHash: row.payloadHash ?? undefined,
  });
}
