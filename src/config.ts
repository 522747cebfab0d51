import { existsSync } from "node:fs";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import { FeedSpec } from "./core/types.js";
import { ConfigError, errorMessage } from "./core/errors.js";
import { logger } from "./logger.js";

const log = logger.child({ module: "config" });

// ── Settings (environment) ───────────────────────────────────────

const SettingsSchema = z.object({
  TIDEFEED_CONFIG: z.string().optional(),
  TIDEFEED_CACHE_DIR: z.string().optional(),
  TIDEFEED_CACHE_TTL_MINUTES: z.coerce.number().positive().default(15),
  TIDEFEED_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(8),
  TIDEFEED_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  TIDEFEED_RUN_TIMEOUT_MS: z.coerce.number().int().positive().default(45_000),
  TIDEFEED_RETRIES: z.coerce.number().int().min(0).max(5).default(1),
  TIDEFEED_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  TIDEFEED_MAX_ITEM_AGE_HOURS: z.coerce.number().min(0).default(24),
  DATABASE_URL: z.string().optional(),
});

export interface Settings {
  /** Candidate feed-list files, first existing one wins. */
  feedListPaths: string[];
  cacheDir: string;
  cacheTtlMs: number;
  concurrency: number;
  fetchTimeoutMs: number;
  runTimeoutMs: number;
  retries: number;
  retryDelayMs: number;
  /** 0 keeps items of any age. */
  maxItemAgeHours: number;
  databaseUrl?: string;
}

export function defaultConfigPath(): string {
  return join(homedir(), ".config", "tidefeed", "config.json");
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = SettingsSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid settings: ${issues}`);
  }
  const e = parsed.data;
  return {
    feedListPaths: e.TIDEFEED_CONFIG
      ? [resolve(e.TIDEFEED_CONFIG)]
      : [defaultConfigPath(), resolve("config.json")],
    cacheDir: resolve(e.TIDEFEED_CACHE_DIR ?? join(homedir(), ".cache", "tidefeed")),
    cacheTtlMs: e.TIDEFEED_CACHE_TTL_MINUTES * 60_000,
    concurrency: e.TIDEFEED_CONCURRENCY,
    fetchTimeoutMs: e.TIDEFEED_FETCH_TIMEOUT_MS,
    runTimeoutMs: e.TIDEFEED_RUN_TIMEOUT_MS,
    retries: e.TIDEFEED_RETRIES,
    retryDelayMs: e.TIDEFEED_RETRY_DELAY_MS,
    maxItemAgeHours: e.TIDEFEED_MAX_ITEM_AGE_HOURS,
    databaseUrl: e.DATABASE_URL || undefined,
  };
}

// ── Feed list document ───────────────────────────────────────────

const FeedEntrySchema = z.object({
  name: z.string().trim().optional(),
  url: z.string().trim().url(),
});

const FeedsDocumentSchema = z.object({
  feeds: z.array(z.unknown()).default([]),
});

/** Drops entries without a usable url; a missing name falls back to the url. */
export function parseFeedsDocument(doc: unknown): FeedSpec[] {
  const parsed = FeedsDocumentSchema.safeParse(doc);
  if (!parsed.success) {
    throw new ConfigError("Feed list must be an object with a \"feeds\" array");
  }

  const specs: FeedSpec[] = [];
  parsed.data.feeds.forEach((raw, index) => {
    const entry = FeedEntrySchema.safeParse(raw);
    if (!entry.success) {
      log.warn({ index, issue: entry.error.issues[0]?.message }, "dropping malformed feed entry");
      return;
    }
    specs.push({ name: entry.data.name || entry.data.url, url: entry.data.url });
  });
  return mergeFeedSpecs([], specs);
}

export function findFeedList(paths: string[]): string | null {
  return paths.find((p) => existsSync(p)) ?? null;
}

export async function loadFeeds(paths: string[]): Promise<{ path: string; feeds: FeedSpec[] }> {
  const path = findFeedList(paths);
  if (!path) {
    throw new ConfigError(`No feed list found (looked in ${paths.join(", ")})`);
  }
  let doc: unknown;
  try {
    doc = JSON.parse(await readFile(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Cannot read feed list ${path}: ${errorMessage(err)}`);
  }
  return { path, feeds: parseFeedsDocument(doc) };
}

export async function saveFeeds(path: string, feeds: FeedSpec[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = path + ".tmp";
  await writeFile(tmp, JSON.stringify({ feeds }, null, 2) + "\n", "utf-8");
  await rename(tmp, path);
}

/** Url-keyed union: existing entries win and keep their order, new urls are appended. */
export function mergeFeedSpecs(existing: FeedSpec[], incoming: FeedSpec[]): FeedSpec[] {
  const byUrl = new Map<string, FeedSpec>();
  for (const spec of [...existing, ...incoming]) {
    if (!byUrl.has(spec.url)) byUrl.set(spec.url, spec);
  }
  return [...byUrl.values()];
}
