// ── FeedSpec: a configured source ─────────────────────────────────

export interface FeedSpec {
  name: string;
  url: string;
}

// ── FeedItem: the atom of the timeline ────────────────────────────

export interface FeedItem {
  sourceName: string;
  sourceUrl: string;
  title: string;
  link: string;
  /** ISO-8601; the fetch time when the payload carried no usable date. */
  publishedAt: string;
  summary: string;
  /** Served from a cache entry kept only because the refetch failed. */
  stale: boolean;
}

// ── Cache ─────────────────────────────────────────────────────────

export interface CacheValidator {
  etag?: string;
  lastModified?: string;
}

export interface CacheEntry {
  url: string;
  fetchedAt: string;
  validator?: CacheValidator;
  rawPayload: Buffer;
  payloadHash?: string;
}

// ── Errors and outcomes ───────────────────────────────────────────

export type FeedErrorKind =
  | "NetworkError"
  | "Timeout"
  | "HttpError"
  | "Malformed"
  | "CacheIOError";

export interface FeedFailure {
  kind: FeedErrorKind;
  message: string;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type FetchOutcome =
  | { ok: true; items: FeedItem[]; stale: boolean; error?: FeedFailure }
  | { ok: false; error: FeedFailure };

export type FeedState = "PENDING" | "CACHED_OK" | "FETCHING" | "PARSING" | "DONE_OK" | "FAILED";

export type TerminalState = Extract<FeedState, "DONE_OK" | "FAILED">;

/** Where the items of an outcome came from. */
export type OutcomeOrigin = "network" | "not_modified" | "cache" | "stale_cache" | "none";

export interface FeedRunRecord {
  spec: FeedSpec;
  state: TerminalState;
  origin: OutcomeOrigin;
  outcome: FetchOutcome;
  /** Cache write failure that did not fail the feed. */
  cacheError?: FeedFailure;
  durationMs: number;
}

// ── Run report handed to presenters ───────────────────────────────

export interface FeedRunError {
  name: string;
  url: string;
  kind: FeedErrorKind;
  message: string;
  usedCache: boolean;
}

export interface TimelineResult {
  items: FeedItem[];
  errors: FeedRunError[];
  records: FeedRunRecord[];
  startedAt: string;
  durationMs: number;
}
