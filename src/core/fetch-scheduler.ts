import { setTimeout as sleep } from "node:timers/promises";
import {
  CacheEntry,
  FeedFailure,
  FeedRunRecord,
  FeedSpec,
  FeedState,
  FetchOutcome,
  OutcomeOrigin,
  TerminalState,
} from "./types.js";
import { FeedError, errorMessage, toFailure } from "./errors.js";
import { FeedTransport, TransportResponse } from "./transport.js";
import { FeedSourceAdapter } from "../adapters/rss.js";
import { CacheStore, hashPayload, isFresh } from "../stores/cache-store.js";
import { logger } from "../logger.js";

const log = logger.child({ module: "scheduler" });

export interface FetchSchedulerOptions {
  concurrency?: number;
  fetchTimeoutMs?: number;
  runTimeoutMs?: number;
  cacheTtlMs?: number;
  retries?: number;
  retryDelayMs?: number;
  now?: () => Date;
}

// ── Per-feed task: walks PENDING → DONE_OK | FAILED ─────────────

interface FeedTask {
  spec: FeedSpec;
  state: FeedState;
  startedAt: number;
  cached: CacheEntry | null;
  controller: AbortController;
  record?: FeedRunRecord;
}

/** Settles with the transport, or rejects with Timeout when the deadline passes or the run aborts the feed. */
function withDeadline<T>(promise: Promise<T>, ms: number, signal: AbortSignal): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new FeedError("Timeout", `Request timed out after ${ms}ms`)), ms);
    onAbort = () => reject(new FeedError("Timeout", "Request aborted by run timeout"));
    signal.addEventListener("abort", onAbort, { once: true });
  });
  return Promise.race([promise, deadline]).finally(() => {
    clearTimeout(timer);
    if (onAbort) signal.removeEventListener("abort", onAbort);
  });
}

export function dedupeByUrl(specs: FeedSpec[]): FeedSpec[] {
  const seen = new Set<string>();
  const result: FeedSpec[] = [];
  for (const spec of specs) {
    if (seen.has(spec.url)) continue;
    seen.add(spec.url);
    result.push(spec);
  }
  return result;
}

export class FetchScheduler {
  private concurrency: number;
  private fetchTimeoutMs: number;
  private runTimeoutMs: number;
  private cacheTtlMs: number;
  private retries: number;
  private retryDelayMs: number;
  private now: () => Date;

  constructor(
    private transport: FeedTransport,
    private cache: CacheStore,
    private adapter: FeedSourceAdapter,
    options: FetchSchedulerOptions = {},
  ) {
    this.concurrency = Math.max(1, options.concurrency ?? 8);
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? 10_000;
    this.runTimeoutMs = options.runTimeoutMs ?? 45_000;
    this.cacheTtlMs = options.cacheTtlMs ?? 15 * 60_000;
    this.retries = Math.max(0, options.retries ?? 1);
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.now = options.now ?? (() => new Date());
  }

  /** One record per distinct URL, in input order. Never rejects. */
  async run(specs: FeedSpec[]): Promise<FeedRunRecord[]> {
    const unique = dedupeByUrl(specs);
    if (unique.length < specs.length) {
      log.warn({ dropped: specs.length - unique.length }, "duplicate feed URLs collapsed");
    }

    const tasks: FeedTask[] = unique.map((spec) => ({
      spec,
      state: "PENDING",
      startedAt: Date.now(),
      cached: null,
      controller: new AbortController(),
    }));
    const queue = [...tasks];
    let expired = false;

    const worker = async (): Promise<void> => {
      for (let task = queue.shift(); task && !expired; task = queue.shift()) {
        await this.runTask(task);
      }
    };

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<"expired">((resolve) => {
      timer = setTimeout(() => resolve("expired"), this.runTimeoutMs);
    });
    const workers = Array.from({ length: Math.min(this.concurrency, tasks.length) }, () => worker());
    const finished = await Promise.race([Promise.all(workers).then(() => "done" as const), deadline]);
    clearTimeout(timer);

    if (finished === "expired") {
      expired = true;
      const pending = tasks.filter((t) => !t.record);
      log.warn({ pending: pending.length, runTimeoutMs: this.runTimeoutMs }, "run timeout reached, abandoning feeds");
      for (const task of pending) task.controller.abort();
      await Promise.all(
        pending.map((task) =>
          this.fail(task, { kind: "Timeout", message: `Run timed out after ${this.runTimeoutMs}ms` }),
        ),
      );
      // aborted workers unwind before the caller sees the records
      await Promise.allSettled(workers);
    }

    return tasks.map((task) => {
      if (task.record) return task.record;
      // unreachable: every task is finished by a worker or by the expiry pass
      return this.buildRecord(task, "FAILED", "none", {
        ok: false,
        error: { kind: "Timeout", message: "Feed did not complete" },
      });
    });
  }

  // ── Single feed ───────────────────────────────────────────────

  private async runTask(task: FeedTask): Promise<void> {
    try {
      await this.process(task);
    } catch (err) {
      // adapter and store contracts say they don't throw here; keep the feed boundary anyway
      await this.fail(task, toFailure(err));
    }
  }

  private async process(task: FeedTask): Promise<void> {
    const { spec } = task;
    task.startedAt = Date.now();
    task.cached = await this.cache.get(spec.url);

    if (task.cached && isFresh(task.cached, this.now(), this.cacheTtlMs)) {
      task.state = "CACHED_OK";
      const parsed = await this.adapter.parse(task.cached.rawPayload, spec, task.cached.fetchedAt);
      if (parsed.ok) {
        this.finish(task, "DONE_OK", "cache", { ok: true, items: parsed.value, stale: false });
      } else {
        this.finish(task, "FAILED", "none", {
          ok: false,
          error: { kind: "Malformed", message: parsed.error.detail },
        });
      }
      return;
    }

    task.state = "FETCHING";
    let response: TransportResponse;
    try {
      response = await this.fetchWithRetry(task);
    } catch (err) {
      await this.fail(task, toFailure(err));
      return;
    }
    if (task.record) return;

    task.state = "PARSING";
    const fetchedAt = this.now().toISOString();
    let payload: Buffer;
    let origin: OutcomeOrigin;
    if (response.status === "not_modified") {
      if (!task.cached) {
        await this.fail(task, { kind: "HttpError", message: "HTTP 304 without a cached copy" });
        return;
      }
      payload = task.cached.rawPayload;
      origin = "not_modified";
    } else {
      payload = response.body;
      origin = "network";
    }

    const parsed = await this.adapter.parse(payload, spec, fetchedAt);
    if (!parsed.ok) {
      await this.fail(task, { kind: "Malformed", message: parsed.error.detail });
      return;
    }

    if (task.record) return;

    let cacheError: FeedFailure | undefined;
    try {
      await this.cache.put({
        url: spec.url,
        fetchedAt,
        validator: response.validator ?? task.cached?.validator,
        rawPayload: payload,
        payloadHash: hashPayload(payload),
      });
    } catch (err) {
      cacheError = toFailure(err, "CacheIOError");
      log.warn({ url: spec.url, err: cacheError.message }, "cache write failed");
    }

    this.finish(task, "DONE_OK", origin, { ok: true, items: parsed.value, stale: false }, cacheError);
  }

  private async fetchWithRetry(task: FeedTask): Promise<TransportResponse> {
    const { signal } = task.controller;
    for (let attempt = 0; ; attempt++) {
      try {
        return await withDeadline(
          this.transport.fetch(task.spec.url, {
            validator: task.cached?.validator,
            timeoutMs: this.fetchTimeoutMs,
            signal,
          }),
          this.fetchTimeoutMs,
          signal,
        );
      } catch (err) {
        const retryable = err instanceof FeedError && err.transient && attempt < this.retries && !signal.aborted;
        if (!retryable) throw err;

        const delay = this.retryDelayMs * 2 ** attempt;
        log.debug({ url: task.spec.url, attempt: attempt + 1, delay, err: errorMessage(err) }, "retrying feed");
        try {
          await sleep(delay, undefined, { signal });
        } catch {
          throw err;
        }
      }
    }
  }

  // ── Terminal transitions ──────────────────────────────────────

  /** FAILED, but a cached payload (however old) still feeds the timeline. */
  private async fail(task: FeedTask, failure: FeedFailure): Promise<void> {
    if (task.record) return;
    const cached = task.cached ?? (await this.cache.get(task.spec.url));
    if (cached) {
      const parsed = await this.adapter.parse(cached.rawPayload, task.spec, cached.fetchedAt);
      if (parsed.ok) {
        const items = parsed.value.map((item) => ({ ...item, stale: true }));
        this.finish(task, "FAILED", "stale_cache", { ok: true, items, stale: true, error: failure });
        return;
      }
    }
    this.finish(task, "FAILED", "none", { ok: false, error: failure });
  }

  private finish(
    task: FeedTask,
    state: TerminalState,
    origin: OutcomeOrigin,
    outcome: FetchOutcome,
    cacheError?: FeedFailure,
  ): void {
    if (task.record) return;
    task.record = this.buildRecord(task, state, origin, outcome, cacheError);

    if (outcome.ok && !outcome.stale) {
      log.debug({ url: task.spec.url, origin, items: outcome.items.length }, "feed done");
    } else {
      const error = outcome.error;
      log.warn(
        { url: task.spec.url, kind: error?.kind, err: error?.message, usedCache: outcome.ok },
        `feed failed: ${task.spec.name}`,
      );
    }
  }

  private buildRecord(
    task: FeedTask,
    state: TerminalState,
    origin: OutcomeOrigin,
    outcome: FetchOutcome,
    cacheError?: FeedFailure,
  ): FeedRunRecord {
    task.state = state;
    return {
      spec: task.spec,
      state,
      origin,
      outcome,
      cacheError,
      durationMs: Date.now() - task.startedAt,
    };
  }
}
