import { CacheValidator } from "./types.js";
import { FeedError, errorMessage } from "./errors.js";

export type TransportResponse =
  | { status: "ok"; body: Buffer; validator?: CacheValidator }
  | { status: "not_modified"; validator?: CacheValidator };

export interface FetchRequest {
  validator?: CacheValidator;
  timeoutMs: number;
  /** Aborted when the whole run gives up on this feed. */
  signal?: AbortSignal;
}

export interface FeedTransport {
  fetch(url: string, request: FetchRequest): Promise<TransportResponse>;
}

export interface HttpFeedTransportOptions {
  userAgent?: string;
  fetchImpl?: typeof fetch;
}

function causeMessage(err: unknown): string {
  if (err instanceof Error && err.cause instanceof Error) {
    return `${err.message} (${err.cause.message})`;
  }
  return errorMessage(err);
}

function readValidator(headers: Headers): CacheValidator | undefined {
  const etag = headers.get("etag") ?? undefined;
  const lastModified = headers.get("last-modified") ?? undefined;
  if (!etag && !lastModified) return undefined;
  return { etag, lastModified };
}

export class HttpFeedTransport implements FeedTransport {
  private userAgent: string;
  private fetchImpl: typeof fetch;

  constructor(options: HttpFeedTransportOptions = {}) {
    this.userAgent = options.userAgent ?? "tidefeed/1.0";
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetch(url: string, request: FetchRequest): Promise<TransportResponse> {
    const headers: Record<string, string> = {
      "User-Agent": this.userAgent,
      Accept: "application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.8, */*;q=0.5",
    };
    if (request.validator?.etag) headers["If-None-Match"] = request.validator.etag;
    if (request.validator?.lastModified) headers["If-Modified-Since"] = request.validator.lastModified;

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, request.timeoutMs);
    const onRunAbort = () => controller.abort();
    if (request.signal?.aborted) controller.abort();
    request.signal?.addEventListener("abort", onRunAbort, { once: true });

    try {
      const resp = await this.fetchImpl(url, { headers, signal: controller.signal, redirect: "follow" });

      if (resp.status === 304) {
        return { status: "not_modified", validator: readValidator(resp.headers) ?? request.validator };
      }
      if (!resp.ok) {
        throw new FeedError("HttpError", `HTTP ${resp.status} ${resp.statusText}`.trim(), {
          status: resp.status,
        });
      }

      const body = Buffer.from(await resp.arrayBuffer());
      return { status: "ok", body, validator: readValidator(resp.headers) };
    } catch (err) {
      if (err instanceof FeedError) throw err;
      if (controller.signal.aborted) {
        const why = timedOut ? `timed out after ${request.timeoutMs}ms` : "aborted by run timeout";
        throw new FeedError("Timeout", `Request ${why}`, { cause: err });
      }
      throw new FeedError("NetworkError", causeMessage(err), { cause: err });
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener("abort", onRunAbort);
    }
  }
}
