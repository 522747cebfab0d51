import { FeedErrorKind, FeedFailure } from "./types.js";

export class FeedError extends Error {
  readonly kind: FeedErrorKind;
  readonly status?: number;

  constructor(kind: FeedErrorKind, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "FeedError";
    this.kind = kind;
    this.status = options?.status;
  }

  /** 429 and 5xx are worth another attempt; other HTTP statuses are not. */
  get transient(): boolean {
    if (this.kind === "NetworkError" || this.kind === "Timeout") return true;
    if (this.kind === "HttpError" && this.status !== undefined) {
      return this.status === 429 || this.status >= 500;
    }
    return false;
  }

  toFailure(): FeedFailure {
    return { kind: this.kind, message: this.message };
  }
}

/** Run-level failure, raised before any fetch is attempted. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toFailure(err: unknown, fallback: FeedErrorKind = "NetworkError"): FeedFailure {
  if (err instanceof FeedError) return err.toFailure();
  return { kind: fallback, message: errorMessage(err) };
}
