import RssParser from "rss-parser";
import { FeedItem, FeedSpec, Result } from "../core/types.js";
import { errorMessage } from "../core/errors.js";

export interface ParseError {
  kind: "Malformed";
  detail: string;
}

export interface FeedSourceAdapter {
  parse(rawPayload: Buffer, spec: FeedSpec, fetchedAt: string): Promise<Result<FeedItem[], ParseError>>;
}

const SUMMARY_MAX = 300;

function stripHtml(html: string): string {
  return html.replace(/<[^>]*>/g, "").replace(/\s+/g, " ").trim();
}

function truncate(text: string, maxLen: number): string {
  if (text.length <= maxLen) return text;
  return text.slice(0, maxLen).trimEnd() + "…";
}

function toIsoDate(...candidates: (string | undefined)[]): string | null {
  for (const c of candidates) {
    if (!c) continue;
    const ms = new Date(c.trim()).getTime();
    if (!Number.isNaN(ms)) return new Date(ms).toISOString();
  }
  return null;
}

export class RssFeedAdapter implements FeedSourceAdapter {
  private parser = new RssParser();

  async parse(rawPayload: Buffer, spec: FeedSpec, fetchedAt: string): Promise<Result<FeedItem[], ParseError>> {
    let feed: RssParser.Output<Record<string, unknown>>;
    try {
      feed = await this.parser.parseString(rawPayload.toString("utf-8"));
    } catch (err) {
      return { ok: false, error: { kind: "Malformed", detail: errorMessage(err) } };
    }

    const items: FeedItem[] = (feed.items ?? []).map((item) => ({
      sourceName: spec.name,
      sourceUrl: spec.url,
      title: item.title?.trim() ?? "",
      link: item.link?.trim() ?? "",
      publishedAt: toIsoDate(item.isoDate, item.pubDate) ?? fetchedAt,
      summary: truncate(stripHtml(item.contentSnippet ?? item.content ?? item.summary ?? ""), SUMMARY_MAX),
      stale: false,
    }));

    return { ok: true, value: items };
  }
}
