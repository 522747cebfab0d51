import { FeedItem, FeedSpec, FetchOutcome } from "./types.js";

interface Ranked {
  item: FeedItem;
  feedIndex: number;
  time: number;
}

function compareRanked(a: Ranked, b: Ranked): number {
  if (a.time !== b.time) return b.time - a.time;
  if (a.feedIndex !== b.feedIndex) return a.feedIndex - b.feedIndex;
  if (a.item.title < b.item.title) return -1;
  if (a.item.title > b.item.title) return 1;
  return 0;
}

function timeOf(item: FeedItem): number {
  const ms = new Date(item.publishedAt).getTime();
  return Number.isNaN(ms) ? 0 : ms;
}

/**
 * Newest first; ties fall back to feed order, then title. Items repeating
 * `(link, publishedAt)` within one feed collapse to the first occurrence.
 * Identical stories from different feeds are all kept.
 */
export function merge(results: ReadonlyArray<readonly [FeedSpec, FetchOutcome]>): FeedItem[] {
  const ranked: Ranked[] = [];

  results.forEach(([, outcome], feedIndex) => {
    if (!outcome.ok) return;
    const seen = new Set<string>();
    for (const item of outcome.items) {
      const key = `${item.link}\u0000${item.publishedAt}`;
      if (seen.has(key)) continue;
      seen.add(key);
      ranked.push({ item, feedIndex, time: timeOf(item) });
    }
  });

  ranked.sort(compareRanked);
  return ranked.map((r) => r.item);
}
