import { FeedItem, FeedRunError, FeedSpec } from "../core/types.js";

export function renderFeedItems(items: FeedItem[]): string {
  if (items.length === 0) return "No feed items found.";

  return items
    .map(
      (item, i) =>
        `[${i + 1}] ${item.title || "(untitled)"}${item.stale ? " (stale)" : ""}\n` +
        `    Source: ${item.sourceName}\n` +
        `    Link: ${item.link}\n` +
        `    Date: ${item.publishedAt}` +
        (item.summary ? `\n    ${item.summary}` : ""),
    )
    .join("\n\n");
}

export function renderFeedErrors(errors: FeedRunError[]): string {
  if (errors.length === 0) return "";

  const lines = errors.map(
    (e) => `• ${e.name} (${e.url}): ${e.kind}: ${e.message}${e.usedCache ? " [showing cached items]" : ""}`,
  );
  return `Feed errors:\n${lines.join("\n")}`;
}

export function renderFeedList(feeds: FeedSpec[]): string {
  if (feeds.length === 0) return "No feeds configured.";
  return feeds.map((f) => `• ${f.name}\n  ${f.url}`).join("\n");
}

/** One line per item, for piping into a picker. */
export function renderTimelineLine(item: FeedItem): string {
  return `${item.sourceName} | ${item.title || "(untitled)"} | ${item.link}`;
}
