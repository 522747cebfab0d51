import { ConfigError } from "../core/errors.js";
import { FeedSpec } from "../core/types.js";
import { findFeedList, loadFeeds, mergeFeedSpecs, saveFeeds } from "../config.js";
import { importFromOpml } from "./opml.js";
import { logger } from "../logger.js";

const log = logger.child({ module: "import" });

export interface ImportSummary {
  path: string;
  imported: FeedSpec[];
  added: number;
  total: number;
}

/**
 * Merges the feeds of an OPML document into the persisted feed list,
 * keyed by url. The first existing candidate path is updated, otherwise
 * the first candidate is created.
 */
export async function importOpmlIntoFeedList(
  document: Buffer | string,
  feedListPaths: string[],
): Promise<ImportSummary> {
  const imported = importFromOpml(document);
  if (imported.length === 0) {
    throw new ConfigError("No usable feeds in OPML document");
  }

  const existingPath = findFeedList(feedListPaths);
  const path = existingPath ?? feedListPaths[0];
  if (!path) throw new ConfigError("No feed list path configured");

  const existing = existingPath ? (await loadFeeds([existingPath])).feeds : [];
  const merged = mergeFeedSpecs(existing, imported);
  await saveFeeds(path, merged);

  const summary = { path, imported, added: merged.length - existing.length, total: merged.length };
  log.info({ path, imported: imported.length, added: summary.added, total: summary.total }, "OPML imported");
  return summary;
}

export { importFromOpml };
