import { readFile } from "node:fs/promises";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { FeedService } from "../core/feed-service.js";
import { errorMessage } from "../core/errors.js";
import { importFromOpml, importOpmlIntoFeedList } from "../importers/index.js";
import { renderFeedErrors, renderFeedItems, renderFeedList } from "./render.js";

function text(value: string) {
  return { content: [{ type: "text" as const, text: value }] };
}

export function registerTools(server: McpServer, feedService: FeedService, feedListPaths: string[]): void {
  // ── get_timeline ──────────────────────────────────────────────

  server.tool(
    "get_timeline",
    "Fetch all configured feeds (using the local cache where fresh) and return one timeline, newest first. Feeds that fail are listed after the items.",
    {
      limit: z.number().int().min(1).max(500).optional().describe("Max items to return (default 50)"),
      source: z.string().optional().describe("Only feeds whose name or url contains this text"),
    },
    async (params) => {
      try {
        const result = await feedService.getTimeline({ limit: params.limit ?? 50, source: params.source });
        const errors = renderFeedErrors(result.errors);
        return text(renderFeedItems(result.items) + (errors ? `\n\n${errors}` : ""));
      } catch (err) {
        return text(`Error: ${errorMessage(err)}`);
      }
    },
  );

  // ── list_feeds ────────────────────────────────────────────────

  server.tool("list_feeds", "List the configured feeds.", {}, async () => {
    try {
      return text(renderFeedList(await feedService.listFeeds()));
    } catch (err) {
      return text(`Error: ${errorMessage(err)}`);
    }
  });

  // ── import_opml ───────────────────────────────────────────────

  server.tool(
    "import_opml",
    "Read feeds from an OPML document. With save=true they are merged into the feed list (existing urls are kept as they are).",
    {
      path: z.string().optional().describe("Path of an OPML file on this machine"),
      document: z.string().optional().describe("OPML document text"),
      save: z.boolean().optional().describe("Merge the feeds into the persisted feed list (default false)"),
    },
    async (params) => {
      try {
        const source = params.document ?? (params.path ? await readFile(params.path) : null);
        if (source === null) return text("Error: provide either path or document");

        if (!params.save) {
          const specs = importFromOpml(source);
          return text(`Found ${specs.length} feed(s):\n${renderFeedList(specs)}`);
        }
        const summary = await importOpmlIntoFeedList(source, feedListPaths);
        return text(`Imported ${summary.imported.length} feed(s), ${summary.added} new. ${summary.total} feeds in ${summary.path}.`);
      } catch (err) {
        return text(`Error: ${errorMessage(err)}`);
      }
    },
  );
}
