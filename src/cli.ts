#!/usr/bin/env node
import "dotenv/config";
import { readFile } from "node:fs/promises";
import { parseArgs } from "node:util";

import { createApp } from "./app.js";
import { loadSettings } from "./config.js";
import { closeDb } from "./db/index.js";
import { ConfigError, errorMessage } from "./core/errors.js";
import { importOpmlIntoFeedList } from "./importers/index.js";
import { renderTimelineLine } from "./mcp/render.js";
import { logger } from "./logger.js";

const USAGE = `Usage: tidefeed [options]

  (no options)          fetch all feeds and print the merged timeline
  -p, --opml <file>     import feeds from an OPML file into the feed list
  -n, --limit <n>       print at most n items
      --json            print the timeline and errors as JSON
  -h, --help            show this help`;

async function runImport(file: string, feedListPaths: string[]): Promise<void> {
  let document: Buffer;
  try {
    document = await readFile(file);
  } catch (err) {
    throw new ConfigError(`Cannot read OPML file ${file}: ${errorMessage(err)}`);
  }
  const summary = await importOpmlIntoFeedList(document, feedListPaths);
  process.stdout.write(
    `Imported ${summary.imported.length} feed(s), ${summary.added} new -> ${summary.path}\n`,
  );
}

async function main(argv: string[]): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      opml: { type: "string", short: "p" },
      limit: { type: "string", short: "n" },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
  });

  if (values.help) {
    process.stdout.write(USAGE + "\n");
    return 0;
  }

  const settings = loadSettings();

  if (values.opml) {
    await runImport(values.opml, settings.feedListPaths);
    return 0;
  }

  const limit = values.limit !== undefined ? Number.parseInt(values.limit, 10) : undefined;
  if (limit !== undefined && (Number.isNaN(limit) || limit < 1)) {
    throw new ConfigError(`--limit must be a positive integer, got "${values.limit}"`);
  }

  const { feedService } = await createApp(settings);
  try {
    const result = await feedService.getTimeline({ limit });
    if (values.json) {
      process.stdout.write(JSON.stringify({ items: result.items, errors: result.errors }, null, 2) + "\n");
    } else {
      for (const item of result.items) process.stdout.write(renderTimelineLine(item) + "\n");
      for (const e of result.errors) {
        logger.warn({ url: e.url, kind: e.kind, usedCache: e.usedCache }, `${e.name}: ${e.message}`);
      }
    }
  } finally {
    if (settings.databaseUrl) await closeDb();
  }
  return 0;
}

main(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((err) => {
    if (err instanceof ConfigError) {
      logger.error(err.message);
    } else if (err instanceof TypeError && "code" in err && typeof err.code === "string" && err.code.startsWith("ERR_PARSE_ARGS")) {
      process.stderr.write(`${err.message}\n\n${USAGE}\n`);
    } else {
      logger.fatal({ err }, "tidefeed failed");
    }
    process.exit(1);
  });
