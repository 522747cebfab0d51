#!/usr/bin/env node
import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { VERSION, createApp } from "./app.js";
import { loadSettings } from "./config.js";
import { registerTools } from "./mcp/tools.js";
import { logger } from "./logger.js";

// ── Start ───────────────────────────────────────────────────────

async function main() {
  const settings = loadSettings();
  const { feedService } = await createApp(settings);

  const server = new McpServer({
    name: "tidefeed",
    version: VERSION,
  });
  registerTools(server, feedService, settings.feedListPaths);

  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((err) => {
  logger.fatal({ err }, "MCP server failed to start");
  process.exit(1);
});
