#!/usr/bin/env node
/**
 * @module index
 * @fileoverview meme-lookup-mcp MCP server entry point.
 *
 * Creates an {@link McpServer}, registers the two lookup tools and listens on
 * the stdio transport.
 *
 * ## Available Tools
 * | Tool          | Description                                      | Module                   |
 * |---------------|--------------------------------------------------|--------------------------|
 * | `search_meme` | Best title match for a free-text phrase          | `./tools/search-meme.js` |
 * | `fetch_meme`  | Meme by page URL or slug                         | `./tools/fetch-meme.js`  |
 *
 * ## Architecture
 * ```
 * MCP Client
 *   |
 *   | stdio (JSON-RPC over stdin/stdout)
 *   v
 * index.ts (this file) -- McpServer
 *   |
 *   +-- search_meme --> lookup.ts --> search/resolver.ts --> services/fetch.ts
 *   +-- fetch_meme  --> lookup.ts --> utils/url.ts       --> services/fetch.ts
 *                                         |
 *                                         v
 *                             extractor/meme-extractor.ts
 * ```
 *
 * ## Environment Variables
 * See {@link config}: `MEME_BASE_URL`, `MEME_SEARCH_ENDPOINT`,
 * `SEARCH_RESULT_LIMIT`, `MATCH_THRESHOLD`, `FETCH_TIMEOUT`, `MAX_RESPONSE_SIZE`, `USER_AGENT`,
 * `LOG_LEVEL`.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { config } from "./config.js";
import { logError, logInfo } from "./services/logger.js";
import { SearchMemeSchema, handleSearchMeme } from "./tools/search-meme.js";
import { FetchMemeSchema, handleFetchMeme } from "./tools/fetch-meme.js";

// ---------------------------------------------------------------------------
// Server Initialization
// ---------------------------------------------------------------------------

const server = new McpServer(
  {
    name: "meme-lookup-mcp",
    version: "0.1.0",
  },
  {
    capabilities: {
      tools: {},
    },
  },
);

// ---------------------------------------------------------------------------
// Tool Registration
// ---------------------------------------------------------------------------
// server.tool("tool-name", "description", SchemaObject, handlerFn)
// The schema is a plain object with Zod fields (NOT wrapped in z.object()).
// ---------------------------------------------------------------------------

server.tool(
  "search_meme",
  "Find the meme whose title best matches a free-text phrase and return its title and 'About' description. Fails instead of guessing when no title is similar enough.",
  SearchMemeSchema,
  handleSearchMeme,
);

server.tool(
  "fetch_meme",
  "Fetch a meme by its page URL or slug and return its title and 'About' description.",
  FetchMemeSchema,
  handleFetchMeme,
);

// ---------------------------------------------------------------------------
// Server Startup
// ---------------------------------------------------------------------------

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logInfo("server started", { baseUrl: config.baseUrl });
}

main().catch((error: unknown) => {
  logError(
    "Server error",
    error instanceof Error ? error : { error: String(error) },
  );
  process.exit(1);
});
