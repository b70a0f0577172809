/**
 * @module tools/search-meme
 * @fileoverview MCP Tool: search_meme -- resolve a free-text phrase to a meme.
 *
 * This tool:
 * 1. Looks the phrase up in the site's quick results via {@link searchMeme}
 * 2. Picks the closest title above the similarity threshold
 * 3. Fetches that meme's page and extracts its title and About text
 * 4. Returns either a text snippet or the JSON record
 *
 * ## Usage Example (from MCP client)
 * ```json
 * {
 *   "tool": "search_meme",
 *   "arguments": { "query": "all your base", "threshold": 0.6 }
 * }
 * ```
 *
 * @see {@link searchMeme} for the resolution pipeline
 * @see {@link formatErrorForTool} for error formatting
 */
import { z } from "zod";
import { searchMeme } from "../lookup.js";
import { logWarn } from "../services/logger.js";
import { formatErrorForTool } from "../utils/errors.js";
import { renderRecord, type OutputFormat } from "./render.js";

/**
 * Zod schema for the `search_meme` tool parameters.
 *
 * A **plain object** with Zod fields -- the MCP SDK `server.tool()` method
 * expects this shape directly, not a `z.object()`.
 */
export const SearchMemeSchema = {
  /** Keywords to search for */
  query: z
    .string()
    .min(1)
    .describe("Keywords describing the meme, e.g. 'all your base'"),

  /** Inclusive similarity threshold; server default when omitted */
  threshold: z
    .number()
    .min(0)
    .max(1)
    .optional()
    .describe("Minimum title similarity (0-1) for a result to count as a match"),

  /** Output shape (default: text) */
  format: z
    .enum(["text", "json"])
    .optional()
    .default("text")
    .describe("'text' for a 'Title. Description' snippet, 'json' for the full record"),
};

/** Handler input after Zod parsing & defaults. */
interface SearchMemeParams {
  query: string;
  threshold?: number;
  format: OutputFormat;
}

/**
 * Handler function for the `search_meme` MCP tool.
 *
 * Errors are returned as an `isError: true` response rather than thrown, so
 * the MCP client receives a clean `[CODE] message` line.
 *
 * @example
 * ```typescript
 * const result = await handleSearchMeme({ query: "all your base", format: "text" });
 * // result.content[0].text === "All Your Base Are Belong To Us. ..."
 * ```
 */
export async function handleSearchMeme(params: SearchMemeParams) {
  try {
    const record = await searchMeme(params.query, {
      threshold: params.threshold,
    });
    return {
      content: [{ type: "text" as const, text: renderRecord(record, params.format) }],
    };
  } catch (error) {
    const message = formatErrorForTool(error);
    logWarn("search_meme failed", { query: params.query, error: message });
    return {
      content: [{ type: "text" as const, text: message }],
      isError: true,
    };
  }
}
