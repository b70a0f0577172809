/**
 * @module tools/fetch-meme
 * @fileoverview MCP Tool: fetch_meme -- load a meme by page URL or slug.
 *
 * Input is never interpreted as search text here: a URL must point at a
 * single meme page, and anything else is used as the slug verbatim.
 *
 * ## Usage Example (from MCP client)
 * ```json
 * {
 *   "tool": "fetch_meme",
 *   "arguments": { "input": "https://knowyourmeme.com/memes/mocking-spongebob", "format": "json" }
 * }
 * ```
 */
import { z } from "zod";
import { fetchMeme } from "../lookup.js";
import { logWarn } from "../services/logger.js";
import { formatErrorForTool } from "../utils/errors.js";
import { renderRecord, type OutputFormat } from "./render.js";

/** Zod schema for the `fetch_meme` tool parameters (plain object shape). */
export const FetchMemeSchema = {
  /** Meme page URL or slug */
  input: z
    .string()
    .min(1)
    .describe("Meme page URL (https://knowyourmeme.com/memes/<slug>) or bare slug"),

  /** Output shape (default: text) */
  format: z
    .enum(["text", "json"])
    .optional()
    .default("text")
    .describe("'text' for a 'Title. Description' snippet, 'json' for the full record"),
};

interface FetchMemeParams {
  input: string;
  format: OutputFormat;
}

/**
 * Handler function for the `fetch_meme` MCP tool.
 *
 * @example
 * ```typescript
 * await handleFetchMeme({ input: "https://knowyourmeme.com/videos/123", format: "text" });
 * // => { content: [{ type: "text", text: "[UNSUPPORTED_URL_KIND] Unsupported URL: ..." }], isError: true }
 * ```
 */
export async function handleFetchMeme(params: FetchMemeParams) {
  try {
    const record = await fetchMeme(params.input);
    return {
      content: [{ type: "text" as const, text: renderRecord(record, params.format) }],
    };
  } catch (error) {
    const message = formatErrorForTool(error);
    logWarn("fetch_meme failed", { input: params.input, error: message });
    return {
      content: [{ type: "text" as const, text: message }],
      isError: true,
    };
  }
}
