/**
 * @module tools/render
 * @fileoverview Text rendering of meme records for tool responses.
 */
import { formatMemeSnippet, type MemeRecord } from "../lookup.js";

/** How a tool presents a record. */
export type OutputFormat = "text" | "json";

/**
 * Render a record for a tool response.
 *
 * - `text`: `"<title>. <description>"`
 * - `json`: the record as pretty-printed JSON
 */
export function renderRecord(record: MemeRecord, format: OutputFormat): string {
  if (format === "json") {
    return JSON.stringify(record, null, 2);
  }
  return formatMemeSnippet(record);
}
