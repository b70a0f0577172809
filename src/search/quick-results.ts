/**
 * @module search/quick-results
 * @fileoverview Client for the site's quick-results ("instant links") backend.
 *
 * The search bar on the meme site calls a small JSON endpoint that returns
 * label/link pairs for the typed text. It is far lighter than the full
 * search-results page and already structured, so no second HTML parse is
 * needed. It is not a public API and has no version: every response goes
 * through {@link parseQuickResults}, and anything unexpected becomes a single
 * {@link MalformedResponseError}.
 *
 * ## Wire format
 * ```
 * GET <searchEndpoint>?query=all+your+base&field=name&fetch=name,url&len=10
 *
 * { "results": [ { "name": "All Your Base Are Belong To Us",
 *                  "url": "/memes/all-your-base-are-belong-to-us" } ] }
 * ```
 */

import { z } from "zod";
import { config } from "../config.js";
import { readBody, requestUrl, type RequestOptions } from "../services/fetch.js";
import { logDebug } from "../services/logger.js";
import { MalformedResponseError } from "../utils/errors.js";
import { extractMemeSlug } from "../utils/url.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types & Schema
 * ──────────────────────────────────────────────────────────────────────────── */

/** One quick result pointing at a detail page. */
export interface SearchCandidate {
  /** Display text from the backend. */
  label: string;

  /** Slug of the detail page. */
  identifier: string;
}

/**
 * Expected payload. Extra fields are ignored; missing or mistyped ones fail.
 */
const QuickResultsSchema = z.object({
  results: z.array(
    z.object({
      name: z.string(),
      url: z.string(),
    }),
  ),
});

/* ────────────────────────────────────────────────────────────────────────────
 * Parsing
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Parse a raw quick-results body into candidates, keeping backend order.
 *
 * Entries that do not link to a single detail page (people, sites, events
 * sub-sections) or that have a blank label are skipped.
 *
 * @throws {MalformedResponseError} If the body is not JSON or not the
 *   expected shape.
 *
 * @example
 * ```ts
 * parseQuickResults('{"results":[{"name":"Doge","url":"/memes/doge"}]}');
 * // => [{ label: "Doge", identifier: "doge" }]
 * ```
 */
export function parseQuickResults(body: string): SearchCandidate[] {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    throw new MalformedResponseError("Quick results response is not valid JSON");
  }

  const parsed = QuickResultsSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new MalformedResponseError(
      `Quick results response has an unexpected shape${where}: ${
        issue?.message ?? "invalid"
      }`,
    );
  }

  const candidates: SearchCandidate[] = [];
  for (const entry of parsed.data.results) {
    const label = entry.name.replace(/\s+/g, " ").trim();
    const identifier = extractMemeSlug(entry.url);
    if (label && identifier !== null) {
      candidates.push({ label, identifier });
    }
  }
  return candidates;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Request
 * ──────────────────────────────────────────────────────────────────────────── */

/** Build the quick-results request URL for a query. */
export function buildQuickResultsUrl(
  query: string,
  endpoint: string = config.searchEndpoint,
  limit: number = config.searchResultLimit,
): string {
  const url = new URL(endpoint);
  url.searchParams.set("query", query);
  url.searchParams.set("field", "name");
  url.searchParams.set("fetch", "name,url");
  url.searchParams.set("len", String(limit));
  return url.toString();
}

/**
 * Query the backend once and return its candidates in backend order.
 *
 * @throws {NetworkError} On connection failure or timeout.
 * @throws {HttpStatusError} On any non-2xx response.
 * @throws {MalformedResponseError} If the payload cannot be parsed.
 */
export async function fetchQuickResults(
  query: string,
  options: RequestOptions = {},
): Promise<SearchCandidate[]> {
  const url = buildQuickResultsUrl(query);
  const response = await requestUrl(url, "application/json, */*;q=0.1", options);
  const body = await readBody(response, url);
  const candidates = parseQuickResults(body);

  logDebug("quick results", { query, count: candidates.length });
  return candidates;
}
