/**
 * @fileoverview Public library surface: the two ways to resolve a meme.
 *
 * | Function           | Input                    | Requests |
 * |--------------------|--------------------------|----------|
 * | {@link searchMeme} | free text                | 2        |
 * | {@link fetchMeme}  | detail-page URL or slug  | 1        |
 *
 * Every call is independent: nothing is cached or shared between calls, so
 * callers may run as many in parallel as they like. Failures are thrown as
 * `MemeLookupError` subclasses and never retried here.
 *
 * @module lookup
 */

import { extractMeme, type MemeRecord } from "./extractor/meme-extractor.js";
import { resolveSearch, type SearchOptions } from "./search/resolver.js";
import { fetchPage, type RequestOptions } from "./services/fetch.js";
import { classifyInput } from "./utils/url.js";

export type { MemeRecord } from "./extractor/meme-extractor.js";
export type { SearchOptions } from "./search/resolver.js";
export type { RequestOptions } from "./services/fetch.js";

/**
 * Find the meme whose title best matches `query`.
 *
 * @throws {EmptyQueryError} If `query` is blank (no request is made).
 * @throws {NoResultsError | NoConfidentMatchError} If nothing matches well enough.
 */
export async function searchMeme(
  query: string,
  options: SearchOptions = {},
): Promise<MemeRecord> {
  return resolveSearch(query, options);
}

/**
 * Fetch a meme by detail-page URL (`https://<host>/memes/<slug>`) or slug.
 *
 * Any input that is not a URL is used as a literal slug.
 *
 * @throws {EmptyInputError} If `input` is blank (no request is made).
 * @throws {UnsupportedUrlKindError} If `input` is a URL to anything but a detail page.
 */
export async function fetchMeme(
  input: string,
  options: RequestOptions = {},
): Promise<MemeRecord> {
  const { identifier } = classifyInput(input, "fetch");

  const page = await fetchPage(identifier, options);
  return extractMeme(page.html, identifier);
}

/**
 * Render a record as a one-paragraph text snippet: `"<title>. <description>"`.
 *
 * @example
 * ```ts
 * formatMemeSnippet({ identifier: "doge", url: "…", title: "Doge", description: "Such wow." });
 * // => "Doge. Such wow."
 * ```
 */
export function formatMemeSnippet(record: MemeRecord): string {
  return `${record.title}. ${record.description}`;
}

/** {@link searchMeme}, rendered with {@link formatMemeSnippet}. */
export async function searchMemeSnippet(
  query: string,
  options: SearchOptions = {},
): Promise<string> {
  return formatMemeSnippet(await searchMeme(query, options));
}

/** {@link fetchMeme}, rendered with {@link formatMemeSnippet}. */
export async function fetchMemeSnippet(
  input: string,
  options: RequestOptions = {},
): Promise<string> {
  return formatMemeSnippet(await fetchMeme(input, options));
}
