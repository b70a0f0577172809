/**
 * @module utils/url
 * @fileoverview Input classification and detail-page URL handling.
 *
 * Callers hand us loose input: a full page URL, a bare slug, or free text.
 * {@link classifyInput} turns it into a {@link ResolutionInput}. Which
 * interpretation applies is chosen by the caller through the mode argument,
 * never guessed from the text:
 *
 * | mode     | URL (`scheme://…`)                 | anything else        |
 * |----------|------------------------------------|----------------------|
 * | `fetch`  | `page-url` or UnsupportedUrlKind   | `slug` (literal)     |
 * | `search` | `free-text`                        | `free-text`          |
 *
 * Detail pages have exactly one shape: `/memes/<slug>`, optionally followed
 * by a single trailing slash. The host is not checked; only the path decides.
 *
 * @example
 * ```ts
 * classifyInput("https://knowyourmeme.com/memes/mocking-spongebob", "fetch");
 * // => { kind: "page-url", url: "https://knowyourmeme.com/memes/mocking-spongebob",
 * //      identifier: "mocking-spongebob" }
 *
 * classifyInput("mocking-spongebob", "fetch");
 * // => { kind: "slug", identifier: "mocking-spongebob" }
 *
 * classifyInput("  all your base ", "search");
 * // => { kind: "free-text", query: "all your base" }
 * ```
 */

import { config } from "../config.js";
import { EmptyInputError, UnsupportedUrlKindError } from "./errors.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

/** How the caller wants its input interpreted. */
export type InputMode = "fetch" | "search";

/** Caller input after classification. */
export type ResolutionInput =
  | { kind: "free-text"; query: string }
  | { kind: "page-url"; url: string; identifier: string }
  | { kind: "slug"; identifier: string };

/** The classifications `fetch` mode can produce. */
export type PageInput = Exclude<ResolutionInput, { kind: "free-text" }>;

/** The classification `search` mode produces. */
export type FreeTextInput = Extract<ResolutionInput, { kind: "free-text" }>;

/* ────────────────────────────────────────────────────────────────────────────
 * Constants
 * ──────────────────────────────────────────────────────────────────────────── */

/** Path template segment in front of every detail-page slug. */
export const MEME_PATH_PREFIX = "/memes/";

/** Unreserved characters plus `%` for already-encoded sequences. */
const SLUG_PATTERN = /^[A-Za-z0-9._~%-]+$/;

/** `/memes/<slug>` with an optional trailing slash and nothing after it. */
const DETAIL_PATH_PATTERN = /^\/memes\/([^/]+)\/?$/;

/** Anything that starts like `scheme://` is treated as a URL. */
const URL_SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

const FETCHABLE_SCHEMES: ReadonlySet<string> = new Set(["http:", "https:"]);

/* ────────────────────────────────────────────────────────────────────────────
 * Slug Helpers
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Whether `value` can be placed in a URL path segment as-is.
 *
 * `.` and `..` are rejected because they are dot-segments, not names.
 */
export function isPathSafeSlug(value: string): boolean {
  return value !== "." && value !== ".." && SLUG_PATTERN.test(value);
}

/**
 * Return the slug of a detail-page path or URL, or `null` when the path has
 * any other shape.
 *
 * Relative paths are resolved against the configured site origin, which is
 * how the quick-results backend reports its links.
 *
 * @example
 * ```ts
 * extractMemeSlug("/memes/all-your-base-are-belong-to-us"); // "all-your-base-are-belong-to-us"
 * extractMemeSlug("https://site.example/memes/doge/");       // "doge"
 * extractMemeSlug("/memes/people/keanu-reeves");             // null
 * ```
 */
export function extractMemeSlug(pathOrUrl: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(pathOrUrl, config.baseUrl);
  } catch {
    return null;
  }

  const match = DETAIL_PATH_PATTERN.exec(parsed.pathname);
  if (!match) {
    return null;
  }

  const slug = match[1];
  return isPathSafeSlug(slug) ? slug : null;
}

/**
 * Build the canonical detail-page URL for a slug.
 *
 * @example
 * ```ts
 * buildMemeUrl("doge"); // "https://knowyourmeme.com/memes/doge"
 * ```
 */
export function buildMemeUrl(
  identifier: string,
  baseUrl: string = config.baseUrl,
): string {
  return `${baseUrl}${MEME_PATH_PREFIX}${identifier}`;
}

/**
 * Turn a literal fetch-mode string into a path-safe identifier.
 *
 * Path-safe text is kept verbatim; anything else is percent-encoded.
 */
function toLiteralIdentifier(value: string): string {
  if (isPathSafeSlug(value)) {
    return value;
  }
  const encoded = encodeURIComponent(value);
  return encoded === "." || encoded === ".."
    ? encoded.replace(/\./g, "%2E")
    : encoded;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Classification
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Classify raw caller input.
 *
 * @throws {EmptyInputError} If `raw` is blank after trimming.
 * @throws {UnsupportedUrlKindError} In `fetch` mode, for a URL that is not an
 *   http(s) link to a single detail page.
 */
export function classifyInput(raw: string, mode: "fetch"): PageInput;
export function classifyInput(raw: string, mode: "search"): FreeTextInput;
export function classifyInput(raw: string, mode: InputMode): ResolutionInput;
export function classifyInput(raw: string, mode: InputMode): ResolutionInput {
  const trimmed = raw.trim();
  if (trimmed === "") {
    throw new EmptyInputError();
  }

  if (mode === "search") {
    return { kind: "free-text", query: trimmed };
  }

  if (!URL_SCHEME_PATTERN.test(trimmed)) {
    return { kind: "slug", identifier: toLiteralIdentifier(trimmed) };
  }

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    throw new UnsupportedUrlKindError(trimmed);
  }

  if (!FETCHABLE_SCHEMES.has(parsed.protocol)) {
    throw new UnsupportedUrlKindError(trimmed);
  }

  const identifier = extractMemeSlug(parsed.href);
  if (identifier === null) {
    throw new UnsupportedUrlKindError(trimmed);
  }

  return { kind: "page-url", url: parsed.href, identifier };
}
