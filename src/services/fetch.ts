/**
 * @fileoverview HTTP access to the meme site for meme-lookup-mcp.
 *
 * Wraps the Node.js native `fetch()` with the controls every outbound request
 * needs here:
 *
 * 1. **Timeout** - `AbortSignal.timeout()` bounds each request
 * 2. **User-Agent** - a configurable header (the site rejects bare clients)
 * 3. **Size limit** - bodies are streamed and abandoned past
 *    `config.maxResponseSize`
 * 4. **Typed failures** - transport errors, HTTP statuses and content types
 *    map onto the error hierarchy in `utils/errors.ts`
 *
 * A rejected response always has its body cancelled before the error is
 * thrown, so no connection outlives the call.
 *
 * There is no retry, no queue and no cache: one call is one request, and a
 * failed request surfaces immediately.
 *
 * ## Architecture
 *
 * ```
 *   fetchPage(identifier)
 *     |
 *     +--> buildMemeUrl(identifier)
 *     |
 *     +--> requestUrl(url)            (also used by search/quick-results)
 *     |     - AbortSignal.timeout
 *     |     - User-Agent / Accept headers
 *     |     - status check
 *     |
 *     +--> Content-Type check (markup or text)
 *     |
 *     +--> readBody (streamed, size-capped)
 *     |
 *     +--> Return PageResult
 * ```
 *
 * @module services/fetch
 */

import { config } from "../config.js";
import { buildMemeUrl } from "../utils/url.js";
import {
  HttpStatusError,
  NetworkError,
  ResponseTooLargeError,
  UnexpectedContentTypeError,
} from "../utils/errors.js";
import { logDebug } from "./logger.js";

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/**
 * Per-call request options. Anything left out falls back to {@link config}.
 */
export interface RequestOptions {
  /** Custom User-Agent header. */
  userAgent?: string;

  /** Request timeout in milliseconds. */
  timeoutMs?: number;
}

/**
 * A fetched meme detail page.
 *
 * @example
 * ```typescript
 * const page: PageResult = {
 *   identifier: "doge",
 *   url: "https://knowyourmeme.com/memes/doge",
 *   html: "<!DOCTYPE html><html>...</html>",
 *   contentType: "text/html; charset=utf-8",
 *   statusCode: 200,
 * };
 * ```
 */
export interface PageResult {
  /** The slug the page was requested with. */
  identifier: string;

  /** The final URL after redirects. */
  url: string;

  /** The raw response body. */
  html: string;

  /** The Content-Type header value from the response. */
  contentType: string;

  /** The HTTP status code of the final response. */
  statusCode: number;
}

// ---------------------------------------------------------------------------
// Content-Type Allowlist
// ---------------------------------------------------------------------------

/**
 * MIME types accepted for detail pages: markup, plus plain text for servers
 * that mislabel their HTML.
 */
const PAGE_CONTENT_TYPES: ReadonlySet<string> = new Set([
  "text/html",
  "application/xhtml+xml",
  "text/xml",
  "application/xml",
  "text/plain",
]);

// ---------------------------------------------------------------------------
// Helper Functions
// ---------------------------------------------------------------------------

/**
 * Extracts the MIME type from a Content-Type header value.
 *
 * @example
 * ```typescript
 * extractMimeType("text/html; charset=utf-8"); // => "text/html"
 * extractMimeType(null);                       // => ""
 * ```
 */
export function extractMimeType(contentType: string | null): string {
  if (!contentType) {
    return "";
  }
  return contentType.split(";")[0].trim().toLowerCase();
}

function isTimeout(error: unknown): boolean {
  // AbortSignal.timeout() rejects with a DOMException named "TimeoutError";
  // older runtimes report "AbortError" instead.
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    // undici hides the real reason ("ECONNREFUSED", "ENOTFOUND") in `cause`
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : "";
    return `${error.message}${cause}`;
  }
  return String(error);
}

/** Cancel an unread body so its connection is released. */
async function discardBody(response: Response): Promise<void> {
  if (!response.body || response.bodyUsed) {
    return;
  }
  try {
    await response.body.cancel();
  } catch (error) {
    logDebug("discarding response body failed", {
      url: response.url,
      error: describeError(error),
    });
  }
}

// ---------------------------------------------------------------------------
// Main Exports
// ---------------------------------------------------------------------------

/**
 * Issue one GET request and return the response once its status is 2xx.
 *
 * A 2xx body is left unread so the caller decides how to consume it; any
 * other status has its body cancelled before the error is thrown.
 *
 * @param url     - Absolute URL to request.
 * @param accept  - Value for the `Accept` header.
 * @param options - Per-call overrides.
 *
 * @throws {NetworkError} On connection failure or timeout.
 * @throws {HttpStatusError} On any non-2xx response.
 */
export async function requestUrl(
  url: string,
  accept: string,
  options: RequestOptions = {},
): Promise<Response> {
  const timeoutMs = options.timeoutMs ?? config.fetchTimeout;

  logDebug("request", { url, timeoutMs });

  let response: Response;
  try {
    response = await fetch(url, {
      signal: AbortSignal.timeout(timeoutMs),
      headers: {
        "User-Agent": options.userAgent || config.userAgent,
        Accept: accept,
        "Accept-Language": "en-US,en;q=0.9",
      },
      redirect: "follow",
    });
  } catch (error) {
    if (isTimeout(error)) {
      throw new NetworkError(
        `Request to ${url} timed out after ${timeoutMs}ms`,
        "timeout",
      );
    }
    throw new NetworkError(`Failed to fetch ${url}: ${describeError(error)}`);
  }

  if (!response.ok) {
    await discardBody(response);
    const status = [String(response.status), response.statusText]
      .filter(Boolean)
      .join(" ");
    throw new HttpStatusError(`HTTP ${status} for ${url}`, response.status);
  }

  return response;
}

/**
 * Read a response body as UTF-8 text, streaming it with a byte cap.
 *
 * A declared `Content-Length` over the cap is rejected before any byte is
 * read; otherwise the count is enforced chunk by chunk and the stream is
 * cancelled as soon as it passes the cap.
 *
 * @param maxBytes - Byte cap; defaults to `config.maxResponseSize`.
 *
 * @throws {ResponseTooLargeError} If the body exceeds `maxBytes`.
 * @throws {NetworkError} If the connection drops or the request times out
 *   while the body streams in.
 */
export async function readBody(
  response: Response,
  url: string,
  maxBytes: number = config.maxResponseSize,
): Promise<string> {
  const declaredSize = parseInt(response.headers.get("content-length") ?? "", 10);
  if (Number.isFinite(declaredSize) && declaredSize > maxBytes) {
    await discardBody(response);
    throw new ResponseTooLargeError(
      `Response Content-Length (${declaredSize} bytes) from ${url} exceeds limit of ${maxBytes} bytes`,
      maxBytes,
    );
  }

  if (!response.body) {
    return "";
  }

  const reader = response.body.getReader();
  // malformed sequences become U+FFFD instead of throwing
  const decoder = new TextDecoder("utf-8", { fatal: false });
  const chunks: string[] = [];
  let totalBytes = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }

      totalBytes += value.byteLength;
      if (totalBytes > maxBytes) {
        await reader.cancel();
        throw new ResponseTooLargeError(
          `Response body from ${url} exceeds limit of ${maxBytes} bytes`,
          maxBytes,
        );
      }

      chunks.push(decoder.decode(value, { stream: true }));
    }
    chunks.push(decoder.decode());
  } catch (error) {
    if (error instanceof ResponseTooLargeError) {
      throw error;
    }
    if (isTimeout(error)) {
      throw new NetworkError(
        `Request to ${url} timed out while reading the response body`,
        "timeout",
      );
    }
    throw new NetworkError(
      `Error reading response body from ${url}: ${describeError(error)}`,
    );
  }

  return chunks.join("");
}

/**
 * Fetch the detail page for a slug.
 *
 * Exactly one outbound request per call.
 *
 * @param identifier - Path-safe slug (see `classifyInput`).
 *
 * @throws {NetworkError} On connection failure, timeout, or body read failure.
 * @throws {HttpStatusError} On any non-2xx response (404 for unknown slugs).
 * @throws {ResponseTooLargeError} If the body exceeds `config.maxResponseSize`.
 * @throws {UnexpectedContentTypeError} If the response is not markup or text.
 *
 * @example
 * ```typescript
 * const page = await fetchPage("mocking-spongebob");
 * page.url; // "https://knowyourmeme.com/memes/mocking-spongebob"
 * ```
 */
export async function fetchPage(
  identifier: string,
  options: RequestOptions = {},
): Promise<PageResult> {
  const url = buildMemeUrl(identifier);
  const response = await requestUrl(
    url,
    "text/html, application/xhtml+xml, */*;q=0.1",
    options,
  );

  const contentType = response.headers.get("content-type");
  const mimeType = extractMimeType(contentType);
  if (!PAGE_CONTENT_TYPES.has(mimeType)) {
    await discardBody(response);
    throw new UnexpectedContentTypeError(
      `Unexpected Content-Type: "${mimeType || "(none)"}" for ${url}. ` +
        `Expected one of: ${Array.from(PAGE_CONTENT_TYPES).join(", ")}`,
      mimeType,
    );
  }

  const html = await readBody(response, url);

  return {
    identifier,
    // constructed Responses (and some proxies) report an empty url
    url: response.url || url,
    html,
    contentType: contentType ?? mimeType,
    statusCode: response.status,
  };
}
