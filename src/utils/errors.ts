/**
 * @module utils/errors
 * @fileoverview Custom error class hierarchy for meme-lookup-mcp.
 *
 * Every error in this application extends {@link MemeLookupError}, which
 * carries a machine-readable `code` string alongside the human-readable
 * `message`. Tool responses include both, and library callers can branch on
 * `instanceof` or on `code`.
 *
 * ## Error Hierarchy
 * ```
 * Error (built-in)
 *   └── MemeLookupError (base)       ─── code: string
 *         ├── EmptyInputError              ─── "EMPTY_INPUT"
 *         ├── UnsupportedUrlKindError      ─── "UNSUPPORTED_URL_KIND"
 *         ├── NetworkError                 ─── "NETWORK_ERROR"  + reason
 *         ├── HttpStatusError              ─── "HTTP_STATUS"    + statusCode
 *         ├── UnexpectedContentTypeError   ─── "UNEXPECTED_CONTENT_TYPE"
 *         ├── ResponseTooLargeError        ─── "RESPONSE_TOO_LARGE" + limit
 *         ├── StructureNotFoundError       ─── "STRUCTURE_NOT_FOUND" + region
 *         ├── EmptyQueryError              ─── "EMPTY_QUERY"
 *         ├── MalformedResponseError       ─── "MALFORMED_RESPONSE"
 *         ├── NoResultsError               ─── "NO_RESULTS"
 *         └── NoConfidentMatchError        ─── "NO_CONFIDENT_MATCH" + score
 * ```
 *
 * The groups a caller usually cares about:
 * - input was invalid: `EMPTY_INPUT`, `EMPTY_QUERY`, `UNSUPPORTED_URL_KIND`
 * - the network failed: `NETWORK_ERROR`, `HTTP_STATUS`, `RESPONSE_TOO_LARGE`
 * - the upstream site changed shape: `UNEXPECTED_CONTENT_TYPE`,
 *   `STRUCTURE_NOT_FOUND`, `MALFORMED_RESPONSE`
 * - no good match exists: `NO_RESULTS`, `NO_CONFIDENT_MATCH`
 *
 * @example
 * ```ts
 * import { HttpStatusError, formatErrorForTool } from "./utils/errors.js";
 *
 * try {
 *   throw new HttpStatusError("HTTP 404 Not Found for https://knowyourmeme.com/memes/nope", 404);
 * } catch (err) {
 *   formatErrorForTool(err);
 *   // => "[HTTP_STATUS] HTTP 404 Not Found for https://knowyourmeme.com/memes/nope"
 * }
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Base Error Class
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Base error class for all meme-lookup-mcp errors.
 *
 * Subclasses get a stable {@link code} and a `name` equal to the class name,
 * so stack traces read "HttpStatusError:" rather than "Error:".
 */
export class MemeLookupError extends Error {
  /**
   * Machine-readable error code (SCREAMING_SNAKE_CASE).
   *
   * Codes are part of the public API surface; changing one is a breaking change.
   */
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Input Errors
 * ──────────────────────────────────────────────────────────────────────────── */

/** Thrown when fetch-mode input is blank after trimming. */
export class EmptyInputError extends MemeLookupError {
  constructor(message = "Input must not be empty") {
    super(message, "EMPTY_INPUT");
  }
}

/**
 * Thrown when a URL was given but it does not point at a single meme detail
 * page (`/memes/<slug>`), or uses a scheme other than http/https.
 */
export class UnsupportedUrlKindError extends MemeLookupError {
  /** The URL as the caller supplied it. */
  public readonly url: string;

  constructor(url: string) {
    super(
      `Unsupported URL: ${url} (expected a meme page like https://knowyourmeme.com/memes/<slug>)`,
      "UNSUPPORTED_URL_KIND",
    );
    this.url = url;
  }
}

/** Thrown when a search query is blank after trimming. */
export class EmptyQueryError extends MemeLookupError {
  constructor(message = "Search query must not be empty") {
    super(message, "EMPTY_QUERY");
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Transport Errors
 * ──────────────────────────────────────────────────────────────────────────── */

/** Why a request never produced an HTTP response. */
export type NetworkFailureReason = "connection" | "timeout";

/**
 * Thrown when a request fails before an HTTP response arrives (DNS, TCP,
 * TLS, timeout) or while its body is being read.
 */
export class NetworkError extends MemeLookupError {
  public readonly reason: NetworkFailureReason;

  constructor(message: string, reason: NetworkFailureReason = "connection") {
    super(message, "NETWORK_ERROR");
    this.reason = reason;
  }
}

/**
 * Thrown when the server answered with a non-2xx status.
 *
 * @example
 * ```ts
 * throw new HttpStatusError("HTTP 503 Service Unavailable for https://knowyourmeme.com/memes/x", 503);
 * ```
 */
export class HttpStatusError extends MemeLookupError {
  public readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message, "HTTP_STATUS");
    this.statusCode = statusCode;
  }
}

/** Thrown when a detail page response is not markup or text. */
export class UnexpectedContentTypeError extends MemeLookupError {
  /** The MIME type the server sent, or `""` when the header was missing. */
  public readonly contentType: string;

  constructor(message: string, contentType: string) {
    super(message, "UNEXPECTED_CONTENT_TYPE");
    this.contentType = contentType;
  }
}

/**
 * Thrown when a response body exceeds the configured size limit.
 *
 * @example
 * ```ts
 * throw new ResponseTooLargeError(
 *   "Response body from https://knowyourmeme.com/memes/x exceeds limit of 10485760 bytes",
 *   10485760,
 * );
 * ```
 */
export class ResponseTooLargeError extends MemeLookupError {
  /** The byte limit that was exceeded. */
  public readonly limit: number;

  constructor(message: string, limit: number) {
    super(message, "RESPONSE_TOO_LARGE");
    this.limit = limit;
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Upstream Shape Errors
 * ──────────────────────────────────────────────────────────────────────────── */

/** The page region that could not be located. */
export type PageRegion = "title" | "about";

/**
 * Thrown when the detail page lacks the heading or the About block.
 *
 * A page that does not match the documented structure means the site's
 * markup has diverged; callers never receive a record with empty fields.
 */
export class StructureNotFoundError extends MemeLookupError {
  public readonly region: PageRegion;

  constructor(message: string, region: PageRegion) {
    super(message, "STRUCTURE_NOT_FOUND");
    this.region = region;
  }
}

/** Thrown when the quick-results payload is not JSON of the expected shape. */
export class MalformedResponseError extends MemeLookupError {
  constructor(message: string) {
    super(message, "MALFORMED_RESPONSE");
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Match Errors
 * ──────────────────────────────────────────────────────────────────────────── */

/** Thrown when the quick-results backend returned no usable candidates. */
export class NoResultsError extends MemeLookupError {
  public readonly query: string;

  constructor(query: string) {
    super(`No results for "${query}"`, "NO_RESULTS");
    this.query = query;
  }
}

/**
 * Thrown when the best candidate scored below the acceptance threshold.
 *
 * @example
 * ```ts
 * throw new NoConfidentMatchError("doge", "Dogecoin", 0.47, 0.5);
 * // message: 'No confident match for "doge": best was "Dogecoin" (0.470 < 0.500)'
 * ```
 */
export class NoConfidentMatchError extends MemeLookupError {
  public readonly query: string;
  public readonly bestLabel: string;
  public readonly bestScore: number;
  public readonly threshold: number;

  constructor(
    query: string,
    bestLabel: string,
    bestScore: number,
    threshold: number,
  ) {
    super(
      `No confident match for "${query}": best was "${bestLabel}" ` +
        `(${bestScore.toFixed(3)} < ${threshold.toFixed(3)})`,
      "NO_CONFIDENT_MATCH",
    );
    this.query = query;
    this.bestLabel = bestLabel;
    this.bestScore = bestScore;
    this.threshold = threshold;
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Error Formatting
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Convert any error (known or unknown) to a single-line string for an MCP
 * tool response.
 *
 * - {@link MemeLookupError} subclasses: `"[CODE] message"`
 * - Standard `Error` instances: just the `.message`
 * - Everything else: coerced via `String()`
 *
 * @example
 * ```ts
 * formatErrorForTool(new EmptyQueryError());
 * // => "[EMPTY_QUERY] Search query must not be empty"
 *
 * formatErrorForTool(new TypeError("boom"));
 * // => "boom"
 * ```
 */
export function formatErrorForTool(error: unknown): string {
  if (error instanceof MemeLookupError) {
    return `[${error.code}] ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
