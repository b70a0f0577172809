/**
 * @module search/resolver
 * @fileoverview Free-text query → best matching meme record.
 *
 * ```
 *   resolveSearch(query)
 *     |
 *     +--> trim, reject blank            (EmptyQueryError, no request)
 *     +--> fetchQuickResults(query)      (request 1)
 *     +--> rankCandidates                (similarity(query, label))
 *     +--> selectBestCandidate           (threshold, first-seen tie-break)
 *     +--> fetchPage(winner.identifier)  (request 2)
 *     +--> extractMeme
 * ```
 *
 * Ranking never reorders equal scores: when several candidates share the top
 * score, the one the backend listed first wins.
 */

import { config } from "../config.js";
import { extractMeme, type MemeRecord } from "../extractor/meme-extractor.js";
import { fetchPage, type RequestOptions } from "../services/fetch.js";
import { logDebug } from "../services/logger.js";
import {
  EmptyQueryError,
  NoConfidentMatchError,
  NoResultsError,
} from "../utils/errors.js";
import { fetchQuickResults, type SearchCandidate } from "./quick-results.js";
import { similarity } from "./similarity.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

/** A candidate with its score and its position in the backend's ordering. */
export interface ScoredCandidate extends SearchCandidate {
  score: number;
  position: number;
}

export interface SearchOptions extends RequestOptions {
  /**
   * Inclusive acceptance threshold in [0, 1]. Defaults to
   * `config.matchThreshold`. `null` disables scoring and takes the backend's
   * first result.
   */
  threshold?: number | null;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Ranking
 * ──────────────────────────────────────────────────────────────────────────── */

/** Score every candidate against the query, keeping backend order. */
export function rankCandidates(
  query: string,
  candidates: readonly SearchCandidate[],
): ScoredCandidate[] {
  return candidates.map((candidate, position) => ({
    ...candidate,
    score: similarity(query, candidate.label),
    position,
  }));
}

/**
 * Pick the highest-scoring candidate, earliest on ties.
 *
 * @throws {NoResultsError} If `ranked` is empty.
 * @throws {NoConfidentMatchError} If the best score is below `threshold`.
 */
export function selectBestCandidate(
  query: string,
  ranked: readonly ScoredCandidate[],
  threshold: number,
): ScoredCandidate {
  let best: ScoredCandidate | undefined;
  for (const candidate of ranked) {
    if (best === undefined || candidate.score > best.score) {
      best = candidate;
    }
  }

  if (best === undefined) {
    throw new NoResultsError(query);
  }
  if (best.score < threshold) {
    throw new NoConfidentMatchError(query, best.label, best.score, threshold);
  }
  return best;
}

function resolveThreshold(threshold: number | null | undefined): number | null {
  if (threshold === null) {
    return null;
  }
  const value = threshold ?? config.matchThreshold;
  if (!(value >= 0 && value <= 1)) {
    throw new RangeError(`threshold must be in the range [0, 1], got ${value}`);
  }
  return value;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Resolution
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Resolve a free-text query to a meme record.
 *
 * At most two requests: one quick-results lookup and one page fetch.
 *
 * @throws {EmptyQueryError} If `query` is blank; no request is made.
 * @throws {RangeError} If `options.threshold` is outside [0, 1].
 * @throws {NoResultsError} If the backend returned no usable candidates.
 * @throws {NoConfidentMatchError} If the best candidate scored below the threshold.
 * @throws {MalformedResponseError} If the quick-results payload is unusable.
 * @throws {NetworkError | HttpStatusError | UnexpectedContentTypeError | StructureNotFoundError}
 *   From the page fetch and extraction.
 *
 * @example
 * ```ts
 * const record = await resolveSearch("all your base");
 * record.identifier; // "all-your-base-are-belong-to-us"
 * ```
 */
export async function resolveSearch(
  query: string,
  options: SearchOptions = {},
): Promise<MemeRecord> {
  const normalized = query.trim();
  if (normalized === "") {
    throw new EmptyQueryError();
  }

  const threshold = resolveThreshold(options.threshold);

  const candidates = await fetchQuickResults(normalized, options);
  if (candidates.length === 0) {
    throw new NoResultsError(normalized);
  }

  const winner =
    threshold === null
      ? candidates[0]
      : selectBestCandidate(
          normalized,
          rankCandidates(normalized, candidates),
          threshold,
        );

  logDebug("search match", {
    query: normalized,
    label: winner.label,
    identifier: winner.identifier,
    threshold,
  });

  const page = await fetchPage(winner.identifier, options);
  return extractMeme(page.html, winner.identifier);
}
