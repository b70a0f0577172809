/**
 * @module config
 * @fileoverview Centralized application configuration loaded from environment variables.
 *
 * All settings have defaults, so the server starts with no environment at all.
 * This module sits at the bottom of the dependency graph: services, search,
 * extractor and tools import it, and it imports nothing from the application.
 *
 * ```
 *  +-----------+   +-----------+   +-----------+
 *  |   tools   |   |  search   |   | services  |
 *  +-----+-----+   +-----+-----+   +-----+-----+
 *        |               |               |
 *        +-------+-------+-------+-------+
 *                |               |
 *          +-----v-----+  +-----v-----+
 *          |   config  |  |   utils   |
 *          +-----------+  +-----------+
 * ```
 *
 * @example
 * ```ts
 * import { config } from "./config.js";
 * config.fetchTimeout; // 10000 (or whatever env says)
 *
 * // For testing, loadConfig() returns a fresh snapshot:
 * process.env.MATCH_THRESHOLD = "0.8";
 * loadConfig().matchThreshold; // 0.8
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

/** Log levels accepted by the winston logger. */
export type LogLevel = "error" | "warn" | "info" | "debug";

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

/**
 * Complete application configuration.
 *
 * Every field is required and has a default.
 */
export interface AppConfig {
  /**
   * Origin of the meme site. Detail pages live at `<baseUrl>/memes/<slug>`.
   *
   * @default "https://knowyourmeme.com"
   */
  baseUrl: string;

  /**
   * Quick-results ("instant links") endpoint behind the site's search bar.
   *
   * Served over plain `http://`; its TLS handshake fails on current OpenSSL.
   */
  searchEndpoint: string;

  /**
   * Number of quick results requested per search.
   *
   * @default 10
   */
  searchResultLimit: number;

  /**
   * Minimum similarity (inclusive, 0..1) the best search candidate needs.
   *
   * @default 0.5
   */
  matchThreshold: number;

  /**
   * Per-request timeout in milliseconds.
   *
   * @default 10000
   */
  fetchTimeout: number;

  /**
   * Maximum response body size in bytes; larger bodies are abandoned
   * mid-stream.
   *
   * @default 10485760 (10 MiB)
   */
  maxResponseSize: number;

  /** User-Agent header sent with every outbound request. */
  userAgent: string;

  /**
   * Minimum level written by the logger.
   *
   * @default "info"
   */
  logLevel: LogLevel;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Config Loader
 * ──────────────────────────────────────────────────────────────────────────── */

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_11_5) AppleWebKit/537.36 " +
  "(KHTML, like Gecko) Chrome/50.0.2661.102 Safari/537.36";

/** Positive integer from the environment, or `fallback` when unusable. */
function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/** Number in [0, 1] from the environment, or `fallback` when unusable. */
function parseRatio(value: string | undefined, fallback: number): number {
  const parsed = parseFloat(value ?? "");
  return Number.isFinite(parsed) && parsed >= 0 && parsed <= 1 ? parsed : fallback;
}

function parseLogLevel(value: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  return level ?? "info";
}

/**
 * Read environment variables and build a complete {@link AppConfig}.
 *
 * Pure with respect to its input: it reads `process.env` at call time and
 * returns a plain object, so tests can set env vars and call it again.
 *
 * @example
 * ```ts
 * process.env.FETCH_TIMEOUT = "30000";
 * loadConfig().fetchTimeout; // 30000
 * ```
 */
export function loadConfig(): AppConfig {
  return {
    // trailing slash dropped so URL templates can append "/memes/..."
    baseUrl: (process.env.MEME_BASE_URL ?? "https://knowyourmeme.com").replace(
      /\/+$/,
      "",
    ),
    searchEndpoint:
      process.env.MEME_SEARCH_ENDPOINT ??
      "http://rkgk.api.searchify.com/v1/indexes/kym_production/instantlinks",
    searchResultLimit: parsePositiveInt(process.env.SEARCH_RESULT_LIMIT, 10),
    matchThreshold: parseRatio(process.env.MATCH_THRESHOLD, 0.5),
    fetchTimeout: parsePositiveInt(process.env.FETCH_TIMEOUT, 10000),
    maxResponseSize: parsePositiveInt(process.env.MAX_RESPONSE_SIZE, 10485760),
    userAgent: process.env.USER_AGENT ?? DEFAULT_USER_AGENT,
    logLevel: parseLogLevel(process.env.LOG_LEVEL),
  };
}

/* ────────────────────────────────────────────────────────────────────────────
 * Singleton Export
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Pre-loaded configuration singleton, evaluated once at module load time.
 *
 * If you need a fresh config (e.g., in tests), call {@link loadConfig} directly.
 */
export const config: AppConfig = loadConfig();
