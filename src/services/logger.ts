/**
 * @module services/logger
 * @fileoverview Process-wide winston logger.
 *
 * Every level goes to stderr. stdout belongs to the MCP stdio transport and
 * any stray byte there corrupts the JSON-RPC stream.
 */

import winston from "winston";
import { config } from "../config.js";

const logger = winston.createLogger({
  level: config.logLevel,
  format: winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: "meme-lookup" },
  transports: [
    new winston.transports.Console({
      stderrLevels: ["error", "warn", "info", "debug"],
    }),
  ],
});

export function logInfo(message: string, meta?: Record<string, unknown>): void {
  logger.info(message, meta);
}

export function logWarn(message: string, meta?: Record<string, unknown>): void {
  logger.warn(message, meta);
}

export function logDebug(
  message: string,
  meta?: Record<string, unknown>,
): void {
  logger.debug(message, meta);
}

export function logError(
  message: string,
  error?: Error | Record<string, unknown>,
): void {
  const errorMeta =
    error instanceof Error
      ? { error: error.message, stack: error.stack }
      : error;
  logger.error(message, errorMeta);
}
