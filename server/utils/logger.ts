/**
 * Global Logging Utility
 *
 * Structured JSON logging for the portal and the model pipeline, backed by pino.
 *
 * Environment Variables:
 * - LOG_LEVEL: Minimum log level (debug, info, warn, error, silent). Default: "info"
 * - LOG_USER_CONTENT: Set to "1" or "true" to log question/feedback text.
 *   Default: disabled (only logs length)
 *
 * SAFETY CONSTRAINTS:
 * - Never log secrets, session tokens or password hashes
 * - Truncate prompts and model output to reasonable lengths
 * - User-provided text is redacted by default (only logs length)
 */

import { pino, type Logger } from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  requestId?: string;
  userId?: string;
  stage?: string;
  [key: string]: unknown;
}

const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

function resolveLevel(raw: string | undefined): (typeof LOG_LEVELS)[number] {
  const match = LOG_LEVELS.find((level) => level === raw);
  return match ?? "info";
}

const LOG_USER_CONTENT_ENABLED =
  process.env.LOG_USER_CONTENT === "1" ||
  process.env.LOG_USER_CONTENT === "true";

const rootLogger: Logger = pino({
  level: resolveLevel(process.env.LOG_LEVEL),
  base: { service: "civicassist" },
  timestamp: pino.stdTimeFunctions.isoTime,
  messageKey: "message",
});

export function getLogger(): Logger {
  return rootLogger;
}

/**
 * Core logging function.
 *
 * @param message - Short message identifier (e.g., "model_fallback_loaded")
 */
export function log(
  level: LogLevel,
  message: string,
  context: LogContext = {}
): void {
  rootLogger[level](context, message);
}

export const logDebug = (msg: string, ctx?: LogContext) =>
  log("debug", msg, ctx);

export const logInfo = (msg: string, ctx?: LogContext) =>
  log("info", msg, ctx);

export const logWarn = (msg: string, ctx?: LogContext) =>
  log("warn", msg, ctx);

export const logError = (msg: string, ctx?: LogContext) =>
  log("error", msg, ctx);

/**
 * Helper to truncate long strings for logging
 */
export function truncate(text: string | undefined | null, maxLen = 1000): string | undefined {
  if (!text) return undefined;
  return text.length > maxLen ? text.slice(0, maxLen) + "…[truncated]" : text;
}

/**
 * Sanitize user-provided content for logging.
 * By default, redacts the full content and only returns length info.
 * Enable LOG_USER_CONTENT=1 to log actual content (truncated).
 */
export function sanitizeUserContent(content: string | undefined | null, maxLen = 100): string | undefined {
  if (!content) return undefined;

  if (LOG_USER_CONTENT_ENABLED) {
    return truncate(content, maxLen);
  }

  return `[redacted, length=${content.length}]`;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
