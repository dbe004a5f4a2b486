/**
 * Logging Types
 *
 * Logger interface and level ordering for the renderers. Rendering is a
 * synchronous walk, so four levels are enough:
 *
 * - DEBUG: Service construction, per-tree and per-section progress
 * - INFO: Pipeline milestones reported by callers
 * - WARN: Suspicious but renderable input
 * - ERROR: Failures surfaced to the caller
 */

import type { UnknownRecord } from "@docweave/doc-model";

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

/**
 * Priority mapping for log levels. Lower numbers are more verbose.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

export const LOG_LEVELS = ["DEBUG", "INFO", "WARN", "ERROR"] as const satisfies readonly LogLevel[];

export const DEFAULT_LOG_LEVEL: LogLevel = "INFO";

/**
 * Logger with one method per level. `data` is structured context appended to
 * the message.
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger("Format:html", "DEBUG");
 *
 * logger.debug("Section rendered", { caption: "Functions", rows: 3 });
 * logger.info("Page rendered", { nodes: 1 });
 * ```
 */
export interface Logger {
  debug(message: string, data?: UnknownRecord): void;
  info(message: string, data?: UnknownRecord): void;
  warn(message: string, data?: UnknownRecord): void;
  error(message: string, data?: UnknownRecord): void;
}

/**
 * Check if a message at the given level should be logged.
 *
 * @example
 * ```typescript
 * shouldLog("DEBUG", "INFO"); // false
 * shouldLog("WARN", "INFO");  // true
 * ```
 */
export function shouldLog(messageLevel: LogLevel, configuredLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[messageLevel] >= LOG_LEVEL_PRIORITY[configuredLevel];
}
