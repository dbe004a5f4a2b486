/**
 * ## Scoped Loggers
 *
 * Loggers that prefix every message with `[scope]`, drop messages below the
 * configured level and write through the runtime console.
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger("Format:html", "INFO");
 *
 * logger.debug("Suppressed");          // not logged
 * logger.info("Page rendered");        // [Format:html] Page rendered
 * logger.warn("Empty tree", { n: 0 }); // [Format:html] Empty tree {"n":0}
 * ```
 */

import type { UnknownRecord } from "@docweave/doc-model";
import type { Logger, LogLevel } from "./types.js";
import { DEFAULT_LOG_LEVEL, shouldLog } from "./types.js";

type ConsoleMethod = (...args: unknown[]) => void;

interface RuntimeConsole {
  debug: ConsoleMethod;
  info: ConsoleMethod;
  warn: ConsoleMethod;
  error: ConsoleMethod;
}

/**
 * Read the console at call time so tests can replace `globalThis.console`.
 */
function getRuntimeConsole(): RuntimeConsole {
  return globalThis.console;
}

/**
 * Create a scoped logger with level filtering.
 *
 * @param scope - Prefix for log messages (e.g., "Format:html")
 * @param level - Minimum log level to emit (default: INFO)
 */
export function createScopedLogger(scope: string, level: LogLevel = DEFAULT_LOG_LEVEL): Logger {
  const prefix = `[${scope}]`;

  const formatMessage = (message: string, data?: UnknownRecord): string => {
    if (data && Object.keys(data).length > 0) {
      return `${prefix} ${message} ${JSON.stringify(data)}`;
    }
    return `${prefix} ${message}`;
  };

  return {
    debug(message: string, data?: UnknownRecord): void {
      if (shouldLog("DEBUG", level)) {
        getRuntimeConsole().debug(formatMessage(message, data));
      }
    },

    info(message: string, data?: UnknownRecord): void {
      if (shouldLog("INFO", level)) {
        getRuntimeConsole().info(formatMessage(message, data));
      }
    },

    warn(message: string, data?: UnknownRecord): void {
      if (shouldLog("WARN", level)) {
        getRuntimeConsole().warn(formatMessage(message, data));
      }
    },

    error(message: string, data?: UnknownRecord): void {
      if (shouldLog("ERROR", level)) {
        getRuntimeConsole().error(formatMessage(message, data));
      }
    },
  };
}

/**
 * Logger that discards everything. Default when no logger is configured.
 */
export function createNoOpLogger(): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}

/**
 * Create a logger scoped as `parentScope:childScope`.
 *
 * @example
 * ```typescript
 * const sectionLogger = createChildLogger("Format", "structured", "DEBUG");
 * // Logs as [Format:structured]
 * ```
 */
export function createChildLogger(
  parentScope: string,
  childScope: string,
  level: LogLevel = DEFAULT_LOG_LEVEL
): Logger {
  return createScopedLogger(`${parentScope}:${childScope}`, level);
}
