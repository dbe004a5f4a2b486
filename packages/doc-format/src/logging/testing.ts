/**
 * Mock loggers that capture log calls for assertions.
 *
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * const service = createHtmlFormatService(services, { logger });
 *
 * service.format(location, [root]);
 *
 * expect(logger.hasLoggedAt("DEBUG", "Section rendered")).toBe(true);
 * ```
 */

import type { UnknownRecord } from "@docweave/doc-model";
import type { Logger, LogLevel } from "./types.js";
import { shouldLog } from "./types.js";

/**
 * A single captured log call.
 */
export interface LogCall {
  level: LogLevel;
  message: string;
  /** `undefined` when no data was passed */
  data: UnknownRecord | undefined;
}

export interface MockLogger extends Logger {
  readonly calls: ReadonlyArray<LogCall>;
  clear(): void;
  getCallsAtLevel(level: LogLevel): ReadonlyArray<LogCall>;
  /** Partial match on the message */
  hasLoggedAt(level: LogLevel, message: string): boolean;
  getLastCallAt(level: LogLevel): LogCall | undefined;
}

/**
 * Create a mock logger capturing every call.
 */
export function createMockLogger(): MockLogger {
  return createFilteredMockLogger("DEBUG");
}

/**
 * Create a mock logger capturing only calls at or above `minLevel`.
 */
export function createFilteredMockLogger(minLevel: LogLevel): MockLogger {
  const calls: LogCall[] = [];

  const logMethod =
    (level: LogLevel) =>
    (message: string, data?: UnknownRecord): void => {
      if (shouldLog(level, minLevel)) {
        calls.push({ level, message, data });
      }
    };

  return {
    get calls(): ReadonlyArray<LogCall> {
      return calls;
    },

    clear(): void {
      calls.length = 0;
    },

    getCallsAtLevel(level: LogLevel): ReadonlyArray<LogCall> {
      return calls.filter((call) => call.level === level);
    },

    hasLoggedAt(level: LogLevel, message: string): boolean {
      return calls.some((call) => call.level === level && call.message.includes(message));
    },

    getLastCallAt(level: LogLevel): LogCall | undefined {
      const levelCalls = calls.filter((call) => call.level === level);
      return levelCalls[levelCalls.length - 1];
    },

    debug: logMethod("DEBUG"),
    info: logMethod("INFO"),
    warn: logMethod("WARN"),
    error: logMethod("ERROR"),
  };
}
