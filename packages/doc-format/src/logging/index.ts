/**
 * Logging Module
 *
 * @example
 * ```typescript
 * import { createScopedLogger, createNoOpLogger, type LogLevel } from "@docweave/doc-format";
 *
 * const logger = createScopedLogger("Format:html", "DEBUG");
 * const silent = createNoOpLogger();
 * ```
 */

// Types
export type { Logger, LogLevel } from "./types.js";
export { LOG_LEVELS, LOG_LEVEL_PRIORITY, DEFAULT_LOG_LEVEL, shouldLog } from "./types.js";

// Factories
export { createScopedLogger, createNoOpLogger, createChildLogger } from "./scoped.js";

// Testing utilities
export type { LogCall, MockLogger } from "./testing.js";
export { createMockLogger, createFilteredMockLogger } from "./testing.js";
