/**
 * Shared type helpers for @docweave/doc-model.
 */

/**
 * Alias for Record<string, unknown>, used for error context and log data.
 */
export type UnknownRecord = Record<string, unknown>;

/**
 * Exhaustiveness check helper for switch statements on discriminated unions.
 *
 * @throws Error if reached at runtime (indicates a missing case)
 */
export function assertNever(x: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${JSON.stringify(x)}`);
}
