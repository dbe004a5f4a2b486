import type { UnknownRecord } from "@docweave/doc-model";

export const FormatConfigErrorCodes = {
  /** Format service options failed validation */
  INVALID_FORMAT_OPTIONS: "INVALID_FORMAT_OPTIONS",
} as const;

export type FormatConfigErrorCode =
  (typeof FormatConfigErrorCodes)[keyof typeof FormatConfigErrorCodes];

/**
 * Error thrown when a format service is configured with invalid options.
 *
 * Rendering itself raises no errors of its own: failures of the location or
 * language service propagate unchanged.
 */
export class FormatConfigError extends Error {
  readonly code: FormatConfigErrorCode;
  readonly context?: UnknownRecord;

  constructor(code: FormatConfigErrorCode, message: string, context?: UnknownRecord) {
    super(message);
    this.name = "FormatConfigError";
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    Object.setPrototypeOf(this, FormatConfigError.prototype);
  }

  static isFormatConfigError(error: unknown): error is FormatConfigError {
    return error instanceof FormatConfigError;
  }
}
