import type { UnknownRecord } from "./types.js";

/**
 * Error codes raised while assembling a documentation model.
 */
export const ModelAssemblyErrorCodes = {
  /** The definition does not match the definition schema */
  INVALID_DEFINITION: "INVALID_DEFINITION",
  /** Two nodes declare the same explicit id */
  DUPLICATE_NODE_ID: "DUPLICATE_NODE_ID",
  /** A reference names an id that no node carries */
  UNRESOLVED_REFERENCE: "UNRESOLVED_REFERENCE",
} as const;

export type ModelAssemblyErrorCode =
  (typeof ModelAssemblyErrorCodes)[keyof typeof ModelAssemblyErrorCodes];

/**
 * Error thrown when a definition cannot be turned into a documentation model.
 *
 * @example
 * ```typescript
 * try {
 *   assembleDocumentationModel(json);
 * } catch (error) {
 *   if (ModelAssemblyError.hasCode(error, "UNRESOLVED_REFERENCE")) {
 *     console.error(error.context?.["reference"]);
 *   }
 * }
 * ```
 */
export class ModelAssemblyError extends Error {
  readonly code: ModelAssemblyErrorCode;
  readonly context?: UnknownRecord;

  constructor(code: ModelAssemblyErrorCode, message: string, context?: UnknownRecord) {
    super(message);
    this.name = "ModelAssemblyError";
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    Object.setPrototypeOf(this, ModelAssemblyError.prototype);
  }

  static isModelAssemblyError(error: unknown): error is ModelAssemblyError {
    return error instanceof ModelAssemblyError;
  }

  static hasCode(error: unknown, code: ModelAssemblyErrorCode): error is ModelAssemblyError {
    return ModelAssemblyError.isModelAssemblyError(error) && error.code === code;
  }
}
