/**
 * ## Format Options
 *
 * Plain options accepted by the HTML format service, validated with zod so
 * options read from a JSON config file fail early and with the offending path.
 *
 * | Option | Default | Effect |
 * |--------|---------|--------|
 * | `title` | none | `<title>` of the default template |
 * | `stylesheet` | none | stylesheet link of the default template |
 * | `charset` | `utf-8` | `<meta charset>` of the default template |
 * | `logLevel` | `INFO` | level of the default scoped logger |
 */

import { z } from "zod";
import { FormatConfigError } from "./errors.js";
import { DEFAULT_LOG_LEVEL, LOG_LEVELS } from "./logging/types.js";

export const HtmlFormatOptionsSchema = z.object({
  title: z.string().optional(),
  stylesheet: z.string().min(1).optional(),
  charset: z.string().min(1).default("utf-8"),
  logLevel: z.enum(LOG_LEVELS).default(DEFAULT_LOG_LEVEL),
});

/** Options as accepted (defaults optional) */
export type HtmlFormatOptionsInput = z.input<typeof HtmlFormatOptionsSchema>;

/** Options after defaults are applied */
export type HtmlFormatOptions = z.output<typeof HtmlFormatOptionsSchema>;

/**
 * Validate options and apply defaults.
 *
 * @throws FormatConfigError with code INVALID_FORMAT_OPTIONS
 */
export function parseHtmlFormatOptions(options: unknown = {}): HtmlFormatOptions {
  const result = HtmlFormatOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new FormatConfigError("INVALID_FORMAT_OPTIONS", "Invalid HTML format options", {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }
  return result.data;
}
