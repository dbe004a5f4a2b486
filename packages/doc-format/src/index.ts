/**
 * Documentation page rendering.
 *
 * A format-agnostic structured formatter walks documentation nodes and emits
 * breadcrumbs, summaries, descriptions and member tables through a set of
 * format primitives. HTML is the bundled format.
 *
 * @example
 * ```typescript
 * import { createHtmlFormatService } from "@docweave/doc-format";
 *
 * const html = createHtmlFormatService({ locationService, languageService });
 * const page = html.format({ path: "collections/index.html" }, [model.root]);
 * ```
 *
 * @module @docweave/doc-format
 */

// Output
export { OutputBuffer, renderToString } from "./output.js";

// Structured formatter
export type { BlockBody, FormatLink, FormatPrimitives } from "./structured/primitives.js";
export { formatLinkKey } from "./structured/primitives.js";
export type { Group } from "./structured/grouping.js";
export { groupBy, groupByValue } from "./structured/grouping.js";
export type { MemberCategory } from "./structured/categories.js";
export { MEMBER_CATEGORIES, CATEGORISED_KINDS } from "./structured/categories.js";
export type {
  StructuredFormatter,
  StructuredFormatterServices,
} from "./structured/formatter.js";
export { createStructuredFormatter, RESERVED_SECTION_MARKER } from "./structured/formatter.js";
export type { FormatService } from "./format-service.js";

// HTML
export { escapeHtml } from "./html/escape.js";
export {
  createHtmlPrimitives,
  HTML_EXTENSION,
  HTML_BREADCRUMB_SEPARATOR,
} from "./html/primitives.js";
export type { HtmlTemplateService, DefaultHtmlTemplateOptions } from "./html/template.js";
export { createDefaultHtmlTemplate, createFragmentTemplate } from "./html/template.js";
export type {
  HtmlFormatService,
  HtmlFormatServiceDependencies,
  HtmlFormatServiceOptions,
} from "./html/html-format-service.js";
export { createHtmlFormatService, HTML_LOGGER_SCOPE } from "./html/html-format-service.js";

// Configuration
export type { HtmlFormatOptions, HtmlFormatOptionsInput } from "./config.js";
export { HtmlFormatOptionsSchema, parseHtmlFormatOptions } from "./config.js";

// Errors
export type { FormatConfigErrorCode } from "./errors.js";
export { FormatConfigError, FormatConfigErrorCodes } from "./errors.js";

// Logging
export * from "./logging/index.js";
