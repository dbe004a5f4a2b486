import type { OutputBuffer } from "../output.js";
import { escapeHtml } from "./escape.js";

/**
 * Writes the page markup around the rendered documentation body.
 */
export interface HtmlTemplateService {
  appendHeader(to: OutputBuffer): void;
  appendFooter(to: OutputBuffer): void;
}

export interface DefaultHtmlTemplateOptions {
  readonly title?: string | undefined;
  /** Stylesheet href, written as is */
  readonly stylesheet?: string | undefined;
  readonly charset?: string | undefined;
}

/**
 * Minimal page skeleton: doctype, head with charset, optional title and
 * stylesheet link, and an open body.
 *
 * @example
 * ```typescript
 * const template = createDefaultHtmlTemplate({ title: "collections", stylesheet: "../style.css" });
 * ```
 */
export function createDefaultHtmlTemplate(
  options: DefaultHtmlTemplateOptions = {}
): HtmlTemplateService {
  const { title, stylesheet, charset = "utf-8" } = options;

  return {
    appendHeader(to: OutputBuffer): void {
      to.appendLine("<!DOCTYPE html>");
      to.appendLine("<html>");
      to.appendLine("<head>");
      to.appendLine(`<meta charset="${escapeHtml(charset)}">`);
      if (title !== undefined) {
        to.appendLine(`<title>${escapeHtml(title)}</title>`);
      }
      if (stylesheet !== undefined) {
        to.appendLine(`<link rel="stylesheet" href="${stylesheet}">`);
      }
      to.appendLine("</head>");
      to.appendLine("<body>");
    },

    appendFooter(to: OutputBuffer): void {
      to.appendLine("</body>");
      to.appendLine("</html>");
    },
  };
}

/**
 * Template that writes nothing, for embedding fragments into an existing page.
 */
export function createFragmentTemplate(): HtmlTemplateService {
  return {
    appendHeader: () => {},
    appendFooter: () => {},
  };
}
