/**
 * ## HTML Primitives
 *
 * `FormatPrimitives` for HTML. The emitted tags and class names are what page
 * stylesheets select on:
 *
 * | Content | Markup |
 * |---------|--------|
 * | symbol / keyword / identifier | `<span class="symbol">`, `"keyword"`, `"identifier"` |
 * | strong / emphasis / code | `<strong>`, `<em>`, `<code>` |
 * | list / list item | `<ul>`, `<li>` |
 * | block code | `<pre><code>` |
 * | paragraph / line | `<p>` / `<br/>` |
 * | member tables | `<table>`, `<thead>`, `<tbody>`, `<tr>`, `<td>` |
 *
 * Outline rendering is not supported by this format; its hooks write nothing.
 */

import type { Location } from "@docweave/doc-model";
import type { OutputBuffer } from "../output.js";
import type { BlockBody, FormatLink, FormatPrimitives } from "../structured/primitives.js";
import { escapeHtml } from "./escape.js";

export const HTML_EXTENSION = "html";

/**
 * Breadcrumb separator, kept on one line with the links around it.
 */
export const HTML_BREADCRUMB_SEPARATOR = "&nbsp;/&nbsp;";

function appendElement(to: OutputBuffer, tag: string, body: BlockBody): void {
  to.appendLine(`<${tag}>`);
  body();
  to.appendLine(`</${tag}>`);
}

function span(className: string, text: string): string {
  return `<span class="${className}">${escapeHtml(text)}</span>`;
}

export function createHtmlPrimitives(): FormatPrimitives {
  const formatText = (text: string): string => escapeHtml(text);

  const formatLink = (text: string, target: Location | string): string => {
    const href = typeof target === "string" ? target : target.path;
    return `<a href="${href}">${text}</a>`;
  };

  return {
    extension: HTML_EXTENSION,

    appendBlockCode(to: OutputBuffer, code: string | readonly string[]): void {
      const body = typeof code === "string" ? code : code.join("\n");
      to.append(`<pre><code>${body}</code></pre>`);
    },

    appendHeader(to: OutputBuffer, text: string, level: number): void {
      to.appendLine(`<h${level}>${text}</h${level}>`);
    },

    appendText(to: OutputBuffer, text: string): void {
      to.appendLine(`<p>${text}</p>`);
    },

    appendLine(to: OutputBuffer, text?: string): void {
      to.appendLine(`${text ?? ""}<br/>`);
    },

    appendTable: (to, body) => appendElement(to, "table", body),
    appendTableHeader: (to, body) => appendElement(to, "thead", body),
    appendTableBody: (to, body) => appendElement(to, "tbody", body),
    appendTableRow: (to, body) => appendElement(to, "tr", body),
    appendTableCell: (to, body) => appendElement(to, "td", body),

    formatText,
    formatSymbol: (text) => span("symbol", text),
    formatKeyword: (text) => span("keyword", text),
    formatIdentifier: (text) => span("identifier", text),
    formatLink,
    formatStrong: (text) => `<strong>${text}</strong>`,
    formatEmphasis: (text) => `<em>${text}</em>`,
    formatCode: (code) => `<code>${code}</code>`,
    formatList: (text) => `<ul>${text}</ul>`,
    formatListItem: (text) => `<li>${text}</li>`,

    formatBreadcrumbs(items: readonly FormatLink[]): string {
      return items
        .map((item) => formatLink(formatText(item.text), item.location))
        .join(HTML_BREADCRUMB_SEPARATOR);
    },

    appendOutlineHeader: () => {},
    appendOutlineChildren: () => {},
  };
}
