/**
 * ## Format Primitives - One Output Syntax
 *
 * The structured formatter decides what to emit and in which order; a
 * `FormatPrimitives` record decides how each piece looks. Supplying a
 * different record is how a new output syntax is added.
 *
 * ### Escaping contract
 *
 * | Hook | Receives |
 * |------|----------|
 * | `formatText`, `formatSymbol`, `formatKeyword`, `formatIdentifier` | raw text, must escape it |
 * | `formatStrong`, `formatEmphasis`, `formatCode`, `formatList`, `formatListItem` | already formatted markup, must not escape it |
 * | `formatLink` | formatted display text; the path or href is written as is |
 * | `append*` block hooks | formatted markup, or a body callback writing into the same buffer |
 */

import type { DocumentationNode, Location } from "@docweave/doc-model";
import type { OutputBuffer } from "../output.js";

/**
 * One renderable cross-reference.
 */
export interface FormatLink {
  /** Display text, unformatted */
  readonly text: string;
  readonly location: Location;
}

/**
 * Scoped region writer: markup written by `body` lands between the block's
 * opening and closing markup.
 */
export type BlockBody = () => void;

export interface FormatPrimitives {
  /** File extension passed to the location service (e.g. "html") */
  readonly extension: string;

  // Block-level output
  appendBlockCode(to: OutputBuffer, code: string | readonly string[]): void;
  appendHeader(to: OutputBuffer, text: string, level: number): void;
  appendText(to: OutputBuffer, text: string): void;
  /** Append a line break, preceded by `text` when given */
  appendLine(to: OutputBuffer, text?: string): void;
  appendTable(to: OutputBuffer, body: BlockBody): void;
  appendTableHeader(to: OutputBuffer, body: BlockBody): void;
  appendTableBody(to: OutputBuffer, body: BlockBody): void;
  appendTableRow(to: OutputBuffer, body: BlockBody): void;
  appendTableCell(to: OutputBuffer, body: BlockBody): void;

  // Inline formatting
  formatText(text: string): string;
  formatSymbol(text: string): string;
  formatKeyword(text: string): string;
  formatIdentifier(text: string): string;
  formatLink(text: string, target: Location | string): string;
  formatStrong(text: string): string;
  formatEmphasis(text: string): string;
  formatCode(code: string): string;
  formatList(text: string): string;
  formatListItem(text: string): string;
  /** Join formatted links into one breadcrumb trail */
  formatBreadcrumbs(items: readonly FormatLink[]): string;

  // Outline
  appendOutlineHeader(to: OutputBuffer, node: DocumentationNode): void;
  appendOutlineChildren(to: OutputBuffer, nodes: readonly DocumentationNode[]): void;
}

/**
 * Value key for a link: equal keys mean equal text and equal location path.
 */
export function formatLinkKey(link: FormatLink): string {
  return JSON.stringify([link.text, link.location.path]);
}
