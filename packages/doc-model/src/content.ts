/**
 * ## Content Tree - Structured Documentation Text
 *
 * A documentation comment, once parsed upstream, is a tree of content nodes.
 * Leaves carry literal text; containers carry an ordered list of children.
 * The union is discriminated on `type` so renderers can switch on it.
 *
 * | Variant | Shape | Meaning |
 * |---------|-------|---------|
 * | `text` | leaf | Plain text |
 * | `symbol` | leaf | Punctuation inside a signature (`(`, `:`) |
 * | `keyword` | leaf | Language keyword inside a signature |
 * | `identifier` | leaf | Declared name inside a signature |
 * | `strong`, `emphasis`, `code` | container | Inline styling |
 * | `list`, `listItem` | container | Bulleted list |
 * | `paragraph`, `blockCode` | container | Block-level text |
 * | `nodeLink` | container | Link to another documentation node |
 * | `externalLink` | container | Link to a raw href |
 * | `block` | container | Generic grouping with no markup of its own |
 *
 * @example
 * ```typescript
 * const summary = [paragraph(text("Returns the "), strong(text("first")), text(" item."))];
 * ```
 */

import type { DocumentationNode } from "./node.js";

export interface ContentText {
  readonly type: "text";
  readonly text: string;
}

export interface ContentSymbol {
  readonly type: "symbol";
  readonly text: string;
}

export interface ContentKeyword {
  readonly type: "keyword";
  readonly text: string;
}

export interface ContentIdentifier {
  readonly type: "identifier";
  readonly text: string;
}

/**
 * Container variants that differ only by their discriminant.
 */
export type ContentContainerType =
  | "strong"
  | "code"
  | "emphasis"
  | "list"
  | "listItem"
  | "paragraph"
  | "blockCode"
  | "block";

export interface ContentContainer<TType extends ContentContainerType = ContentContainerType> {
  readonly type: TType;
  readonly children: readonly ContentNode[];
}

export interface ContentNodeLink {
  readonly type: "nodeLink";
  /** Link target inside the same documentation model */
  readonly node: DocumentationNode;
  readonly children: readonly ContentNode[];
}

export interface ContentExternalLink {
  readonly type: "externalLink";
  readonly href: string;
  readonly children: readonly ContentNode[];
}

export type ContentLeaf = ContentText | ContentSymbol | ContentKeyword | ContentIdentifier;

export type ContentNode =
  | ContentLeaf
  | ContentContainer
  | ContentNodeLink
  | ContentExternalLink;

/**
 * A labelled section of a documentation comment ("Returns", "Throws", ...).
 */
export interface ContentSection {
  readonly label: string;
  readonly children: readonly ContentNode[];
}

/**
 * The full content of a node: free-form description followed by labelled sections.
 */
export interface DocumentationContent {
  readonly description: readonly ContentNode[];
  readonly sections: readonly ContentSection[];
}

export const EMPTY_CONTENT: DocumentationContent = Object.freeze({
  description: Object.freeze([]),
  sections: Object.freeze([]),
});

/**
 * True when the content has neither a description nor sections.
 */
export function isContentEmpty(content: DocumentationContent): boolean {
  return content.description.length === 0 && content.sections.length === 0;
}

/**
 * Children of any content node; leaves have none.
 */
export function childrenOf(content: ContentNode): readonly ContentNode[] {
  return "children" in content ? content.children : [];
}

// ============================================================================
// Builders
// ============================================================================

export function text(value: string): ContentText {
  return { type: "text", text: value };
}

export function symbol(value: string): ContentSymbol {
  return { type: "symbol", text: value };
}

export function keyword(value: string): ContentKeyword {
  return { type: "keyword", text: value };
}

export function identifier(value: string): ContentIdentifier {
  return { type: "identifier", text: value };
}

function container<TType extends ContentContainerType>(
  type: TType,
  children: readonly ContentNode[]
): ContentContainer<TType> {
  return { type, children };
}

export function strong(...children: ContentNode[]): ContentContainer<"strong"> {
  return container("strong", children);
}

export function emphasis(...children: ContentNode[]): ContentContainer<"emphasis"> {
  return container("emphasis", children);
}

export function code(...children: ContentNode[]): ContentContainer<"code"> {
  return container("code", children);
}

export function list(...children: ContentNode[]): ContentContainer<"list"> {
  return container("list", children);
}

export function listItem(...children: ContentNode[]): ContentContainer<"listItem"> {
  return container("listItem", children);
}

export function paragraph(...children: ContentNode[]): ContentContainer<"paragraph"> {
  return container("paragraph", children);
}

export function blockCode(...children: ContentNode[]): ContentContainer<"blockCode"> {
  return container("blockCode", children);
}

export function block(...children: ContentNode[]): ContentContainer<"block"> {
  return container("block", children);
}

export function nodeLink(node: DocumentationNode, ...children: ContentNode[]): ContentNodeLink {
  return { type: "nodeLink", node, children };
}

export function externalLink(href: string, ...children: ContentNode[]): ContentExternalLink {
  return { type: "externalLink", href, children };
}

export function section(label: string, ...children: ContentNode[]): ContentSection {
  return { label, children };
}
