/**
 * ## Structured Formatter - Format-Agnostic Page Assembly
 *
 * Walks documentation nodes and decides which sections a page has and in which
 * order. Every piece of markup is produced by the injected `FormatPrimitives`.
 *
 * ### Page layout produced by `renderTree`
 *
 * 1. For each distinct breadcrumb trail: breadcrumbs, then per distinct name a
 *    header, the summary block and the description block
 * 2. For each input node: one table per non-empty member category, in
 *    `MEMBER_CATEGORIES` order
 *
 * ### Failure policy
 *
 * Nothing is caught here. An error thrown by the location or language service
 * aborts the render call and reaches the caller unchanged; whatever was already
 * appended to the buffer should be discarded.
 *
 * @example
 * ```typescript
 * const formatter = createStructuredFormatter(createHtmlPrimitives(), {
 *   locationService,
 *   languageService,
 * });
 *
 * const page = new OutputBuffer();
 * formatter.renderTree({ path: "collections.html" }, page, [model.root]);
 * ```
 */

import type {
  ContentNode,
  DocumentationNode,
  LanguageService,
  Location,
  LocationService,
} from "@docweave/doc-model";
import { childrenOf, isContentEmpty } from "@docweave/doc-model";
import type { Logger } from "../logging/types.js";
import { createNoOpLogger } from "../logging/scoped.js";
import type { OutputBuffer } from "../output.js";
import { renderToString } from "../output.js";
import { MEMBER_CATEGORIES } from "./categories.js";
import { groupBy, groupByValue } from "./grouping.js";
import type { FormatLink, FormatPrimitives } from "./primitives.js";
import { formatLinkKey } from "./primitives.js";

/**
 * Labels starting with this marker are internal and never rendered.
 */
export const RESERVED_SECTION_MARKER = "$";

export interface StructuredFormatterServices {
  readonly locationService: LocationService;
  readonly languageService: LanguageService;
  /** Receives DEBUG progress; defaults to a no-op logger */
  readonly logger?: Logger;
}

export interface StructuredFormatter {
  readonly primitives: FormatPrimitives;

  /** Render content to formatted text. An empty sequence renders as "". */
  renderText(location: Location, content: ContentNode | readonly ContentNode[]): string;

  /** Link from one node to another, labelled with the target's name */
  crossLink(from: DocumentationNode, to: DocumentationNode, extension?: string): FormatLink;

  /** Format a link, escaping its display text */
  formatLink(link: FormatLink): string;

  renderDescription(location: Location, to: OutputBuffer, nodes: readonly DocumentationNode[]): void;

  renderSummary(location: Location, to: OutputBuffer, nodes: readonly DocumentationNode[]): void;

  renderLocationBlock(
    location: Location,
    to: OutputBuffer,
    nodes: readonly DocumentationNode[]
  ): void;

  renderSection(
    location: Location,
    caption: string,
    members: readonly DocumentationNode[],
    owner: DocumentationNode,
    to: OutputBuffer
  ): void;

  renderTree(location: Location, to: OutputBuffer, nodes: readonly DocumentationNode[]): void;

  renderOutline(location: Location, to: OutputBuffer, nodes: readonly DocumentationNode[]): void;
}

function isContentSequence(
  content: ContentNode | readonly ContentNode[]
): content is readonly ContentNode[] {
  return Array.isArray(content);
}

function compareNames(a: DocumentationNode, b: DocumentationNode): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Create a structured formatter for one output syntax.
 *
 * @param primitives - Markup hooks of the output syntax
 * @param services - Location and signature collaborators
 */
export function createStructuredFormatter(
  primitives: FormatPrimitives,
  services: StructuredFormatterServices
): StructuredFormatter {
  const p = primitives;
  const { locationService, languageService } = services;
  const logger = services.logger ?? createNoOpLogger();

  const renderAll = (location: Location, nodes: readonly ContentNode[]): string =>
    nodes.map((node) => renderNode(location, node)).join("");

  const renderNode = (location: Location, content: ContentNode): string => {
    switch (content.type) {
      case "text":
        return p.formatText(content.text);
      case "symbol":
        return p.formatSymbol(content.text);
      case "keyword":
        return p.formatKeyword(content.text);
      case "identifier":
        return p.formatIdentifier(content.text);
      case "strong":
        return p.formatStrong(renderAll(location, content.children));
      case "code":
        return p.formatCode(renderAll(location, content.children));
      case "emphasis":
        return p.formatEmphasis(renderAll(location, content.children));
      case "list":
        return p.formatList(renderAll(location, content.children));
      case "listItem":
        return p.formatListItem(renderAll(location, content.children));
      case "nodeLink": {
        const target = locationService.relativeLocation(location, content.node, p.extension);
        return p.formatLink(renderAll(location, content.children), target);
      }
      case "externalLink":
        return p.formatLink(renderAll(location, content.children), content.href);
      case "paragraph": {
        const body = renderAll(location, content.children);
        return renderToString((to) => p.appendText(to, body));
      }
      case "blockCode": {
        const body = renderAll(location, content.children);
        return renderToString((to) => p.appendBlockCode(to, body));
      }
      case "block":
      default:
        // Unknown variants from newer models still show their children
        return renderAll(location, childrenOf(content));
    }
  };

  const renderText = (location: Location, content: ContentNode | readonly ContentNode[]): string =>
    isContentSequence(content) ? renderAll(location, content) : renderNode(location, content);

  const renderSignature = (location: Location, node: DocumentationNode): string =>
    renderText(location, languageService.render(node));

  const crossLink = (
    from: DocumentationNode,
    to: DocumentationNode,
    extension: string = p.extension
  ): FormatLink => ({
    text: to.name,
    location: locationService.relativeLocation(from, to, extension),
  });

  const formatLink = (link: FormatLink): string =>
    p.formatLink(p.formatText(link.text), link.location);

  const renderDescription = (
    location: Location,
    to: OutputBuffer,
    nodes: readonly DocumentationNode[]
  ): void => {
    const described = nodes.filter((node) => !isContentEmpty(node.content));
    if (described.length === 0) {
      return;
    }

    const single = described.length === 1;
    p.appendHeader(to, "Description", 3);
    for (const node of described) {
      if (!single) {
        p.appendBlockCode(to, renderSignature(location, node));
      }
      p.appendLine(to, renderText(location, node.content.description));
      p.appendLine(to);

      for (const section of node.content.sections) {
        if (section.label.startsWith(RESERVED_SECTION_MARKER)) {
          continue;
        }
        // Covered by the member tables
        if (node.members.some((member) => member.name === section.label)) {
          continue;
        }
        p.appendLine(to, p.formatStrong(p.formatText(section.label)));
        p.appendLine(to, renderText(location, section.children));
      }
    }
  };

  const renderSummary = (
    location: Location,
    to: OutputBuffer,
    nodes: readonly DocumentationNode[]
  ): void => {
    const bySummary = groupBy(nodes, (node) => renderText(location, node.summary));
    for (const { key: summary, items } of bySummary) {
      for (const item of items) {
        p.appendBlockCode(to, renderSignature(location, item));
      }
      p.appendLine(to, summary);
      p.appendLine(to);
    }
  };

  const renderLocationBlock = (
    location: Location,
    to: OutputBuffer,
    nodes: readonly DocumentationNode[]
  ): void => {
    for (const { key: name, items } of groupBy(nodes, (node) => node.name)) {
      p.appendHeader(to, p.formatText(name), 1);
      renderSummary(location, to, items);
      renderDescription(location, to, items);
    }
  };

  const renderSection = (
    location: Location,
    caption: string,
    members: readonly DocumentationNode[],
    owner: DocumentationNode,
    to: OutputBuffer
  ): void => {
    if (members.length === 0) {
      return;
    }

    p.appendHeader(to, caption, 3);

    const sorted = [...members].sort(compareNames);
    const rows = groupByValue(sorted, (member) => crossLink(owner, member), formatLinkKey);

    p.appendTable(to, () => {
      p.appendTableBody(to, () => {
        for (const { key: link, items } of rows) {
          p.appendTableRow(to, () => {
            p.appendTableCell(to, () => {
              p.appendText(to, formatLink(link));
            });
            p.appendTableCell(to, () => {
              const bySummary = groupBy(items, (member) => renderText(location, member.summary));
              for (const { key: summary, items: signatures } of bySummary) {
                for (const signature of signatures) {
                  p.appendBlockCode(to, renderSignature(location, signature));
                }
                if (summary.length > 0) {
                  p.appendText(to, summary);
                }
              }
            });
          });
        }
      });
    });

    logger.debug("Section rendered", { owner: owner.id, caption, rows: rows.length });
  };

  const renderTree = (
    location: Location,
    to: OutputBuffer,
    nodes: readonly DocumentationNode[]
  ): void => {
    logger.debug("Rendering tree", { location: location.path, nodes: nodes.length });

    const byBreadcrumbs = groupBy(nodes, (node) =>
      p.formatBreadcrumbs(node.path.map((ancestor) => crossLink(node, ancestor)))
    );
    for (const { key: breadcrumbs, items } of byBreadcrumbs) {
      p.appendLine(to, breadcrumbs);
      p.appendLine(to);
      renderLocationBlock(location, to, items);
    }

    for (const node of nodes) {
      for (const category of MEMBER_CATEGORIES) {
        renderSection(location, category.caption, category.select(node), node, to);
      }
    }
  };

  const renderOutline = (
    _location: Location,
    to: OutputBuffer,
    nodes: readonly DocumentationNode[]
  ): void => {
    for (const node of nodes) {
      p.appendOutlineHeader(to, node);
      if (node.members.length > 0) {
        p.appendOutlineChildren(to, node.members);
      }
    }
  };

  return {
    primitives,
    renderText,
    crossLink,
    formatLink,
    renderDescription,
    renderSummary,
    renderLocationBlock,
    renderSection,
    renderTree,
    renderOutline,
  };
}
