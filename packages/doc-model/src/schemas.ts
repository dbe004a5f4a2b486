/**
 * ## Definition Schemas - Plain Input for Model Assembly
 *
 * A documentation model usually arrives as JSON written by an earlier pipeline
 * stage. These schemas describe that plain shape. Cross-references are given
 * as node ids and are turned into object references by
 * `assembleDocumentationModel`.
 *
 * @example
 * ```json
 * {
 *   "name": "collections",
 *   "kind": "Package",
 *   "members": [
 *     {
 *       "name": "first",
 *       "kind": "Function",
 *       "summary": ["Returns the first element."],
 *       "links": ["collections/last"]
 *     },
 *     { "name": "last", "kind": "Function" }
 *   ]
 * }
 * ```
 */

import { z } from "zod";
import type { ContentContainerType, ContentLeaf } from "./content.js";
import type { NodeKind } from "./kinds.js";
import { NodeKindSchema } from "./kinds.js";

// ============================================================================
// Content
// ============================================================================

const LEAF_TYPES = ["text", "symbol", "keyword", "identifier"] as const;

const CONTAINER_TYPES = [
  "strong",
  "code",
  "emphasis",
  "list",
  "listItem",
  "paragraph",
  "blockCode",
  "block",
] as const;

export interface ContentLeafDefinition {
  type: ContentLeaf["type"];
  text: string;
}

export interface ContentContainerDefinition {
  type: ContentContainerType;
  children?: ContentDefinition[] | undefined;
}

export interface ContentNodeLinkDefinition {
  type: "nodeLink";
  /** Id of the linked node */
  target: string;
  children?: ContentDefinition[] | undefined;
}

export interface ContentExternalLinkDefinition {
  type: "externalLink";
  href: string;
  children?: ContentDefinition[] | undefined;
}

/**
 * A content node as plain data. A bare string is shorthand for a text leaf.
 */
export type ContentDefinition =
  | string
  | ContentLeafDefinition
  | ContentContainerDefinition
  | ContentNodeLinkDefinition
  | ContentExternalLinkDefinition;

const childrenSchema = z.array(z.lazy(() => ContentDefinitionSchema)).optional();

export const ContentDefinitionSchema: z.ZodType<ContentDefinition> = z.lazy(() =>
  z.union([
    z.string(),
    z.object({ type: z.enum(LEAF_TYPES), text: z.string() }),
    z.object({ type: z.enum(CONTAINER_TYPES), children: childrenSchema }),
    z.object({ type: z.literal("nodeLink"), target: z.string().min(1), children: childrenSchema }),
    z.object({ type: z.literal("externalLink"), href: z.string(), children: childrenSchema }),
  ])
);

export interface SectionDefinition {
  label: string;
  children?: ContentDefinition[] | undefined;
}

export const SectionDefinitionSchema: z.ZodType<SectionDefinition> = z.object({
  label: z.string(),
  children: childrenSchema,
});

// ============================================================================
// Nodes
// ============================================================================

export interface DocumentationNodeDefinition {
  /** Explicit id; defaults to the slash-joined name path */
  id?: string | undefined;
  name: string;
  kind: NodeKind;
  description?: ContentDefinition[] | undefined;
  sections?: SectionDefinition[] | undefined;
  summary?: ContentDefinition[] | undefined;
  members?: DocumentationNodeDefinition[] | undefined;
  /** Ids of extension nodes */
  extensions?: string[] | undefined;
  /** Ids of inheriting nodes */
  inheritors?: string[] | undefined;
  /** Ids of related nodes */
  links?: string[] | undefined;
}

const referencesSchema = z.array(z.string().min(1)).optional();

export const DocumentationNodeDefinitionSchema: z.ZodType<DocumentationNodeDefinition> = z.lazy(
  () =>
    z.object({
      id: z.string().min(1).optional(),
      name: z.string(),
      kind: NodeKindSchema,
      description: z.array(ContentDefinitionSchema).optional(),
      sections: z.array(SectionDefinitionSchema).optional(),
      summary: z.array(ContentDefinitionSchema).optional(),
      members: z.array(DocumentationNodeDefinitionSchema).optional(),
      extensions: referencesSchema,
      inheritors: referencesSchema,
      links: referencesSchema,
    })
);
