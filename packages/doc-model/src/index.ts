/**
 * Documentation model consumed by the docweave renderers.
 *
 * @example
 * ```typescript
 * import { assembleDocumentationModel, membersOfKind } from "@docweave/doc-model";
 *
 * const model = assembleDocumentationModel({
 *   name: "collections",
 *   kind: "Package",
 *   members: [{ name: "first", kind: "Function", summary: ["Returns the first element."] }],
 * });
 *
 * membersOfKind(model.root, "Function"); // [first]
 * ```
 *
 * @module @docweave/doc-model
 */

// Kinds
export type { NodeKind } from "./kinds.js";
export { NODE_KINDS, NodeKindSchema, TYPE_KINDS, isNodeKind, isTypeKind } from "./kinds.js";

// Content
export type {
  ContentNode,
  ContentLeaf,
  ContentText,
  ContentSymbol,
  ContentKeyword,
  ContentIdentifier,
  ContentContainer,
  ContentContainerType,
  ContentNodeLink,
  ContentExternalLink,
  ContentSection,
  DocumentationContent,
} from "./content.js";
export {
  EMPTY_CONTENT,
  isContentEmpty,
  childrenOf,
  text,
  symbol,
  keyword,
  identifier,
  strong,
  emphasis,
  code,
  list,
  listItem,
  paragraph,
  blockCode,
  block,
  nodeLink,
  externalLink,
  section,
} from "./content.js";

// Nodes
export type { DocumentationNode } from "./node.js";
export { membersOfKind, membersNotOfKind } from "./node.js";

// Collaborators
export type { Location, LocationService, LanguageService } from "./services.js";

// Assembly
export type {
  ContentDefinition,
  SectionDefinition,
  DocumentationNodeDefinition,
} from "./schemas.js";
export {
  ContentDefinitionSchema,
  SectionDefinitionSchema,
  DocumentationNodeDefinitionSchema,
} from "./schemas.js";
export type { DocumentationModel } from "./assemble.js";
export { assembleDocumentationModel } from "./assemble.js";

// Errors
export type { ModelAssemblyErrorCode } from "./errors.js";
export { ModelAssemblyError, ModelAssemblyErrorCodes } from "./errors.js";

// Utilities
export type { UnknownRecord } from "./types.js";
export { assertNever } from "./types.js";
