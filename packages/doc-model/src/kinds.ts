import { z } from "zod";

/**
 * ## Node Kinds - Documentation Node Taxonomy
 *
 * Every node of a documentation model carries one kind. The formatter's
 * member tables are organised around a handful of them; the rest exist so a
 * model can describe parameters, enum entries and the like without inventing
 * its own vocabulary.
 *
 * ### Kinds with their own member table
 *
 * | Kind | Table |
 * |------|-------|
 * | Package | Packages |
 * | Class, Interface, Enum, Object | Types |
 * | Constructor | Constructors |
 * | Property | Properties |
 * | Function | Functions |
 * | PropertyAccessor | Accessors |
 *
 * Everything else is listed under "Other members".
 */

/**
 * All valid node kinds as a readonly tuple.
 *
 * Used for iteration, validation, and type derivation.
 */
export const NODE_KINDS = [
  "Package",
  "Class",
  "Interface",
  "Enum",
  "Object",
  "Constructor",
  "Property",
  "Function",
  "PropertyAccessor",
  "Module",
  "EnumItem",
  "Parameter",
  "TypeParameter",
  "Type",
  "Supertype",
  "Annotation",
  "Modifier",
  "Exception",
  "ExternalClass",
] as const;

export type NodeKind = (typeof NODE_KINDS)[number];

/**
 * Zod schema for node kind validation.
 */
export const NodeKindSchema = z.enum(NODE_KINDS);

/**
 * Kinds rendered together in the "Types" table.
 */
export const TYPE_KINDS: readonly NodeKind[] = ["Class", "Interface", "Enum", "Object"];

/**
 * Type guard to check if a value is a valid NodeKind.
 *
 * @example
 * ```typescript
 * const kind: unknown = "Function";
 * if (isNodeKind(kind)) {
 *   // kind is now typed as NodeKind
 * }
 * ```
 */
export function isNodeKind(value: unknown): value is NodeKind {
  return typeof value === "string" && (NODE_KINDS as readonly string[]).includes(value);
}

/**
 * Check if a kind is one of the type-declaring kinds (class, interface, enum, object).
 */
export function isTypeKind(kind: NodeKind): boolean {
  return TYPE_KINDS.includes(kind);
}
