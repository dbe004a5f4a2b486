/**
 * ## Member Categories - Fixed Table Order
 *
 * Every rendered node gets up to ten member tables, always in this order.
 * The first seven split `node.members` by kind with no overlap; the last
 * three list the node's side references.
 *
 * | # | Caption | Source |
 * |---|---------|--------|
 * | 1 | Packages | members of kind Package |
 * | 2 | Types | Class, Interface, Enum, Object |
 * | 3 | Constructors | Constructor |
 * | 4 | Properties | Property |
 * | 5 | Functions | Function |
 * | 6 | Accessors | PropertyAccessor |
 * | 7 | Other members | every other kind |
 * | 8 | Extensions | `node.extensions` |
 * | 9 | Inheritors | `node.inheritors` |
 * | 10 | Links | `node.links` |
 */

import type { DocumentationNode, NodeKind } from "@docweave/doc-model";
import { TYPE_KINDS, membersNotOfKind, membersOfKind } from "@docweave/doc-model";

export interface MemberCategory {
  readonly caption: string;
  select(node: DocumentationNode): readonly DocumentationNode[];
}

/**
 * Kinds that own a named table. "Other members" takes everything else.
 */
export const CATEGORISED_KINDS: readonly NodeKind[] = [
  "Package",
  ...TYPE_KINDS,
  "Constructor",
  "Property",
  "Function",
  "PropertyAccessor",
];

const byKind = (caption: string, ...kinds: NodeKind[]): MemberCategory => ({
  caption,
  select: (node) => membersOfKind(node, ...kinds),
});

export const MEMBER_CATEGORIES: readonly MemberCategory[] = [
  byKind("Packages", "Package"),
  byKind("Types", ...TYPE_KINDS),
  byKind("Constructors", "Constructor"),
  byKind("Properties", "Property"),
  byKind("Functions", "Function"),
  byKind("Accessors", "PropertyAccessor"),
  {
    caption: "Other members",
    select: (node) => membersNotOfKind(node, ...CATEGORISED_KINDS),
  },
  { caption: "Extensions", select: (node) => node.extensions },
  { caption: "Inheritors", select: (node) => node.inheritors },
  { caption: "Links", select: (node) => node.links },
];
