/**
 * ## Documentation Node - The Rendered Model
 *
 * A node is one declaration of the documented API: a package, a class, a
 * function, a parameter. Nodes form a tree through `members` and `owner`, and
 * reference each other sideways through `extensions`, `inheritors` and `links`.
 *
 * Nodes are read-only once assembled. Renderers walk them but never change them.
 */

import type { ContentNode, DocumentationContent } from "./content.js";
import type { NodeKind } from "./kinds.js";

export interface DocumentationNode {
  /** Unique key within the model (explicit, or the slash-joined name path) */
  readonly id: string;
  readonly name: string;
  readonly kind: NodeKind;
  /** Description and labelled sections */
  readonly content: DocumentationContent;
  /** One-line summary shown in member tables */
  readonly summary: readonly ContentNode[];
  /** Children in declaration order */
  readonly members: readonly DocumentationNode[];
  readonly extensions: readonly DocumentationNode[];
  readonly inheritors: readonly DocumentationNode[];
  readonly links: readonly DocumentationNode[];
  /** Parent node, `undefined` for the root */
  readonly owner: DocumentationNode | undefined;
  /** Ancestor chain from the root down to and including this node */
  readonly path: readonly DocumentationNode[];
}

/**
 * Members of the given kinds, in declaration order.
 *
 * @example
 * ```typescript
 * const functions = membersOfKind(pkg, "Function");
 * const types = membersOfKind(pkg, ...TYPE_KINDS);
 * ```
 */
export function membersOfKind(
  node: DocumentationNode,
  ...kinds: readonly NodeKind[]
): readonly DocumentationNode[] {
  return node.members.filter((member) => kinds.includes(member.kind));
}

/**
 * Members whose kind is none of the given kinds, in declaration order.
 */
export function membersNotOfKind(
  node: DocumentationNode,
  ...kinds: readonly NodeKind[]
): readonly DocumentationNode[] {
  return node.members.filter((member) => !kinds.includes(member.kind));
}
