/**
 * ## assembleDocumentationModel - Definition to Linked Tree
 *
 * Validates a plain definition and builds the immutable node tree that the
 * formatter walks.
 *
 * ### Steps
 *
 * 1. Validate the definition with `DocumentationNodeDefinitionSchema`
 * 2. Create every node, setting `owner`, `path` and `id`
 * 3. Resolve id references (`extensions`, `inheritors`, `links`, `nodeLink` targets)
 * 4. Freeze the result
 *
 * Ids are either given explicitly or derived from the name path
 * (`"collections/List/size"`). Overloads share a derived id; references to it
 * reach the first declaration.
 *
 * @example
 * ```typescript
 * const model = assembleDocumentationModel(JSON.parse(source));
 * const list = model.require("collections/List");
 * ```
 */

import type { ContentNode, ContentSection, DocumentationContent } from "./content.js";
import { EMPTY_CONTENT } from "./content.js";
import { ModelAssemblyError } from "./errors.js";
import type { NodeKind } from "./kinds.js";
import type { DocumentationNode } from "./node.js";
import type {
  ContentDefinition,
  DocumentationNodeDefinition,
  SectionDefinition,
} from "./schemas.js";
import { DocumentationNodeDefinitionSchema } from "./schemas.js";
import { assertNever } from "./types.js";

/**
 * An assembled model with id lookup.
 */
export interface DocumentationModel {
  readonly root: DocumentationNode;
  /** Every node in depth-first declaration order */
  readonly nodes: readonly DocumentationNode[];
  find(id: string): DocumentationNode | undefined;
  /** @throws ModelAssemblyError with code UNRESOLVED_REFERENCE when absent */
  require(id: string): DocumentationNode;
}

interface NodeDraft {
  id: string;
  name: string;
  kind: NodeKind;
  content: DocumentationContent;
  summary: readonly ContentNode[];
  members: NodeDraft[];
  extensions: NodeDraft[];
  inheritors: NodeDraft[];
  links: NodeDraft[];
  owner: NodeDraft | undefined;
  path: NodeDraft[];
}

interface PendingNode {
  draft: NodeDraft;
  definition: DocumentationNodeDefinition;
}

/**
 * Assemble a documentation model from a plain definition.
 *
 * @param definition - Root node definition, typically parsed JSON
 * @throws ModelAssemblyError on invalid input, an explicit id shared with another node, or unknown references
 */
export function assembleDocumentationModel(definition: unknown): DocumentationModel {
  const parsed = DocumentationNodeDefinitionSchema.safeParse(definition);
  if (!parsed.success) {
    throw new ModelAssemblyError("INVALID_DEFINITION", "Invalid documentation model definition", {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }

  const byId = new Map<string, NodeDraft>();
  const explicit = new Set<NodeDraft>();
  const pending: PendingNode[] = [];

  const createDraft = (def: DocumentationNodeDefinition, owner: NodeDraft | undefined): NodeDraft => {
    const derivedId = owner === undefined ? def.name : `${owner.id}/${def.name}`;

    const draft: NodeDraft = {
      id: def.id ?? derivedId,
      name: def.name,
      kind: def.kind,
      content: EMPTY_CONTENT,
      summary: [],
      members: [],
      extensions: [],
      inheritors: [],
      links: [],
      owner,
      path: [],
    };
    draft.path = owner === undefined ? [draft] : [...owner.path, draft];
    if (def.id !== undefined) {
      explicit.add(draft);
    }
    pending.push({ draft, definition: def });

    for (const memberDef of def.members ?? []) {
      draft.members.push(createDraft(memberDef, draft));
    }
    return draft;
  };

  const root = createDraft(parsed.data, undefined);

  // Repeated derived ids (overloads) resolve to the first node; an explicit id
  // must not be shared with any other node.
  for (const { key: id, items } of groupDrafts(pending.map(({ draft }) => draft))) {
    if (items.length > 1 && items.some((draft) => explicit.has(draft))) {
      throw new ModelAssemblyError("DUPLICATE_NODE_ID", `Duplicate node id "${id}"`, { id });
    }
    const [first] = items;
    if (first !== undefined) {
      byId.set(id, first);
    }
  }

  const resolve = (reference: string, from: NodeDraft): NodeDraft => {
    const target = byId.get(reference);
    if (target === undefined) {
      throw new ModelAssemblyError(
        "UNRESOLVED_REFERENCE",
        `Node "${from.id}" references unknown node "${reference}"`,
        { from: from.id, reference }
      );
    }
    return target;
  };

  const toContent = (def: ContentDefinition, from: NodeDraft): ContentNode => {
    if (typeof def === "string") {
      return { type: "text", text: def };
    }
    switch (def.type) {
      case "text":
      case "symbol":
      case "keyword":
      case "identifier":
        return { type: def.type, text: def.text };
      case "nodeLink":
        return {
          type: "nodeLink",
          node: resolve(def.target, from),
          children: toContents(def.children, from),
        };
      case "externalLink":
        return { type: "externalLink", href: def.href, children: toContents(def.children, from) };
      case "strong":
      case "code":
      case "emphasis":
      case "list":
      case "listItem":
      case "paragraph":
      case "blockCode":
      case "block":
        return { type: def.type, children: toContents(def.children, from) };
      default:
        return assertNever(def);
    }
  };

  const toContents = (
    defs: readonly ContentDefinition[] | undefined,
    from: NodeDraft
  ): readonly ContentNode[] => (defs ?? []).map((def) => toContent(def, from));

  const toSection = (def: SectionDefinition, from: NodeDraft): ContentSection => ({
    label: def.label,
    children: toContents(def.children, from),
  });

  for (const { draft, definition: def } of pending) {
    const description = toContents(def.description, draft);
    const sections = (def.sections ?? []).map((sectionDef) => toSection(sectionDef, draft));
    draft.content =
      description.length === 0 && sections.length === 0 ? EMPTY_CONTENT : { description, sections };
    draft.summary = toContents(def.summary, draft);
    draft.extensions = (def.extensions ?? []).map((ref) => resolve(ref, draft));
    draft.inheritors = (def.inheritors ?? []).map((ref) => resolve(ref, draft));
    draft.links = (def.links ?? []).map((ref) => resolve(ref, draft));
  }

  const nodes: DocumentationNode[] = pending.map(({ draft }) => draft);
  for (const node of nodes) {
    deepFreeze(node);
  }

  return Object.freeze({
    root,
    nodes: Object.freeze(nodes),
    find(id: string): DocumentationNode | undefined {
      return byId.get(id);
    },
    require(id: string): DocumentationNode {
      const node = byId.get(id);
      if (node === undefined) {
        throw new ModelAssemblyError("UNRESOLVED_REFERENCE", `No node with id "${id}"`, {
          reference: id,
        });
      }
      return node;
    },
  });
}

function groupDrafts(drafts: readonly NodeDraft[]): { key: string; items: NodeDraft[] }[] {
  const groups = new Map<string, NodeDraft[]>();
  for (const draft of drafts) {
    const group = groups.get(draft.id);
    if (group === undefined) {
      groups.set(draft.id, [draft]);
    } else {
      group.push(draft);
    }
  }
  return [...groups].map(([key, items]) => ({ key, items }));
}

/**
 * Freeze a value and everything reachable from it. Already-frozen values are
 * skipped, which also stops the walk at node cycles (owner, path, links).
 */
function deepFreeze(value: object): void {
  if (Object.isFrozen(value)) {
    return;
  }
  Object.freeze(value);
  for (const child of Object.values(value)) {
    if (typeof child === "object" && child !== null) {
      deepFreeze(child);
    }
  }
}
