/**
 * ## Rendering Collaborators
 *
 * Contracts the formatter consumes but does not implement. Page naming and
 * signature rendering belong to whoever drives the documentation pipeline.
 */

import type { ContentNode } from "./content.js";
import type { DocumentationNode } from "./node.js";

/**
 * An opaque destination. Only `path` is read by renderers, and it is written
 * into markup as is.
 */
export interface Location {
  readonly path: string;
}

/**
 * Resolves where a link from one place to a node should point.
 *
 * Must be deterministic for a given `(from, to, extension)` triple: the
 * formatter groups members by the resolved path.
 */
export interface LocationService {
  relativeLocation(
    from: Location | DocumentationNode,
    to: DocumentationNode,
    extension: string
  ): Location;
}

/**
 * Renders the declaration of a node (its signature) as content.
 */
export interface LanguageService {
  render(node: DocumentationNode): ContentNode;
}

