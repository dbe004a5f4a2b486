/**
 * In-process stand-ins for the rendering collaborators.
 *
 * Real pipelines supply their own page layout and signature renderer; tests
 * need deterministic ones that make expected output easy to derive by hand.
 *
 * @module @docweave/doc-model/testing
 */

import type { ContentNode } from "../content.js";
import { block, identifier, keyword, text } from "../content.js";
import type { DocumentationNode } from "../node.js";
import type { LanguageService, Location, LocationService } from "../services.js";

/**
 * Location service that names pages after the target's name path.
 *
 * `relativeLocation(anything, collections/List, "html")` → `{ path: "collections/List.html" }`.
 * Overloads share a name path and therefore a location.
 */
export function createPathLocationService(): LocationService {
  return {
    relativeLocation(
      _from: Location | DocumentationNode,
      to: DocumentationNode,
      extension: string
    ): Location {
      return { path: `${to.path.map((node) => node.name).join("/")}.${extension}` };
    },
  };
}

/**
 * A single `relativeLocation` call captured by a recording location service.
 */
export interface LocationCall {
  readonly from: Location | DocumentationNode;
  readonly to: DocumentationNode;
  readonly extension: string;
}

export interface RecordingLocationService extends LocationService {
  readonly calls: ReadonlyArray<LocationCall>;
  clear(): void;
}

/**
 * Wrap a location service and record every call made to it.
 *
 * @param inner - Service that computes the locations (default: path-based)
 */
export function createRecordingLocationService(
  inner: LocationService = createPathLocationService()
): RecordingLocationService {
  const calls: LocationCall[] = [];

  return {
    get calls(): ReadonlyArray<LocationCall> {
      return calls;
    },

    clear(): void {
      calls.length = 0;
    },

    relativeLocation(
      from: Location | DocumentationNode,
      to: DocumentationNode,
      extension: string
    ): Location {
      calls.push({ from, to, extension });
      return inner.relativeLocation(from, to, extension);
    },
  };
}

/**
 * Language service rendering `<kind> <name>`, e.g. `function first`.
 *
 * @param signatures - Per-id overrides, for overloads that need distinct signatures
 */
export function createSignatureLanguageService(
  signatures: Readonly<Record<string, ContentNode>> = {}
): LanguageService {
  return {
    render(node: DocumentationNode): ContentNode {
      return (
        signatures[node.id] ??
        block(keyword(node.kind.toLowerCase()), text(" "), identifier(node.name))
      );
    },
  };
}
