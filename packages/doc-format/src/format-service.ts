import type { DocumentationNode, Location } from "@docweave/doc-model";
import type { OutputBuffer } from "./output.js";

/**
 * A page renderer for one output format.
 *
 * `renderTree` and `renderOutline` write into a caller-owned buffer; `format`
 * and `formatOutline` allocate one per call and return its text.
 */
export interface FormatService {
  /** File extension of the produced pages, without the dot */
  readonly extension: string;

  renderTree(location: Location, to: OutputBuffer, nodes: readonly DocumentationNode[]): void;

  renderOutline(location: Location, to: OutputBuffer, nodes: readonly DocumentationNode[]): void;

  format(location: Location, nodes: readonly DocumentationNode[]): string;

  formatOutline(location: Location, nodes: readonly DocumentationNode[]): string;
}
