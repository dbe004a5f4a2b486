/**
 * Shared fixtures for formatter tests.
 */
import type { ContentNode, Location } from "@docweave/doc-model";
import {
  createRecordingLocationService,
  createSignatureLanguageService,
  type RecordingLocationService,
} from "@docweave/doc-model/testing";
import { createHtmlPrimitives } from "../../src/html/primitives.js";
import type { Logger } from "../../src/logging/types.js";
import { OutputBuffer } from "../../src/output.js";
import {
  createStructuredFormatter,
  type StructuredFormatter,
} from "../../src/structured/formatter.js";

/** Location of the page under test */
export const PAGE: Location = { path: "index.html" };

export interface HtmlFixture {
  formatter: StructuredFormatter;
  locationService: RecordingLocationService;
  render(write: (formatter: StructuredFormatter, to: OutputBuffer) => void): string;
}

/**
 * Structured formatter with HTML primitives, a recording path-based location
 * service and the `<kind> <name>` signature renderer.
 */
export function createHtmlFixture(
  signatures: Readonly<Record<string, ContentNode>> = {},
  logger?: Logger
): HtmlFixture {
  const locationService = createRecordingLocationService();
  const formatter = createStructuredFormatter(createHtmlPrimitives(), {
    locationService,
    languageService: createSignatureLanguageService(signatures),
    ...(logger !== undefined ? { logger } : {}),
  });

  return {
    formatter,
    locationService,
    render(write) {
      const to = new OutputBuffer();
      write(formatter, to);
      return to.toString();
    },
  };
}

/**
 * Join expected output lines, each terminated by a newline.
 */
export function lines(...values: string[]): string {
  return values.map((value) => `${value}\n`).join("");
}
