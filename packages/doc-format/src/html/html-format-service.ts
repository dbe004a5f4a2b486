/**
 * ## HTML Format Service
 *
 * Renders documentation pages as HTML: the shared structured traversal with
 * HTML primitives, wrapped in the template's header and footer.
 *
 * @example
 * ```typescript
 * import { createHtmlFormatService } from "@docweave/doc-format";
 *
 * const html = createHtmlFormatService(
 *   { locationService, languageService },
 *   { title: "collections", stylesheet: "style.css" }
 * );
 *
 * const page = html.format({ path: "collections/index.html" }, [model.root]);
 * ```
 */

import type {
  DocumentationNode,
  LanguageService,
  Location,
  LocationService,
} from "@docweave/doc-model";
import type { HtmlFormatOptionsInput } from "../config.js";
import { parseHtmlFormatOptions } from "../config.js";
import type { FormatService } from "../format-service.js";
import type { Logger } from "../logging/types.js";
import { createScopedLogger } from "../logging/scoped.js";
import type { OutputBuffer } from "../output.js";
import { renderToString } from "../output.js";
import type { StructuredFormatter } from "../structured/formatter.js";
import { createStructuredFormatter } from "../structured/formatter.js";
import { createHtmlPrimitives } from "./primitives.js";
import type { HtmlTemplateService } from "./template.js";
import { createDefaultHtmlTemplate } from "./template.js";

export const HTML_LOGGER_SCOPE = "Format:html";

export interface HtmlFormatServiceDependencies {
  readonly locationService: LocationService;
  readonly languageService: LanguageService;
}

export type HtmlFormatServiceOptions = HtmlFormatOptionsInput & {
  /** Replaces the default template built from title, stylesheet and charset */
  readonly template?: HtmlTemplateService | undefined;
  /** Replaces the default scoped logger built from logLevel */
  readonly logger?: Logger | undefined;
};

export interface HtmlFormatService extends FormatService {
  readonly formatter: StructuredFormatter;
  readonly template: HtmlTemplateService;
}

/**
 * Create an HTML format service.
 *
 * @throws FormatConfigError when options fail validation
 */
export function createHtmlFormatService(
  dependencies: HtmlFormatServiceDependencies,
  options: HtmlFormatServiceOptions = {}
): HtmlFormatService {
  const { template: customTemplate, logger: customLogger, ...plainOptions } = options;
  const config = parseHtmlFormatOptions(plainOptions);

  const logger = customLogger ?? createScopedLogger(HTML_LOGGER_SCOPE, config.logLevel);
  const template =
    customTemplate ??
    createDefaultHtmlTemplate({
      title: config.title,
      stylesheet: config.stylesheet,
      charset: config.charset,
    });
  const formatter = createStructuredFormatter(createHtmlPrimitives(), {
    locationService: dependencies.locationService,
    languageService: dependencies.languageService,
    logger,
  });

  logger.debug("HTML format service created", {
    customTemplate: customTemplate !== undefined,
    logLevel: config.logLevel,
  });

  const renderTree = (
    location: Location,
    to: OutputBuffer,
    nodes: readonly DocumentationNode[]
  ): void => {
    template.appendHeader(to);
    formatter.renderTree(location, to, nodes);
    template.appendFooter(to);
  };

  const renderOutline = (
    location: Location,
    to: OutputBuffer,
    nodes: readonly DocumentationNode[]
  ): void => {
    formatter.renderOutline(location, to, nodes);
  };

  return {
    extension: formatter.primitives.extension,
    formatter,
    template,
    renderTree,
    renderOutline,
    format: (location, nodes) => renderToString((to) => renderTree(location, to, nodes)),
    formatOutline: (location, nodes) => renderToString((to) => renderOutline(location, to, nodes)),
  };
}
