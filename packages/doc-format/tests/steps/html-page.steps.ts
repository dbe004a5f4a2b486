/**
 * Step Definitions for HTML Documentation Pages Feature
 *
 * Renders through the HTML format service with a fragment template, so the
 * assertions see only the documentation body.
 */
import { loadFeature, describeFeature } from "@amiceli/vitest-cucumber";
import { expect } from "vitest";
import {
  assembleDocumentationModel,
  text,
  type ContentNode,
  type DocumentationModel,
  type DocumentationNodeDefinition,
} from "@docweave/doc-model";
import {
  createPathLocationService,
  createSignatureLanguageService,
} from "@docweave/doc-model/testing";
import { createHtmlFormatService } from "../../src/html/html-format-service.js";
import { createFragmentTemplate } from "../../src/html/template.js";

// ============================================================================
// Test State
// ============================================================================

interface ScenarioState {
  model: DocumentationModel | null;
  signatures: Record<string, ContentNode>;
  page: string | null;
}

let state: ScenarioState | null = null;

function initState(definition: DocumentationNodeDefinition): ScenarioState {
  return { model: assembleDocumentationModel(definition), signatures: {}, page: null };
}

function current(): ScenarioState {
  if (state === null) {
    throw new Error("Scenario state not initialised");
  }
  return state;
}

function renderedPage(): string {
  const { page } = current();
  if (page === null) {
    throw new Error("Page was not rendered");
  }
  return page;
}

function renderPage(): void {
  const scenario = current();
  if (scenario.model === null) {
    throw new Error("Model was not assembled");
  }
  const service = createHtmlFormatService(
    {
      locationService: createPathLocationService(),
      languageService: createSignatureLanguageService(scenario.signatures),
    },
    { template: createFragmentTemplate() }
  );
  scenario.page = service.format({ path: "index.html" }, [scenario.model.root]);
}

function tableCaptions(page: string): string[] {
  return [...page.matchAll(/<h3>(.*?)<\/h3>/g)].map((match) => match[1] ?? "");
}

// ============================================================================
// Feature Tests
// ============================================================================

const feature = await loadFeature("tests/features/behavior/html-page.feature");

describeFeature(feature, ({ Scenario, AfterEachScenario }) => {
  AfterEachScenario(() => {
    state = null;
  });

  Scenario("A package with one function", ({ Given, When, Then, And }) => {
    Given('a package "p" with a function "f" summarised as "Does X"', () => {
      state = initState({
        name: "p",
        kind: "Package",
        members: [{ name: "f", kind: "Function", summary: ["Does X"] }],
      });
    });

    When("the page for the package is rendered", () => {
      renderPage();
    });

    Then("the page starts with the breadcrumb line for the package", () => {
      expect(renderedPage().startsWith('<a href="p.html">p</a><br/>\n<br/>\n<h1>p</h1>\n')).toBe(
        true
      );
    });

    And('the page has only a "Functions" member table', () => {
      expect(tableCaptions(renderedPage())).toEqual(["Functions"]);
    });

    And('the "Functions" table row links to "f" followed by its signature and summary', () => {
      expect(renderedPage()).toContain(
        [
          "<tr>",
          "<td>",
          '<p><a href="p/f.html">f</a></p>',
          "</td>",
          "<td>",
          '<pre><code><span class="keyword">function</span> <span class="identifier">f</span></code></pre><p>Does X</p>',
          "</td>",
          "</tr>",
        ].join("\n")
      );
    });
  });

  Scenario("Overloads with the same summary share a row", ({ Given, When, Then, And }) => {
    Given('a package "p" with two overloads of "f" summarised as "Does X"', () => {
      state = initState({
        name: "p",
        kind: "Package",
        members: [
          { id: "f(Int)", name: "f", kind: "Function", summary: ["Does X"] },
          { id: "f(String)", name: "f", kind: "Function", summary: ["Does X"] },
        ],
      });
      current().signatures = {
        "f(Int)": text("fun f(x: Int)"),
        "f(String)": text("fun f(x: String)"),
      };
    });

    When("the page for the package is rendered", () => {
      renderPage();
    });

    Then('the "Functions" table has one row', () => {
      expect(renderedPage().split("<tr>").length - 1).toBe(1);
    });

    And("the row shows both signature code blocks under one summary", () => {
      expect(renderedPage()).toContain(
        "<td>\n<pre><code>fun f(x: Int)</code></pre><pre><code>fun f(x: String)</code></pre><p>Does X</p>\n</td>\n"
      );
    });
  });

  Scenario("A node without members has no member tables", ({ Given, When, Then }) => {
    Given('a package "p" without members', () => {
      state = initState({ name: "p", kind: "Package" });
    });

    When("the page for the package is rendered", () => {
      renderPage();
    });

    Then("the page has no member tables", () => {
      const page = renderedPage();
      expect(tableCaptions(page)).toEqual([]);
      expect(page).not.toContain("<table>");
    });
  });
});
