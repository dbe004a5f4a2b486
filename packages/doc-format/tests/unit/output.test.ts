/**
 * Unit tests for the output buffer.
 */
import { describe, it, expect } from "vitest";
import { OutputBuffer, renderToString } from "../../src/output.js";

describe("OutputBuffer", () => {
  it("should start empty", () => {
    const buffer = new OutputBuffer();

    expect(buffer.toString()).toBe("");
    expect(buffer.length).toBe(0);
  });

  it("should concatenate appended text in order", () => {
    const buffer = new OutputBuffer().append("<p>").append("a").append("</p>");

    expect(buffer.toString()).toBe("<p>a</p>");
    expect(buffer.length).toBe(8);
  });

  it("should terminate lines with a newline", () => {
    const buffer = new OutputBuffer();
    buffer.appendLine("<br/>");
    buffer.appendLine();

    expect(buffer.toString()).toBe("<br/>\n\n");
  });
});

describe("renderToString", () => {
  it("should return what the callback wrote to a fresh buffer", () => {
    expect(renderToString((to) => to.append("a").appendLine("b"))).toBe("ab\n");
  });
});
