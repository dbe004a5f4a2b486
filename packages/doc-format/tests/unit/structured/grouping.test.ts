/**
 * Unit tests for order-preserving grouping.
 */
import { describe, it, expect } from "vitest";
import { groupBy, groupByValue } from "../../../src/structured/grouping.js";
import { formatLinkKey, type FormatLink } from "../../../src/structured/primitives.js";

describe("groupBy", () => {
  it("should return no groups for no items", () => {
    expect(groupBy([], (item: string) => item)).toEqual([]);
  });

  it("should keep groups in first-seen order and items in input order", () => {
    const groups = groupBy(["b1", "a1", "b2", "c1", "a2"], (item) => item.charAt(0));

    expect(groups).toEqual([
      { key: "b", items: ["b1", "b2"] },
      { key: "a", items: ["a1", "a2"] },
      { key: "c", items: ["c1"] },
    ]);
  });

  it("should call the key function once per item", () => {
    const seen: string[] = [];

    groupBy(["x", "y", "x"], (item) => {
      seen.push(item);
      return item;
    });

    expect(seen).toEqual(["x", "y", "x"]);
  });
});

describe("groupByValue", () => {
  it("should merge structurally equal keys and keep the first one", () => {
    const first: FormatLink = { text: "f", location: { path: "p/f.html" } };
    const second: FormatLink = { text: "f", location: { path: "p/f.html" } };
    const other: FormatLink = { text: "f", location: { path: "q/f.html" } };
    const keys = new Map([
      ["f(Int)", first],
      ["f(String)", second],
      ["q.f", other],
    ]);

    const groups = groupByValue(
      ["f(Int)", "q.f", "f(String)"],
      (id) => keys.get(id) ?? first,
      formatLinkKey
    );

    expect(groups).toHaveLength(2);
    expect(groups[0]?.key).toBe(first);
    expect(groups[0]?.items).toEqual(["f(Int)", "f(String)"]);
    expect(groups[1]?.items).toEqual(["q.f"]);
  });
});

describe("formatLinkKey", () => {
  it("should tell apart links whose text and path only collide when concatenated", () => {
    const a: FormatLink = { text: "ab", location: { path: "c" } };
    const b: FormatLink = { text: "a", location: { path: "bc" } };

    expect(formatLinkKey(a)).not.toBe(formatLinkKey(b));
  });
});
