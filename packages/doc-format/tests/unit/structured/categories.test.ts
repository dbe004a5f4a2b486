/**
 * Unit tests for member categories.
 */
import { describe, it, expect } from "vitest";
import { assembleDocumentationModel, NODE_KINDS } from "@docweave/doc-model";
import { CATEGORISED_KINDS, MEMBER_CATEGORIES } from "../../../src/structured/categories.js";

const model = assembleDocumentationModel({
  name: "p",
  kind: "Package",
  members: NODE_KINDS.map((kind) => ({ name: `m${kind}`, kind })),
  extensions: ["p/mFunction"],
  inheritors: ["p/mClass"],
  links: ["p/mObject", "p/mEnum"],
});

const captionOf = (name: string): string[] =>
  MEMBER_CATEGORIES.slice(0, 7)
    .filter((category) => category.select(model.root).some((member) => member.name === name))
    .map((category) => category.caption);

describe("MEMBER_CATEGORIES", () => {
  it("should list captions in the fixed order", () => {
    expect(MEMBER_CATEGORIES.map((category) => category.caption)).toEqual([
      "Packages",
      "Types",
      "Constructors",
      "Properties",
      "Functions",
      "Accessors",
      "Other members",
      "Extensions",
      "Inheritors",
      "Links",
    ]);
  });

  it("should place every member in exactly one kind category", () => {
    const kindCategories = MEMBER_CATEGORIES.slice(0, 7);
    const placed = kindCategories.flatMap((category) => category.select(model.root));

    expect(placed).toHaveLength(model.root.members.length);
    expect(new Set(placed).size).toBe(model.root.members.length);
  });

  it("should put enums under Types, not Other members", () => {
    const types = MEMBER_CATEGORIES[1]?.select(model.root).map((member) => member.kind);
    const others = MEMBER_CATEGORIES[6]?.select(model.root).map((member) => member.kind);

    expect(types).toEqual(["Class", "Interface", "Enum", "Object"]);
    expect(others).not.toContain("Enum");
  });

  it("should put kinds without a table under Other members", () => {
    expect(captionOf("mParameter")).toEqual(["Other members"]);
    expect(captionOf("mEnumItem")).toEqual(["Other members"]);
  });

  it("should take side references from the node", () => {
    const [extensions, inheritors, links] = MEMBER_CATEGORIES.slice(7).map((category) =>
      category.select(model.root).map((node) => node.name)
    );

    expect(extensions).toEqual(["mFunction"]);
    expect(inheritors).toEqual(["mClass"]);
    expect(links).toEqual(["mObject", "mEnum"]);
  });
});

describe("CATEGORISED_KINDS", () => {
  it("should cover the kinds with a named table", () => {
    expect([...CATEGORISED_KINDS].sort()).toEqual(
      [
        "Class",
        "Constructor",
        "Enum",
        "Function",
        "Interface",
        "Object",
        "Package",
        "Property",
        "PropertyAccessor",
      ].sort()
    );
  });
});
