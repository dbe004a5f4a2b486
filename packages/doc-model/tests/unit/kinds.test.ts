/**
 * Unit tests for node kinds and kind filters.
 */
import { describe, it, expect } from "vitest";
import {
  assembleDocumentationModel,
  isNodeKind,
  isTypeKind,
  membersNotOfKind,
  membersOfKind,
  NodeKindSchema,
  NODE_KINDS,
  TYPE_KINDS,
} from "../../src/index.js";

describe("NODE_KINDS", () => {
  it("should contain every kind with a member table", () => {
    expect(NODE_KINDS).toEqual(
      expect.arrayContaining([
        "Package",
        "Class",
        "Interface",
        "Enum",
        "Object",
        "Constructor",
        "Property",
        "Function",
        "PropertyAccessor",
      ])
    );
  });

  it("should have no duplicates", () => {
    expect(new Set(NODE_KINDS).size).toBe(NODE_KINDS.length);
  });
});

describe("isNodeKind", () => {
  it("should accept known kinds", () => {
    expect(isNodeKind("Function")).toBe(true);
    expect(isNodeKind("EnumItem")).toBe(true);
  });

  it("should reject unknown values", () => {
    expect(isNodeKind("function")).toBe(false);
    expect(isNodeKind(42)).toBe(false);
    expect(isNodeKind(undefined)).toBe(false);
  });
});

describe("NodeKindSchema", () => {
  it("should parse valid kinds", () => {
    expect(NodeKindSchema.safeParse("Enum").success).toBe(true);
  });

  it("should reject invalid kinds", () => {
    expect(NodeKindSchema.safeParse("Widget").success).toBe(false);
  });
});

describe("isTypeKind", () => {
  it("should match the four type-declaring kinds", () => {
    expect(NODE_KINDS.filter(isTypeKind)).toEqual([...TYPE_KINDS]);
  });
});

describe("membersOfKind / membersNotOfKind", () => {
  const model = assembleDocumentationModel({
    name: "p",
    kind: "Package",
    members: [
      { name: "B", kind: "Class" },
      { name: "f", kind: "Function" },
      { name: "E", kind: "Enum" },
      { name: "x", kind: "Parameter" },
    ],
  });

  it("should filter by one kind", () => {
    expect(membersOfKind(model.root, "Function").map((node) => node.name)).toEqual(["f"]);
  });

  it("should filter by several kinds in declaration order", () => {
    expect(membersOfKind(model.root, ...TYPE_KINDS).map((node) => node.name)).toEqual(["B", "E"]);
  });

  it("should exclude the given kinds", () => {
    expect(
      membersNotOfKind(model.root, "Class", "Enum", "Function").map((node) => node.name)
    ).toEqual(["x"]);
  });
});
