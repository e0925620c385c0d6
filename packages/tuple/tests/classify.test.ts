/**
 * Tests for the Dispatch Classifier
 */

import { describe, it, expect } from "vitest";
import * as ts from "typescript";
import { parseExpression, printNode } from "@untagged/core";
import { classifyArguments, readAssociationList } from "@untagged/tuple";

function argsOf(code: string): readonly ts.Expression[] {
  const expr = parseExpression(code);
  if (!ts.isCallExpression(expr)) throw new Error(`not a call: ${code}`);
  return expr.arguments;
}

function kindOf(code: string): string {
  return classifyArguments(argsOf(code)).kind;
}

describe("classifyArguments", () => {
  it("should classify every call form", () => {
    expect(kindOf("point()")).toBe("empty");
    expect(kindOf('point("y")')).toBe("singleFieldName");
    expect(kindOf("point({ x: 7 })")).toBe("singleAssociationList");
    expect(kindOf("point(t)")).toBe("singleOpaqueExpression");
    expect(kindOf('point(t, "x")')).toBe("pairWithFieldName");
    expect(kindOf("point(t, { y: 9 })")).toBe("pairWithAssociationList");
  });

  it("should see through parentheses around literal arguments", () => {
    const arg = classifyArguments(argsOf('point(("y"))'));

    expect(arg).toMatchObject({ kind: "singleFieldName", field: "y" });
  });

  it("should keep association list entries in source order", () => {
    const arg = classifyArguments(argsOf("point({ z: 1, x, 'y': 2, z: 3 })"));
    if (arg.kind !== "singleAssociationList") throw new Error(arg.kind);

    expect(arg.entries.map((e) => [e.key, printNode(e.value)])).toEqual([
      ["z", "1"],
      ["x", "x"],
      ["y", "2"],
      ["z", "3"],
    ]);
  });

  it("should treat object literals with spreads or computed keys as opaque", () => {
    expect(kindOf("point({ ...rest })")).toBe("singleOpaqueExpression");
    expect(kindOf("point({ [key]: 1 })")).toBe("singleOpaqueExpression");
    expect(kindOf("point({ 0: 1 })")).toBe("singleOpaqueExpression");
  });

  it("should reject a second argument that is neither a name nor a list", () => {
    const arg = classifyArguments(argsOf("point(t, u)"));

    expect(arg).toMatchObject({ kind: "invalid", given: "u" });
  });

  it("should reject more than two arguments", () => {
    const arg = classifyArguments(argsOf('point(a, "b", c)'));

    expect(arg).toMatchObject({ kind: "invalid", given: 'a, "b", c' });
  });
});

describe("readAssociationList", () => {
  it("should return undefined for a non-object expression", () => {
    expect(readAssociationList(parseExpression("[1, 2]"))).toBeUndefined();
  });

  it("should reject methods", () => {
    expect(readAssociationList(parseExpression("{ x() { return 1; } }"))).toBeUndefined();
  });
});
