/**
 * Tests for the shape, definition and matches macros
 */

import { describe, it, expect } from "vitest";
import * as ts from "typescript";
import { createMacroContext, printNode } from "@untagged/core";
import {
  MacroUsageError,
  createMatchesMacro,
  createShapeDescriptor,
  createShapeMacro,
  deftupleMacro,
  deftuplepMacro,
  readDefinition,
  tryReadDefinition,
  type ShapeServices,
} from "@untagged/tuple";

const point = createShapeDescriptor("deftuple", "point", [
  ["x", "0"],
  ["y", "0"],
  ["z", "0"],
]);

const services: ShapeServices = {
  resolveShape: (callee) => (ts.isIdentifier(callee) && callee.text === "point" ? point : undefined),
  runtimeNamespace: () => ts.factory.createIdentifier("rt"),
};

function parse(text: string): ts.SourceFile {
  return ts.createSourceFile("test.ts", text, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
}

function firstCall(sf: ts.SourceFile): ts.CallExpression {
  let found: ts.CallExpression | undefined;
  const visit = (node: ts.Node): void => {
    if (!found && ts.isCallExpression(node)) found = node;
    else ts.forEachChild(node, visit);
  };
  visit(sf);
  if (!found) throw new Error("no call found");
  return found;
}

function firstDeclaration(sf: ts.SourceFile): [ts.VariableDeclarationList, ts.VariableDeclaration] {
  const stmt = sf.statements[0];
  const decl = stmt && ts.isVariableStatement(stmt) ? stmt.declarationList.declarations[0] : undefined;
  if (!stmt || !ts.isVariableStatement(stmt) || !decl) throw new Error("expected a declaration");
  return [stmt.declarationList, decl];
}

describe("shape macro", () => {
  it("should expand a call through the emitter", () => {
    const sf = parse("const t = point({ y: 1 });");
    const ctx = createMacroContext(sf, undefined);
    const call = firstCall(sf);

    const result = createShapeMacro(point, services).expand(ctx, call, call.arguments);

    expect(ctx.printNode(result)).toBe("[0, 1, 0]");
  });

  it("should expand nested macros before narrowing", () => {
    const sf = parse("const l = point(wrap());");
    const ctx = createMacroContext(sf, undefined);
    ctx.setExpander(() => ts.factory.createArrayLiteralExpression([
      ts.factory.createNumericLiteral(1),
      ts.factory.createNumericLiteral(2),
      ts.factory.createNumericLiteral(3),
    ]));
    const call = firstCall(sf);

    const result = createShapeMacro(point, services).expand(ctx, call, call.arguments);

    expect(printNode(result)).toBe('[["x", 1], ["y", 2], ["z", 3]]');
  });
});

describe("matches macro", () => {
  it("should compile a pattern over an identifier subject", () => {
    const sf = parse("matches(t, point({ x: 1, y }));");
    const ctx = createMacroContext(sf, undefined);
    const call = firstCall(sf);

    const result = createMatchesMacro(services).expand(ctx, call, call.arguments);

    expect(ctx.printNode(result)).toBe(
      "Array.isArray(t) && t.length === 3 && t[0] === 1 && (y = t[1], true)"
    );
  });

  it("should bind any other subject once through a parameter", () => {
    const sf = parse("matches(load(), point());");
    const ctx = createMacroContext(sf, undefined);
    const call = firstCall(sf);

    const result = createMatchesMacro(services).expand(ctx, call, call.arguments);

    expect(ts.isCallExpression(result)).toBe(true);
    expect(ts.isCallExpression(result) ? ctx.printNode(result.arguments[0] ?? result) : "").toBe(
      "load()"
    );
  });

  it("should reject a pattern that is not a shape call", () => {
    const sf = parse("matches(t, 42);");
    const ctx = createMacroContext(sf, undefined);
    const call = firstCall(sf);

    const expand = () => createMatchesMacro(services).expand(ctx, call, call.arguments);

    expect(expand).toThrow(MacroUsageError);
    expect(expand).toThrow("matches() expects a shape call as its pattern, got: 42");
  });

  it("should require exactly two arguments", () => {
    const sf = parse("matches(t);");
    const ctx = createMacroContext(sf, undefined);
    const call = firstCall(sf);

    expect(() => createMatchesMacro(services).expand(ctx, call, call.arguments)).toThrow(
      "matches() expects a value and a pattern"
    );
  });
});

describe("definitions", () => {
  it("should read the binding name and fields of a const declaration", () => {
    const sf = parse('const timestamp = deftuplep(["date", "time"]);');
    const [list, decl] = firstDeclaration(sf);

    const shape = readDefinition("deftuplep", list, decl, firstCall(sf), sf);

    expect(shape.name).toBe("timestamp");
    expect(shape.fields.map((f) => f.name)).toEqual(["date", "time"]);
  });

  it("should reject a let declaration", () => {
    const sf = parse("let point = deftuple({ x: 0 });");
    const [list, decl] = firstDeclaration(sf);

    expect(() => readDefinition("deftuple", list, decl, firstCall(sf), sf)).toThrow(
      "deftuple() must initialize a const declaration"
    );
  });

  it("should return failures as values", () => {
    const sf = parse("const point = deftuple({ x: 0 }, extra);");
    const [list, decl] = firstDeclaration(sf);

    const result = tryReadDefinition("deftuple", list, decl, firstCall(sf), sf);

    expect(result.ok).toBe(false);
    expect(result.ok ? "" : result.error.message).toBe(
      "deftuple() expects exactly one field list argument"
    );
  });

  it("should refuse to expand a definition call outside a declaration", () => {
    const sf = parse("use(deftuple({ x: 0 }));");
    const ctx = createMacroContext(sf, undefined);
    const call = firstCall(sf);
    const inner = call.arguments[0];
    if (!inner || !ts.isCallExpression(inner)) throw new Error("expected a nested call");

    expect(deftupleMacro.module).toBe("@untagged/runtime");
    expect(deftuplepMacro.name).toBe("deftuplep");
    expect(() => deftupleMacro.expand(ctx, inner, inner.arguments)).toThrow(
      "deftuple() must initialize a const declaration"
    );
  });
});
