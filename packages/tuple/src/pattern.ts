/**
 * Tuple patterns for `matches(value, shape(...))`.
 *
 * A shape call in pattern position is classified like any other call, but
 * with the pattern flag set: fields without an override match anything and
 * update calls are rejected.
 */

import * as ts from "typescript";
import { parseExpression, printNode, unwrapExpression } from "@untagged/core";
import { classifyArguments } from "./classify.js";
import { InvalidArgumentShapeError } from "./errors.js";
import { planConstruct, planUpdate, requireIndex, type ConstructSlot } from "./plan.js";
import { WILDCARD_KEY, type ShapeDescriptor } from "./types.js";

export type PatternNode =
  | { readonly kind: "any" }
  | { readonly kind: "bind"; readonly name: ts.Identifier }
  | { readonly kind: "equals"; readonly value: ts.Expression }
  | { readonly kind: "tuple"; readonly arity: number; readonly elements: readonly PatternNode[] };

/** Finds the shape a nested call in pattern position constructs. */
export type ShapeLookup = (call: ts.CallExpression) => ShapeDescriptor | undefined;

const NON_BINDING_NAMES = new Set(["undefined", "NaN", "Infinity"]);

/**
 * Build the pattern for a shape call in pattern position.
 *
 * @throws UpdateInMatchContextError for `shape(t, { ... })`
 * @throws InvalidArgumentShapeError for forms that are not patterns
 * @throws UnknownFieldError
 */
export function buildPattern(
  shape: ShapeDescriptor,
  call: ts.CallExpression,
  lookup: ShapeLookup,
  sourceFile?: ts.SourceFile
): PatternNode {
  const arg = classifyArguments(call.arguments, sourceFile);
  const given = (): string => call.arguments.map((a) => printNode(a, sourceFile)).join(", ");

  switch (arg.kind) {
    case "empty":
      return tuplePattern(planConstruct<ts.Expression>(shape, [], true), lookup, sourceFile);

    case "singleAssociationList":
      return tuplePattern(planConstruct(shape, arg.entries, true), lookup, sourceFile);

    case "singleFieldName":
      return {
        kind: "equals",
        value: ts.factory.createNumericLiteral(requireIndex(shape, arg.field, arg.node)),
      };

    case "pairWithAssociationList":
      planUpdate(shape, arg.entries, true, call);
      throw new InvalidArgumentShapeError(given(), call);

    case "singleOpaqueExpression":
    case "pairWithFieldName":
      throw new InvalidArgumentShapeError(given(), call);

    case "invalid":
      throw new InvalidArgumentShapeError(arg.given, arg.node);
  }
}

function tuplePattern(
  slots: readonly ConstructSlot<ts.Expression>[],
  lookup: ShapeLookup,
  sourceFile: ts.SourceFile | undefined
): PatternNode {
  return {
    kind: "tuple",
    arity: slots.length,
    elements: slots.map((slot): PatternNode => {
      switch (slot.kind) {
        case "value":
          return valuePattern(slot.value, lookup, sourceFile);
        case "wildcard":
          return { kind: "any" };
        case "default":
          return { kind: "equals", value: parseExpression(slot.field.defaultExpr) };
      }
    }),
  };
}

function valuePattern(
  value: ts.Expression,
  lookup: ShapeLookup,
  sourceFile: ts.SourceFile | undefined
): PatternNode {
  if (ts.isIdentifier(value)) {
    if (value.text === WILDCARD_KEY) return { kind: "any" };
    if (!NON_BINDING_NAMES.has(value.text)) return { kind: "bind", name: value };
  }
  if (ts.isCallExpression(value)) {
    const nested = lookup(value);
    if (nested) return buildPattern(nested, value, lookup, sourceFile);
  }
  return { kind: "equals", value };
}

// ============================================================================
// Emission
// ============================================================================

/** `NaN` never compares equal, so it is tested with `Number.isNaN`. */
function isNaNLiteral(value: ts.Expression): boolean {
  const inner = unwrapExpression(value);
  return ts.isIdentifier(inner) && inner.text === "NaN";
}

/**
 * Compile a pattern into a boolean test over `subject`.
 *
 * `Array.isArray(s) && s.length === 2 && s[0] === 1 && (y = s[1], true)`
 *
 * Bindings are assigned only once every check has passed. A name bound twice
 * must see equal values at both positions.
 *
 * @param subject - Creates a fresh reference to the matched value
 */
export function emitPatternTest(
  factory: ts.NodeFactory,
  pattern: PatternNode,
  subject: () => ts.Expression
): ts.Expression {
  const checks: ts.Expression[] = [];
  const binds: ts.Expression[] = [];
  const bound = new Map<string, readonly number[]>();

  const at = (path: readonly number[]): ts.Expression =>
    path.reduce<ts.Expression>(
      (expr, i) => factory.createElementAccessExpression(expr, i),
      subject()
    );

  const strictEquals = (left: ts.Expression, right: ts.Expression): ts.Expression =>
    factory.createBinaryExpression(left, ts.SyntaxKind.EqualsEqualsEqualsToken, right);

  const walk = (node: PatternNode, path: readonly number[]): void => {
    switch (node.kind) {
      case "any":
        return;

      case "bind": {
        const first = bound.get(node.name.text);
        if (first) {
          checks.push(strictEquals(at(path), at(first)));
          return;
        }
        bound.set(node.name.text, path);
        const target = ts.setOriginalNode(factory.createIdentifier(node.name.text), node.name);
        binds.push(factory.createAssignment(target, at(path)));
        return;
      }

      case "equals":
        checks.push(
          isNaNLiteral(node.value)
            ? factory.createCallExpression(
                factory.createPropertyAccessExpression(factory.createIdentifier("Number"), "isNaN"),
                undefined,
                [at(path)]
              )
            : strictEquals(at(path), node.value)
        );
        return;

      case "tuple":
        checks.push(
          factory.createCallExpression(
            factory.createPropertyAccessExpression(factory.createIdentifier("Array"), "isArray"),
            undefined,
            [at(path)]
          ),
          strictEquals(
            factory.createPropertyAccessExpression(at(path), "length"),
            factory.createNumericLiteral(node.arity)
          )
        );
        node.elements.forEach((element, i) => walk(element, [...path, i]));
        return;
    }
  };

  walk(pattern, []);

  if (binds.length > 0) {
    const sequence = [...binds, factory.createTrue()].reduce((left, right) =>
      factory.createComma(left, right)
    );
    checks.push(factory.createParenthesizedExpression(sequence));
  }

  const [head, ...rest] = checks;
  if (!head) return factory.createTrue();
  return rest.reduce(
    (left, right) => factory.createLogicalAnd(left, right),
    head
  );
}
