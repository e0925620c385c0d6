/**
 * Field Table Builder and Index Resolver.
 *
 * A definition lists its fields either as an object literal
 * (`{ x: 0, y: 0 }`) or as an array literal of bare names and
 * `[name, default]` pairs (`["date", ["time", 0]]`).
 */

import * as ts from "typescript";
import { getPropertyNameText, getStaticString, printNode, unwrapExpression } from "@untagged/core";
import {
  DuplicateFieldError,
  InvalidDefaultValueError,
  NonAtomFieldNameError,
} from "./errors.js";
import {
  UNDEFINED_DEFAULT,
  type DefaultExpr,
  type DefinitionKind,
  type FieldName,
  type ShapeDescriptor,
  type ShapeField,
} from "./types.js";

/** A field before validation: its name and the default's source text. */
export type FieldEntry = FieldName | readonly [FieldName, DefaultExpr];

/** Identifiers whose meaning does not depend on where they are written. */
const GLOBAL_VALUE_NAMES = new Set(["undefined", "NaN", "Infinity"]);

/** Built-in objects a default may call or construct through. */
const GLOBAL_CALLEE_ROOTS = new Set([
  "Array",
  "BigInt",
  "Boolean",
  "Date",
  "Error",
  "JSON",
  "Map",
  "Math",
  "Number",
  "Object",
  "RegExp",
  "Set",
  "String",
  "Symbol",
  "WeakMap",
  "WeakSet",
]);

// ============================================================================
// Descriptor construction
// ============================================================================

/**
 * Build a frozen descriptor from already-extracted fields.
 *
 * @throws DuplicateFieldError if a name appears twice
 */
export function createShapeDescriptor(
  kind: DefinitionKind,
  name: string,
  entries: readonly FieldEntry[],
  nodes: readonly (ts.Node | undefined)[] = []
): ShapeDescriptor {
  const seen = new Set<FieldName>();
  const fields: ShapeField[] = [];

  entries.forEach((entry, i) => {
    const fieldName = typeof entry === "string" ? entry : entry[0];
    const defaultExpr = typeof entry === "string" ? UNDEFINED_DEFAULT : entry[1];
    if (seen.has(fieldName)) {
      throw new DuplicateFieldError(kind, fieldName, nodes[i]);
    }
    seen.add(fieldName);
    fields.push(Object.freeze({ name: fieldName, defaultExpr }));
  });

  return Object.freeze({ name, fields: Object.freeze(fields) });
}

/**
 * Normalize the field argument of a definition call.
 *
 * @throws NonAtomFieldNameError for an entry without a static name
 * @throws InvalidDefaultValueError for a default that cannot be copied
 * @throws DuplicateFieldError for a repeated name
 */
export function buildFieldTable(
  kind: DefinitionKind,
  name: string,
  fieldsArg: ts.Expression,
  sourceFile?: ts.SourceFile
): ShapeDescriptor {
  const text = (node: ts.Node): string => printNode(node, sourceFile);
  const arg = unwrapExpression(fieldsArg);
  const entries: FieldEntry[] = [];
  const nodes: ts.Node[] = [];

  const addDefault = (field: FieldName, value: ts.Expression, node: ts.Node): void => {
    const offender = findUnescapable(value);
    if (offender) {
      throw new InvalidDefaultValueError(field, `cannot escape ${text(offender)}`, offender);
    }
    entries.push([field, text(value)]);
    nodes.push(node);
  };

  if (ts.isObjectLiteralExpression(arg)) {
    for (const member of arg.properties) {
      const key =
        ts.isPropertyAssignment(member) || ts.isShorthandPropertyAssignment(member)
          ? getPropertyNameText(member.name)
          : undefined;
      if (key === undefined) {
        throw new NonAtomFieldNameError(kind, text(member), member);
      }
      const value = ts.isPropertyAssignment(member) ? member.initializer : member.name;
      addDefault(key, value, member);
    }
  } else if (ts.isArrayLiteralExpression(arg)) {
    for (const element of arg.elements) {
      const bare = getStaticString(element);
      if (bare !== undefined) {
        entries.push(bare);
        nodes.push(element);
        continue;
      }
      const pair = ts.isArrayLiteralExpression(element) ? element.elements : undefined;
      const key = pair?.length === 2 && pair[0] ? getStaticString(pair[0]) : undefined;
      const value = pair?.[1];
      if (key === undefined || !value || ts.isSpreadElement(value) || ts.isOmittedExpression(value)) {
        throw new NonAtomFieldNameError(kind, text(element), element);
      }
      addDefault(key, value, element);
    }
  } else {
    throw new NonAtomFieldNameError(kind, text(arg), arg);
  }

  return createShapeDescriptor(kind, name, entries, nodes);
}

// ============================================================================
// Default escapability
// ============================================================================

/** The first name of a dotted path such as `Number.parseInt`. */
function pathRoot(node: ts.Expression): ts.Identifier | undefined {
  if (ts.isIdentifier(node)) return node;
  return ts.isPropertyAccessExpression(node) && ts.isIdentifier(node.name)
    ? pathRoot(node.expression)
    : undefined;
}

/**
 * Find the first sub-expression that would change meaning if copied to
 * another site, or undefined when the whole default can be copied.
 */
export function findUnescapable(node: ts.Expression): ts.Node | undefined {
  switch (node.kind) {
    case ts.SyntaxKind.StringLiteral:
    case ts.SyntaxKind.NoSubstitutionTemplateLiteral:
    case ts.SyntaxKind.NumericLiteral:
    case ts.SyntaxKind.BigIntLiteral:
    case ts.SyntaxKind.RegularExpressionLiteral:
    case ts.SyntaxKind.TrueKeyword:
    case ts.SyntaxKind.FalseKeyword:
    case ts.SyntaxKind.NullKeyword:
      return undefined;
  }

  if (ts.isIdentifier(node)) {
    return GLOBAL_VALUE_NAMES.has(node.text) ? undefined : node;
  }

  if (
    ts.isParenthesizedExpression(node) ||
    ts.isAsExpression(node) ||
    ts.isSatisfiesExpression(node)
  ) {
    return findUnescapable(node.expression);
  }

  if (ts.isPrefixUnaryExpression(node)) {
    const signed =
      node.operator === ts.SyntaxKind.MinusToken || node.operator === ts.SyntaxKind.PlusToken;
    return signed ? findUnescapable(node.operand) : node;
  }

  if (ts.isArrayLiteralExpression(node)) {
    for (const element of node.elements) {
      if (ts.isSpreadElement(element) || ts.isOmittedExpression(element)) return element;
      const offender = findUnescapable(element);
      if (offender) return offender;
    }
    return undefined;
  }

  if (ts.isObjectLiteralExpression(node)) {
    for (const member of node.properties) {
      if (!ts.isPropertyAssignment(member) || ts.isComputedPropertyName(member.name)) {
        return member;
      }
      const offender = findUnescapable(member.initializer);
      if (offender) return offender;
    }
    return undefined;
  }

  if (ts.isCallExpression(node) || ts.isNewExpression(node)) {
    const root = pathRoot(node.expression);
    if (!root) return node.expression;
    if (!GLOBAL_CALLEE_ROOTS.has(root.text)) return root;
    for (const arg of node.arguments ?? []) {
      if (ts.isSpreadElement(arg)) return arg;
      const offender = findUnescapable(arg);
      if (offender) return offender;
    }
    return undefined;
  }

  return node;
}

// ============================================================================
// Index Resolver
// ============================================================================

/** Zero-based position of `field` in definition order. */
export function resolveIndex(shape: ShapeDescriptor, field: FieldName): number | undefined {
  const index = shape.fields.findIndex((f) => f.name === field);
  return index === -1 ? undefined : index;
}

/** Names of a shape's fields in definition order. */
export function fieldNames(shape: ShapeDescriptor): FieldName[] {
  return shape.fields.map((f) => f.name);
}
