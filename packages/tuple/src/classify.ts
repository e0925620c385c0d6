/**
 * Dispatch Classifier: sorts the arguments of a shape call into one of the
 * call forms before any code is generated.
 */

import * as ts from "typescript";
import { getPropertyNameText, getStaticString, printNode, unwrapExpression } from "@untagged/core";
import type { AssociationEntry, FieldName } from "./types.js";

export type CallSiteArgument<E> =
  /** `point()` */
  | { readonly kind: "empty" }
  /** `point("y")` */
  | { readonly kind: "singleFieldName"; readonly field: FieldName; readonly node?: ts.Node }
  /** `point({ x: 7 })` */
  | {
      readonly kind: "singleAssociationList";
      readonly entries: readonly AssociationEntry<E>[];
      readonly node?: ts.Node;
    }
  /** `point(t)` */
  | { readonly kind: "singleOpaqueExpression"; readonly value: E }
  /** `point(t, "x")` */
  | {
      readonly kind: "pairWithFieldName";
      readonly container: E;
      readonly field: FieldName;
      readonly node?: ts.Node;
    }
  /** `point(t, { y: 9 })` */
  | {
      readonly kind: "pairWithAssociationList";
      readonly container: E;
      readonly entries: readonly AssociationEntry<E>[];
      readonly node?: ts.Node;
    }
  /** Anything else */
  | { readonly kind: "invalid"; readonly given: string; readonly node?: ts.Node };

export type CallSiteKind = CallSiteArgument<unknown>["kind"];

/**
 * Read an object literal as an association list.
 *
 * Only plain and shorthand properties with static keys qualify; anything else
 * (spreads, methods, accessors, computed or numeric keys) makes the literal
 * opaque.
 */
export function readAssociationList(
  expr: ts.Expression
): AssociationEntry<ts.Expression>[] | undefined {
  if (!ts.isObjectLiteralExpression(expr)) return undefined;

  const entries: AssociationEntry<ts.Expression>[] = [];
  for (const member of expr.properties) {
    if (ts.isPropertyAssignment(member)) {
      const key = getPropertyNameText(member.name);
      if (key === undefined) return undefined;
      entries.push({ key, value: member.initializer, node: member });
    } else if (ts.isShorthandPropertyAssignment(member)) {
      entries.push({ key: member.name.text, value: member.name, node: member });
    } else {
      return undefined;
    }
  }
  return entries;
}

export function classifyArguments(
  args: readonly ts.Expression[],
  sourceFile?: ts.SourceFile
): CallSiteArgument<ts.Expression> {
  const [first, second, third] = args;

  if (!first) {
    return { kind: "empty" };
  }

  if (!second) {
    const arg = unwrapExpression(first);
    const field = getStaticString(arg);
    if (field !== undefined) {
      return { kind: "singleFieldName", field, node: arg };
    }
    const entries = readAssociationList(arg);
    if (entries) {
      return { kind: "singleAssociationList", entries, node: arg };
    }
    return { kind: "singleOpaqueExpression", value: first };
  }

  if (third) {
    return {
      kind: "invalid",
      given: args.map((a) => printNode(a, sourceFile)).join(", "),
      node: third,
    };
  }

  const arg = unwrapExpression(second);
  const field = getStaticString(arg);
  if (field !== undefined) {
    return { kind: "pairWithFieldName", container: first, field, node: arg };
  }
  const entries = readAssociationList(arg);
  if (entries) {
    return { kind: "pairWithAssociationList", container: first, entries, node: arg };
  }
  return { kind: "invalid", given: printNode(second, sourceFile), node: second };
}
