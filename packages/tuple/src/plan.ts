/**
 * Constructor, Updater and Field Getter planning.
 *
 * Plans are computed over an arbitrary value type `V` so the field rules can
 * be exercised without building any syntax.
 */

import type * as ts from "typescript";
import { resolveIndex } from "./fields.js";
import { UnknownFieldError, UpdateInMatchContextError } from "./errors.js";
import {
  WILDCARD_KEY,
  type AssociationEntry,
  type FieldName,
  type ShapeDescriptor,
  type ShapeField,
} from "./types.js";

export type ConstructSlot<V> =
  /** An explicit override, or the wildcard binding */
  | { readonly kind: "value"; readonly field: ShapeField; readonly value: V }
  /** The field's own default */
  | { readonly kind: "default"; readonly field: ShapeField }
  /** Matches anything (pattern context only) */
  | { readonly kind: "wildcard"; readonly field: ShapeField };

export interface UpdateStep<V> {
  readonly field: FieldName;
  readonly index: number;
  readonly value: V;
}

/**
 * Resolve a field or fail with the shape's name in the message.
 *
 * @throws UnknownFieldError
 */
export function requireIndex(shape: ShapeDescriptor, field: FieldName, node?: ts.Node): number {
  const index = resolveIndex(shape, field);
  if (index === undefined) {
    throw new UnknownFieldError(shape, field, node);
  }
  return index;
}

/**
 * Decide the value of every slot of a new tuple.
 *
 * The first `_` entry rebinds the default of every field that is not named.
 * A field named more than once takes its first value. Keys that name no
 * field are an error, reported for the first one in source order.
 *
 * @throws UnknownFieldError
 */
export function planConstruct<V>(
  shape: ShapeDescriptor,
  entries: readonly AssociationEntry<V>[],
  inPattern: boolean
): ConstructSlot<V>[] {
  const wildcard = entries.find((e) => e.key === WILDCARD_KEY);

  const slots = shape.fields.map((field): ConstructSlot<V> => {
    const override = entries.find((e) => e.key === field.name);
    if (override) return { kind: "value", field, value: override.value };
    if (wildcard) return { kind: "value", field, value: wildcard.value };
    return inPattern ? { kind: "wildcard", field } : { kind: "default", field };
  });

  const leftover = entries.find(
    (e) => e.key !== WILDCARD_KEY && resolveIndex(shape, e.key) === undefined
  );
  if (leftover) {
    throw new UnknownFieldError(shape, leftover.key, leftover.node);
  }

  return slots;
}

/**
 * Turn an update association list into positional replacements, applied in
 * the given order so the last write to a field wins. `_` is an ordinary key
 * here.
 *
 * @throws UpdateInMatchContextError in pattern context
 * @throws UnknownFieldError
 */
export function planUpdate<V>(
  shape: ShapeDescriptor,
  entries: readonly AssociationEntry<V>[],
  inPattern: boolean,
  node?: ts.Node
): UpdateStep<V>[] {
  if (inPattern) {
    throw new UpdateInMatchContextError(node);
  }
  return entries.map((e) => ({
    field: e.key,
    index: requireIndex(shape, e.key, e.node),
    value: e.value,
  }));
}

/** Pair each value with the field at its position. */
export function planConversion<V>(
  shape: ShapeDescriptor,
  values: readonly V[]
): [FieldName, V][] {
  const pairs: [FieldName, V][] = [];
  values.forEach((value, i) => {
    const field = shape.fields[i];
    if (field) pairs.push([field.name, value]);
  });
  return pairs;
}
