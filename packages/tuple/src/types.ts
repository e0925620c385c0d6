/**
 * Data model for untagged tuple shapes.
 */

import type * as ts from "typescript";

/** A field name, taken from a string literal or an identifier key. */
export type FieldName = string;

/**
 * Printed source text of a field default. Parsed again at every construction
 * site so each site evaluates it freshly.
 */
export type DefaultExpr = string;

export interface ShapeField {
  readonly name: FieldName;
  readonly defaultExpr: DefaultExpr;
}

/** Ordered fields of a shape. Frozen once built. */
export interface ShapeDescriptor {
  readonly name: string;
  readonly fields: readonly ShapeField[];
}

/** The definition macro a shape came from; decides its visibility. */
export type DefinitionKind = "deftuple" | "deftuplep";

/** One `key: value` member of an association list, in source order. */
export interface AssociationEntry<V> {
  readonly key: FieldName;
  readonly value: V;
  readonly node?: ts.Node | undefined;
}

/** Key that rebinds the default of every field not named explicitly. */
export const WILDCARD_KEY = "_";

/** Default text of a field declared without one. */
export const UNDEFINED_DEFAULT: DefaultExpr = "undefined";
