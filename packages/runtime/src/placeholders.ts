/**
 * Placeholder declarations for the untagged macros.
 *
 * These functions are replaced by the transformer at compile time.
 * They exist to:
 * 1. Provide type information to the IDE/type checker
 * 2. Give meaningful errors if the transformer isn't configured
 *
 * @module
 */

import type { AssociationList } from "./convert.js";
import type { Container } from "./container.js";

// ============================================================================
// Shape Types
// ============================================================================

/** What a shape binding holds once the transformer has rewritten it. */
export interface ShapeInfo<F extends string = string> {
  readonly name: string;
  readonly fields: readonly F[];
}

/** Object-literal overrides accepted by the constructor form. */
export type FieldOverrides<F extends string> = { readonly [K in F | "_"]?: unknown };

/** Object-literal updates accepted by the update form. */
export type FieldUpdates<F extends string> = { readonly [K in F]?: unknown };

/**
 * The call surface of a shape. Every call is rewritten at compile time; the
 * signatures only type-check the source.
 */
export interface TupleShape<F extends string> extends ShapeInfo<F> {
  /** Construct with defaults */
  (): unknown[];
  /** Zero-based index of a field */
  (field: F): number;
  /** Construct with overrides */
  (overrides: FieldOverrides<F>): unknown[];
  /** Tuple to association list */
  (tuple: Container): AssociationList<F>;
  /** Read a field */
  (tuple: Container, field: F): unknown;
  /** Copy with fields replaced */
  (tuple: Container, updates: FieldUpdates<F>): unknown[];
}

/** A field of a list-form definition: a bare name or a `[name, default]` pair. */
export type FieldSpec<N extends string> = N | readonly [N, unknown];

// ============================================================================
// Macro Placeholders
// ============================================================================

/**
 * Define an exported tuple shape. The binding name becomes the shape name.
 *
 * @example
 * ```typescript
 * export const point = deftuple({ x: 0, y: 0, z: 0 });
 *
 * point();               // → [0, 0, 0]
 * point({ x: 7 });       // → [7, 0, 0]
 * point(t, "y");         // → t[1]
 * point(t, { y: 9 });    // → t.with(1, 9)
 * ```
 */
export function deftuple<N extends string>(_fields: readonly FieldSpec<N>[]): TupleShape<N>;
export function deftuple<D extends Record<string, unknown>>(
  _fields: D
): TupleShape<Extract<keyof D, string>>;
export function deftuple(_fields: unknown): never {
  throw new Error("deftuple() must be processed by the untagged transformer at compile time");
}

/**
 * Define a module-private tuple shape. Same call surface as {@link deftuple},
 * but the binding is never exported.
 *
 * @example
 * ```typescript
 * const timestamp = deftuplep(["date", "time"]);
 * ```
 */
export function deftuplep<N extends string>(_fields: readonly FieldSpec<N>[]): TupleShape<N>;
export function deftuplep<D extends Record<string, unknown>>(
  _fields: D
): TupleShape<Extract<keyof D, string>>;
export function deftuplep(_fields: unknown): never {
  throw new Error("deftuplep() must be processed by the untagged transformer at compile time");
}

/**
 * Test a value against a shape pattern, binding variables on success.
 *
 * Identifiers in the pattern are assigned when the whole pattern matches;
 * `_` matches anything; other expressions are compared with `===`.
 *
 * @example
 * ```typescript
 * let y: unknown;
 * if (matches(t, point({ x: 0, y }))) {
 *   console.log(y);
 * }
 * ```
 */
export function matches(_value: unknown, _pattern: unknown): boolean {
  throw new Error("matches() must be processed by the untagged transformer at compile time");
}

/** Wildcard for patterns and for the default-rebinding key. */
export const _: undefined = undefined;
