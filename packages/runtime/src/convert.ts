/**
 * Run-time conversion of an opaque tuple value into an association list.
 *
 * The transformer emits a call to `toAssociationList` when the argument of a
 * single-argument shape call cannot be narrowed to a literal at build time.
 */

import { inspect } from "node:util";
import { arity, isContainer, toOrderedValues } from "./container.js";

/** Ordered `[field, value]` pairs in shape order. */
export type AssociationList<F extends string = string, V = unknown> = [F, V][];

/**
 * Thrown when a value handed to a shape at run time is not a tuple of that
 * shape.
 */
export class ShapeMismatchError extends Error {
  constructor(
    readonly shapeName: string,
    readonly expectedArity: number,
    readonly value: unknown,
    message: string
  ) {
    super(message);
    this.name = "ShapeMismatchError";
  }
}

/**
 * Zip a tuple with its shape's field names.
 *
 * @example
 * ```typescript
 * toAssociationList("point", ["x", "y", "z"], [1, 2, 3]);
 * // → [["x", 1], ["y", 2], ["z", 3]]
 * ```
 *
 * @throws ShapeMismatchError if `value` is not an array of the shape's arity
 */
export function toAssociationList<F extends string>(
  shapeName: string,
  fieldNames: readonly F[],
  value: unknown
): AssociationList<F> {
  if (!isContainer(value)) {
    throw new ShapeMismatchError(
      shapeName,
      fieldNames.length,
      value,
      `expected argument to be a literal field name, literal association list or a ${shapeName} tuple, got runtime: ${inspect(value)}`
    );
  }

  if (arity(value) !== fieldNames.length) {
    throw new ShapeMismatchError(
      shapeName,
      fieldNames.length,
      value,
      `expected argument to be a ${shapeName} tuple of size ${fieldNames.length}, got: ${inspect(value)}`
    );
  }

  const values = toOrderedValues(value);
  return fieldNames.map((field, i): [F, unknown] => [field, values[i]]);
}
