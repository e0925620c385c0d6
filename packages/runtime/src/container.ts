/**
 * Container primitives for untagged tuples.
 *
 * A tuple is a plain array whose length is the shape's arity. It carries no
 * tag and is never mutated: replacing a slot allocates a new array.
 */

/** A fixed-arity, untagged tuple value. */
export type Container<T = unknown> = readonly T[];

/** Check whether a run-time value can be a tuple at all. */
export function isContainer(value: unknown): value is Container {
  return Array.isArray(value);
}

/** Number of slots in the tuple. */
export function arity(container: Container): number {
  return container.length;
}

/** Read the slot at a zero-based index. */
export function getAt<T>(container: Container<T>, index: number): T | undefined {
  return container[index];
}

/**
 * Copy-on-write slot replacement.
 *
 * @throws RangeError if `index` is outside the tuple
 */
export function withReplaced<T>(container: Container<T>, index: number, value: T): T[] {
  return container.with(index, value);
}

/** The slots in order, as a fresh array. */
export function toOrderedValues<T>(container: Container<T>): T[] {
  return Array.from(container);
}
