/**
 * @untagged/runtime
 *
 * What generated code and user code import: the macro placeholders, the
 * container primitives and the run-time association-list converter.
 */

export {
  deftuple,
  deftuplep,
  matches,
  _,
  type ShapeInfo,
  type TupleShape,
  type FieldOverrides,
  type FieldUpdates,
  type FieldSpec,
} from "./placeholders.js";

export {
  arity,
  getAt,
  isContainer,
  toOrderedValues,
  withReplaced,
  type Container,
} from "./container.js";

export { ShapeMismatchError, toAssociationList, type AssociationList } from "./convert.js";
