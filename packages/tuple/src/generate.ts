/**
 * Shape call generation: routes a classified call to the Constructor,
 * Updater, Field Getter, Index Resolver or Converter.
 */

import type { CallSiteArgument } from "./classify.js";
import type { CodeEmitter } from "./emitter.js";
import { InvalidArgumentShapeError } from "./errors.js";
import {
  planConstruct,
  planConversion,
  planUpdate,
  requireIndex,
  type ConstructSlot,
} from "./plan.js";
import type { ShapeDescriptor } from "./types.js";

function constructFromSlots<E>(
  emitter: CodeEmitter<E>,
  shape: ShapeDescriptor,
  slots: readonly ConstructSlot<E>[]
): E {
  return emitter.construct(
    shape,
    slots.map((slot) => (slot.kind === "value" ? slot.value : emitter.defaultValue(slot.field)))
  );
}

/**
 * Generate the expansion of one shape call outside a pattern.
 *
 * @throws UnknownFieldError
 * @throws InvalidArgumentShapeError
 */
export function generateShapeCall<E>(
  emitter: CodeEmitter<E>,
  shape: ShapeDescriptor,
  arg: CallSiteArgument<E>
): E {
  switch (arg.kind) {
    case "empty":
      return constructFromSlots(emitter, shape, planConstruct<E>(shape, [], false));

    case "singleFieldName":
      return emitter.index(requireIndex(shape, arg.field, arg.node));

    case "singleAssociationList":
      return constructFromSlots(emitter, shape, planConstruct(shape, arg.entries, false));

    case "singleOpaqueExpression": {
      const value = emitter.expand(arg.value);
      const elements = emitter.elements(value, shape.fields.length);
      return elements
        ? emitter.associationList(planConversion(shape, elements))
        : emitter.deferredConversion(shape, value);
    }

    case "pairWithFieldName":
      return emitter.get(arg.container, requireIndex(shape, arg.field, arg.node));

    case "pairWithAssociationList":
      return planUpdate(shape, arg.entries, false, arg.node).reduce(
        (container, step) => emitter.update(container, step.index, step.value),
        arg.container
      );

    case "invalid":
      throw new InvalidArgumentShapeError(arg.given, arg.node);
  }
}
