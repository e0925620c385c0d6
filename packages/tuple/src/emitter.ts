/**
 * Code emitters: one method per generated call shape.
 */

import * as ts from "typescript";
import { parseExpression, unwrapExpression } from "@untagged/core";
import { fieldNames } from "./fields.js";
import type { FieldName, ShapeDescriptor, ShapeField } from "./types.js";

/**
 * What a shape call turns into. `E` is the emitter's expression type: syntax
 * for the transformer, plain values for evaluation in tests.
 */
export interface CodeEmitter<E> {
  /** A new container holding `slots` in shape order */
  construct(shape: ShapeDescriptor, slots: readonly E[]): E;

  /** A fresh evaluation of the field's default */
  defaultValue(field: ShapeField): E;

  /** The literal zero-based position of a field */
  index(index: number): E;

  /** Read the value at `index` */
  get(container: E, index: number): E;

  /** A copy of `container` with `value` at `index` */
  update(container: E, index: number, value: E): E;

  /** An association list built from known values */
  associationList(entries: readonly (readonly [FieldName, E])[]): E;

  /** Expand nested calls in a value before it is narrowed */
  expand(value: E): E;

  /**
   * The values of `value` when it is statically a container of `arity`
   * elements, otherwise undefined.
   */
  elements(value: E, arity: number): readonly E[] | undefined;

  /** A run-time conversion of `value` to an association list */
  deferredConversion(shape: ShapeDescriptor, value: E): E;
}

export interface TsCodeEmitterOptions {
  factory: ts.NodeFactory;

  /** The namespace identifier the run-time helpers are imported under */
  runtimeNamespace: () => ts.Identifier;

  /** Expands macro calls nested in an opaque argument */
  expandMacros?: (node: ts.Expression) => ts.Expression;

  /** Parses default text into fresh nodes (default: `parseExpression`) */
  parseDefault?: (text: string) => ts.Expression;
}

export class TsCodeEmitter implements CodeEmitter<ts.Expression> {
  private readonly factory: ts.NodeFactory;
  private readonly options: TsCodeEmitterOptions;

  constructor(options: TsCodeEmitterOptions) {
    this.factory = options.factory;
    this.options = options;
  }

  construct(_shape: ShapeDescriptor, slots: readonly ts.Expression[]): ts.Expression {
    return this.factory.createArrayLiteralExpression([...slots], false);
  }

  defaultValue(field: ShapeField): ts.Expression {
    const parse = this.options.parseDefault ?? parseExpression;
    return parse(field.defaultExpr);
  }

  index(index: number): ts.Expression {
    return this.factory.createNumericLiteral(index);
  }

  get(container: ts.Expression, index: number): ts.Expression {
    return this.factory.createElementAccessExpression(container, index);
  }

  update(container: ts.Expression, index: number, value: ts.Expression): ts.Expression {
    return this.factory.createCallExpression(
      this.factory.createPropertyAccessExpression(container, "with"),
      undefined,
      [this.factory.createNumericLiteral(index), value]
    );
  }

  associationList(entries: readonly (readonly [FieldName, ts.Expression])[]): ts.Expression {
    const f = this.factory;
    return f.createArrayLiteralExpression(
      entries.map(([name, value]) =>
        f.createArrayLiteralExpression([f.createStringLiteral(name), value], false)
      ),
      false
    );
  }

  expand(value: ts.Expression): ts.Expression {
    return this.options.expandMacros ? this.options.expandMacros(value) : value;
  }

  elements(value: ts.Expression, arity: number): readonly ts.Expression[] | undefined {
    const arr = unwrapExpression(value);
    if (!ts.isArrayLiteralExpression(arr) || arr.elements.length !== arity) {
      return undefined;
    }
    const holey = arr.elements.some((e) => ts.isSpreadElement(e) || ts.isOmittedExpression(e));
    return holey ? undefined : arr.elements;
  }

  /** `__untagged_runtime.toAssociationList("point", ["x", "y", "z"], value)` */
  deferredConversion(shape: ShapeDescriptor, value: ts.Expression): ts.Expression {
    const f = this.factory;
    return f.createCallExpression(
      f.createPropertyAccessExpression(this.options.runtimeNamespace(), "toAssociationList"),
      undefined,
      [
        f.createStringLiteral(shape.name),
        f.createArrayLiteralExpression(fieldNames(shape).map((n) => f.createStringLiteral(n))),
        value,
      ]
    );
  }
}

/**
 * `Object.freeze({ name: "point", fields: ["x", "y", "z"] })`, the value a
 * definition binding holds at run time.
 */
export function emitShapeInfo(factory: ts.NodeFactory, shape: ShapeDescriptor): ts.Expression {
  return factory.createCallExpression(
    factory.createPropertyAccessExpression(factory.createIdentifier("Object"), "freeze"),
    undefined,
    [
      factory.createObjectLiteralExpression(
        [
          factory.createPropertyAssignment("name", factory.createStringLiteral(shape.name)),
          factory.createPropertyAssignment(
            "fields",
            factory.createArrayLiteralExpression(
              fieldNames(shape).map((n) => factory.createStringLiteral(n))
            )
          ),
        ],
        false
      ),
    ]
  );
}
