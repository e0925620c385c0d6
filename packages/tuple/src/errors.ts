/**
 * Generation-time errors.
 *
 * Each error carries its catalog descriptor and message arguments so the
 * transformer can report it as a structured diagnostic.
 */

import type * as ts from "typescript";
import {
  TS9401,
  TS9402,
  TS9403,
  TS9404,
  TS9405,
  TS9406,
  TS9407,
  formatDiagnosticMessage,
  type DiagnosticDescriptor,
} from "@untagged/core";
import type { DefinitionKind, FieldName, ShapeDescriptor } from "./types.js";

export class TupleMacroError extends Error {
  /** A hint rendered under the diagnostic */
  help: string | undefined;

  constructor(
    readonly descriptor: DiagnosticDescriptor,
    readonly args: Readonly<Record<string, string>>,
    readonly node: ts.Node | undefined
  ) {
    super(formatDiagnosticMessage(descriptor, args));
    this.name = "TupleMacroError";
  }
}

export class NonAtomFieldNameError extends TupleMacroError {
  constructor(kind: DefinitionKind, given: string, node?: ts.Node) {
    super(TS9401, { type: kind, given }, node);
    this.name = "NonAtomFieldNameError";
  }
}

export class InvalidDefaultValueError extends TupleMacroError {
  constructor(field: FieldName, cause: string, node?: ts.Node) {
    super(TS9402, { field, cause }, node);
    this.name = "InvalidDefaultValueError";
  }
}

export class UnknownFieldError extends TupleMacroError {
  readonly shapeName: string;

  constructor(
    shape: ShapeDescriptor,
    readonly field: FieldName,
    node?: ts.Node
  ) {
    super(TS9403, { shape: shape.name, field }, node);
    this.name = "UnknownFieldError";
    this.shapeName = shape.name;
    this.help = `known fields: ${shape.fields.map((f) => f.name).join(", ")}`;
  }
}

export class InvalidArgumentShapeError extends TupleMacroError {
  constructor(given: string, node?: ts.Node) {
    super(TS9404, { given }, node);
    this.name = "InvalidArgumentShapeError";
  }
}

export class UpdateInMatchContextError extends TupleMacroError {
  constructor(node?: ts.Node) {
    super(TS9405, {}, node);
    this.name = "UpdateInMatchContextError";
  }
}

export class DuplicateFieldError extends TupleMacroError {
  constructor(kind: DefinitionKind, field: FieldName, node?: ts.Node) {
    super(TS9406, { type: kind, field }, node);
    this.name = "DuplicateFieldError";
  }
}

/** A macro used somewhere it cannot expand. */
export class MacroUsageError extends TupleMacroError {
  constructor(message: string, node?: ts.Node) {
    super(TS9407, { message }, node);
    this.name = "MacroUsageError";
  }
}
