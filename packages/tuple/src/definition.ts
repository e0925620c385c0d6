/**
 * Reading `const point = deftuple(...)` declarations into shape descriptors.
 */

import * as ts from "typescript";
import { buildFieldTable } from "./fields.js";
import { MacroUsageError, TupleMacroError } from "./errors.js";
import type { DefinitionKind, ShapeDescriptor } from "./types.js";

export type DefinitionResult =
  | { readonly ok: true; readonly shape: ShapeDescriptor }
  | { readonly ok: false; readonly error: TupleMacroError };

/**
 * Build the shape a definition declares. The binding name is the shape name.
 *
 * @throws TupleMacroError when the declaration cannot define a shape
 */
export function readDefinition(
  kind: DefinitionKind,
  list: ts.VariableDeclarationList,
  declaration: ts.VariableDeclaration,
  call: ts.CallExpression,
  sourceFile?: ts.SourceFile
): ShapeDescriptor {
  if (!ts.isIdentifier(declaration.name) || !(list.flags & ts.NodeFlags.Const)) {
    throw new MacroUsageError(`${kind}() must initialize a const declaration`, declaration);
  }
  const [fieldsArg, ...extra] = call.arguments;
  if (!fieldsArg || extra.length > 0) {
    throw new MacroUsageError(`${kind}() expects exactly one field list argument`, call);
  }
  return buildFieldTable(kind, declaration.name.text, fieldsArg, sourceFile);
}

/** Like {@link readDefinition}, returning the failure instead of throwing it. */
export function tryReadDefinition(
  kind: DefinitionKind,
  list: ts.VariableDeclarationList,
  declaration: ts.VariableDeclaration,
  call: ts.CallExpression,
  sourceFile?: ts.SourceFile
): DefinitionResult {
  try {
    return { ok: true, shape: readDefinition(kind, list, declaration, call, sourceFile) };
  } catch (error) {
    if (error instanceof TupleMacroError) return { ok: false, error };
    throw error;
  }
}
