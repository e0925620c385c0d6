/**
 * Expression macros for tuple definitions, shape calls and `matches`.
 *
 * - `deftuple` / `deftuplep` only expand as the initializer of a const
 *   declaration; the transformer handles that statement itself.
 * - Each definition yields a shape macro that expands calls like `point()`.
 * - `matches(value, point({ x: 1, y }))` compiles to a tuple test.
 */

import * as ts from "typescript";
import {
  DEFAULT_RUNTIME_MODULE,
  defineExpressionMacro,
  unwrapExpression,
  type ExpressionMacro,
} from "@untagged/core";
import { classifyArguments } from "./classify.js";
import { TsCodeEmitter } from "./emitter.js";
import { MacroUsageError } from "./errors.js";
import { generateShapeCall } from "./generate.js";
import { buildPattern, emitPatternTest } from "./pattern.js";
import type { DefinitionKind, ShapeDescriptor } from "./types.js";

/** What shape and `matches` macros need from the transformer. */
export interface ShapeServices {
  /** The shape a callee refers to, if it names a definition */
  resolveShape(callee: ts.Expression): ShapeDescriptor | undefined;

  /** The identifier the run-time module is imported under; requests the import */
  runtimeNamespace(): ts.Identifier;
}

function createDefinitionMacro(kind: DefinitionKind, description: string): ExpressionMacro {
  return defineExpressionMacro({
    name: kind,
    module: DEFAULT_RUNTIME_MODULE,
    description,

    expand(_ctx, callExpr): ts.Expression {
      throw new MacroUsageError(`${kind}() must initialize a const declaration`, callExpr);
    },
  });
}

export const deftupleMacro = createDefinitionMacro(
  "deftuple",
  "Define an exported untagged tuple shape"
);

export const deftuplepMacro = createDefinitionMacro(
  "deftuplep",
  "Define a module-private untagged tuple shape"
);

/** The macro that expands calls of one shape. */
export function createShapeMacro(shape: ShapeDescriptor, services: ShapeServices): ExpressionMacro {
  return defineExpressionMacro({
    name: shape.name,
    description: `Calls of the ${shape.name} tuple shape`,

    expand(ctx, _callExpr, args): ts.Expression {
      const emitter = new TsCodeEmitter({
        factory: ctx.factory,
        runtimeNamespace: () => services.runtimeNamespace(),
        expandMacros: (node) => ctx.expandMacros(node),
        parseDefault: (text) => ctx.parseExpression(text),
      });
      return generateShapeCall(emitter, shape, classifyArguments(args, ctx.sourceFile));
    },
  });
}

export function createMatchesMacro(services: ShapeServices): ExpressionMacro {
  return defineExpressionMacro({
    name: "matches",
    module: DEFAULT_RUNTIME_MODULE,
    description: "Test a value against a tuple pattern, binding named fields",

    expand(ctx, callExpr, args): ts.Expression {
      const [subject, patternArg, ...extra] = args;
      if (!subject || !patternArg || extra.length > 0) {
        throw new MacroUsageError("matches() expects a value and a pattern", callExpr);
      }

      const unwrapped = unwrapExpression(patternArg);
      const patternCall = ts.isCallExpression(unwrapped) ? unwrapped : undefined;
      const shape = patternCall && services.resolveShape(patternCall.expression);
      if (!patternCall || !shape) {
        throw new MacroUsageError(
          `matches() expects a shape call as its pattern, got: ${ctx.printNode(patternArg)}`,
          patternArg
        );
      }

      const pattern = buildPattern(
        shape,
        patternCall,
        (call) => services.resolveShape(call.expression),
        ctx.sourceFile
      );

      const f = ctx.factory;
      if (ts.isIdentifier(subject)) {
        return emitPatternTest(f, pattern, () =>
          ts.setOriginalNode(f.createIdentifier(subject.text), subject)
        );
      }

      // ((s) => test)(subject) evaluates the subject once.
      const param = ctx.generateUniqueName("subject");
      const test = emitPatternTest(f, pattern, () => f.createIdentifier(param.text));
      return f.createCallExpression(
        f.createParenthesizedExpression(
          f.createArrowFunction(
            undefined,
            undefined,
            [f.createParameterDeclaration(undefined, undefined, param)],
            undefined,
            f.createToken(ts.SyntaxKind.EqualsGreaterThanToken),
            test
          )
        ),
        undefined,
        [subject]
      );
    },
  });
}
