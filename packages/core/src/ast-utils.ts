/**
 * Shared AST utility functions for macro implementations.
 */

import * as ts from "typescript";

// =============================================================================
// stripPositions — Mark AST nodes as synthetic
// =============================================================================

/**
 * Recursively mark AST nodes as synthetic by setting positions to -1.
 *
 * Nodes parsed from a scratch source file must not keep their positions, or
 * the printer would read their text out of whichever file it is emitting.
 */
export function stripPositions<T extends ts.Node>(node: T): T {
  ts.setTextRange(node, { pos: -1, end: -1 });
  ts.forEachChild(node, (child) => {
    stripPositions(child);
  });
  return node;
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse a code string into a fresh, position-free expression.
 */
export function parseExpression(code: string): ts.Expression {
  const tempSource = ts.createSourceFile(
    "__untagged_temp__.ts",
    `const __expr__ = (${code});`,
    ts.ScriptTarget.Latest,
    true,
    ts.ScriptKind.TS
  );

  const statement = tempSource.statements[0];
  if (tempSource.statements.length === 1 && statement && ts.isVariableStatement(statement)) {
    const initializer = statement.declarationList.declarations[0]?.initializer;
    if (initializer && ts.isParenthesizedExpression(initializer)) {
      return stripPositions(initializer.expression);
    }
  }

  throw new Error(`Failed to parse expression: ${code}`);
}

// =============================================================================
// Expression inspection
// =============================================================================

/**
 * Look through parentheses and type-only wrappers (`as`, `satisfies`,
 * `<T>x`, `x!`) to the expression that produces the value.
 */
export function unwrapExpression(node: ts.Expression): ts.Expression {
  let current = node;
  for (;;) {
    if (
      ts.isParenthesizedExpression(current) ||
      ts.isAsExpression(current) ||
      ts.isSatisfiesExpression(current) ||
      ts.isTypeAssertionExpression(current) ||
      ts.isNonNullExpression(current)
    ) {
      current = current.expression;
    } else {
      return current;
    }
  }
}

/**
 * The text of a string literal or a template literal without substitutions.
 */
export function getStaticString(node: ts.Node): string | undefined {
  if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) {
    return node.text;
  }
  return undefined;
}

/**
 * The static name of an object literal member key, if it has one.
 */
export function getPropertyNameText(name: ts.PropertyName): string | undefined {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNoSubstitutionTemplateLiteral(name)) {
    return name.text;
  }
  return undefined;
}

// =============================================================================
// Shared printer and dummy source file utilities
// =============================================================================

let sharedPrinter: ts.Printer | undefined;
let sharedDummySourceFile: ts.SourceFile | undefined;

/**
 * Get a shared printer instance for converting AST nodes to source text.
 */
export function getPrinter(): ts.Printer {
  return (sharedPrinter ??= ts.createPrinter({
    newLine: ts.NewLineKind.LineFeed,
  }));
}

/**
 * Get a dummy source file for printing synthetic nodes.
 */
export function getDummySourceFile(): ts.SourceFile {
  return (sharedDummySourceFile ??= ts.createSourceFile(
    "__untagged_print__.ts",
    "",
    ts.ScriptTarget.Latest,
    false,
    ts.ScriptKind.TS
  ));
}

/**
 * Print a node to source text.
 *
 * @param sourceFile - The file the node was parsed from; synthetic nodes can
 *   omit it.
 */
export function printNode(node: ts.Node, sourceFile?: ts.SourceFile): string {
  const printer = getPrinter();
  const sf = sourceFile ?? getDummySourceFile();

  if (ts.isExpression(node)) {
    return printer.printNode(ts.EmitHint.Expression, node, sf);
  }
  return printer.printNode(ts.EmitHint.Unspecified, node, sf);
}

/**
 * Build `(() => { throw new Error(message); })()`, the stand-in for a macro
 * call whose expansion failed.
 */
export function createThrowingExpression(factory: ts.NodeFactory, message: string): ts.Expression {
  return factory.createCallExpression(
    factory.createParenthesizedExpression(
      factory.createArrowFunction(
        undefined,
        undefined,
        [],
        undefined,
        factory.createToken(ts.SyntaxKind.EqualsGreaterThanToken),
        factory.createBlock([
          factory.createThrowStatement(
            factory.createNewExpression(factory.createIdentifier("Error"), undefined, [
              factory.createStringLiteral(message),
            ])
          ),
        ])
      )
    ),
    undefined,
    []
  );
}
