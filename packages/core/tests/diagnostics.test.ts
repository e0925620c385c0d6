/**
 * Tests for the diagnostics catalog, builder and CLI renderer
 */

import { describe, it, expect, vi } from "vitest";
import * as ts from "typescript";
import {
  DiagnosticBuilder,
  DiagnosticCategory,
  TS9401,
  TS9402,
  TS9403,
  TS9406,
  formatDiagnosticMessage,
  getDiagnosticDescriptor,
  plainToRichDiagnostic,
  printDiagnostics,
  renderDiagnosticCLI,
  renderDiagnosticsCLI,
  type RichDiagnostic,
} from "@untagged/core";

const source = `const t = [1, 2, 3];\nconst w = point(t, "w");\n`;

function parse(): ts.SourceFile {
  return ts.createSourceFile("src/space.ts", source, ts.ScriptTarget.Latest, true);
}

function findStringLiteral(sf: ts.SourceFile, text: string): ts.StringLiteral {
  let found: ts.StringLiteral | undefined;
  const visit = (node: ts.Node): void => {
    if (!found && ts.isStringLiteral(node) && node.text === text) {
      found = node;
    }
    ts.forEachChild(node, visit);
  };
  visit(sf);
  if (!found) throw new Error(`no literal "${text}"`);
  return found;
}

describe("formatDiagnosticMessage", () => {
  it("should interpolate placeholders", () => {
    expect(formatDiagnosticMessage(TS9403, { shape: "point", field: "w" })).toBe(
      'tuple point does not have the key: "w"'
    );
    expect(formatDiagnosticMessage(TS9401, { type: "deftuple", given: "1" })).toBe(
      "deftuple fields must be string literals, got: 1"
    );
    expect(
      formatDiagnosticMessage(TS9402, { field: "x", cause: "functions cannot be copied" })
    ).toBe("invalid value for tuple field x, functions cannot be copied");
    expect(formatDiagnosticMessage(TS9406, { type: "deftuplep", field: "a" })).toBe(
      'deftuplep field "a" is defined more than once'
    );
  });

  it("should leave unknown placeholders in place", () => {
    expect(formatDiagnosticMessage(TS9403, { shape: "point" })).toBe(
      'tuple point does not have the key: "{field}"'
    );
  });
});

describe("catalog", () => {
  it("should look descriptors up by code", () => {
    expect(getDiagnosticDescriptor(9403)).toBe(TS9403);
    expect(getDiagnosticDescriptor(9999)).toBeUndefined();
  });
});

describe("DiagnosticBuilder", () => {
  it("should emit the interpolated diagnostic", () => {
    const sf = parse();
    const emitted: RichDiagnostic[] = [];
    const node = findStringLiteral(sf, "w");

    const result = new DiagnosticBuilder(TS9403, sf, (d) => emitted.push(d))
      .at(node)
      .withArgs({ shape: "point" })
      .withArgs({ field: "w" })
      .help("known fields: x, y, z")
      .emit();

    expect(emitted).toEqual([result]);
    expect(result.code).toBe(9403);
    expect(result.category).toBe(DiagnosticCategory.CallSite);
    expect(result.message).toBe('tuple point does not have the key: "w"');
    expect(result.primarySpan?.node).toBe(node);
    expect(result.help).toBe("known fields: x, y, z");
    expect(result.explanation).toBe(TS9403.explanation);
  });

  it("should collect secondary labels", () => {
    const sf = parse();
    const definition = sf.statements[0];
    if (!definition) throw new Error("expected a statement");

    const result = new DiagnosticBuilder(TS9403, sf, () => undefined)
      .label(definition, "t defined here")
      .emit();

    expect(result.labels).toEqual([{ node: definition, message: "t defined here" }]);
  });
});

describe("renderDiagnosticCLI", () => {
  it("should render a Rust-style block", () => {
    const sf = parse();
    const diagnostic = new DiagnosticBuilder(TS9403, sf, () => undefined)
      .at(findStringLiteral(sf, "w"))
      .withArgs({ shape: "point", field: "w" })
      .help("known fields: x, y, z")
      .emit();

    const rendered = renderDiagnosticCLI(diagnostic, { colors: false, contextLines: 0 });

    expect(rendered.split("\n")).toEqual([
      'error[TS9403]: tuple point does not have the key: "w"',
      "  --> src/space.ts:2:20",
      "    |",
      '  2 | const w = point(t, "w");',
      "    | " + " ".repeat(19) + "^^^",
      "    |",
      "   = help: known fields: x, y, z",
    ]);
  });

  it("should render labels below the source lines", () => {
    const sf = parse();
    const definition = sf.statements[0];
    if (!definition) throw new Error("expected a statement");
    const diagnostic = new DiagnosticBuilder(TS9403, sf, () => undefined)
      .at(findStringLiteral(sf, "w"))
      .withArgs({ shape: "point", field: "w" })
      .label(definition, "t defined here")
      .emit();

    const rendered = renderDiagnosticCLI(diagnostic, { colors: false, contextLines: 0 });

    expect(rendered.split("\n").slice(4)).toEqual([
      "    | " + " ".repeat(19) + "^^^",
      "    | 1:1: t defined here",
      "    |",
    ]);
  });

  it("should append the explanation when asked", () => {
    const diagnostic = new DiagnosticBuilder(TS9403, parse(), () => undefined)
      .withArgs({ shape: "point", field: "w" })
      .emit();

    const rendered = renderDiagnosticCLI(diagnostic, { colors: false, showExplanation: true });

    expect(rendered.split("\n")).toEqual([
      'error[TS9403]: tuple point does not have the key: "w"',
      "",
      "Explanation:",
      ...TS9403.explanation.split("\n").map((line) => `  ${line}`),
    ]);
  });

  it("should render a diagnostic without a span as its header", () => {
    const diagnostic = plainToRichDiagnostic("expansion failed", "error");
    expect(renderDiagnosticCLI(diagnostic, { colors: false })).toBe(
      "error[TS9407]: expansion failed"
    );
  });

  it("should colorize when asked", () => {
    const diagnostic = plainToRichDiagnostic("expansion failed", "warning");
    expect(renderDiagnosticCLI(diagnostic, { colors: true })).toBe(
      "\x1b[1m\x1b[33mwarning[TS9407]\x1b[0m: \x1b[1mexpansion failed\x1b[0m"
    );
  });
});

describe("renderDiagnosticsCLI", () => {
  it("should append a summary line", () => {
    const rendered = renderDiagnosticsCLI(
      [plainToRichDiagnostic("first", "error"), plainToRichDiagnostic("second", "warning")],
      { colors: false }
    );

    expect(rendered).toBe(
      "error[TS9407]: first\n\nwarning[TS9407]: second\n\n1 error, 1 warning generated"
    );
  });

  it("should render nothing for no diagnostics", () => {
    expect(renderDiagnosticsCLI([])).toBe("");
  });
});

describe("printDiagnostics", () => {
  it("should write the rendered block to stderr", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    try {
      printDiagnostics([plainToRichDiagnostic("first", "error")], { colors: false });
      printDiagnostics([], { colors: false });

      expect(spy.mock.calls).toEqual([["error[TS9407]: first\n\n1 error generated"]]);
    } finally {
      spy.mockRestore();
    }
  });
});
