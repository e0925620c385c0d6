/**
 * Tests for macro import cleanup
 *
 * Verifies that import declarations are correctly trimmed or removed
 * when their specifiers resolve to macros during expansion.
 */

import { describe, it, expect } from "vitest";
import { transformCode } from "../src/pipeline.js";

function transformSource(source: string): string {
  return transformCode(source, { fileName: "imports.ts" }).code;
}

describe("macro import cleanup", () => {
  it("removes an import whose specifiers are all expanded macros", () => {
    const output = transformSource(`
import { deftuple, matches } from "@untagged/runtime";
const point = deftuple(["x"]);
export const isPoint = (v: unknown) => matches(v, point());
`);

    expect(output).not.toContain("import");
    expect(output).toContain(
      "export const isPoint = (v: unknown) => Array.isArray(v) && v.length === 1;"
    );
  });

  it("keeps the specifiers that are not macros", () => {
    const output = transformSource(`
import { deftuple, _, type ShapeInfo } from "@untagged/runtime";
const point = deftuple(["x"]);
export const info: ShapeInfo = point;
`);

    expect(output).toContain('import { _, type ShapeInfo } from "@untagged/runtime";');
  });

  it("keeps a default import next to removed macros", () => {
    const output = transformSource(`
import runtime, { deftuple } from "@untagged/runtime";
const point = deftuple(["x"]);
`);

    expect(output).toContain('import runtime from "@untagged/runtime";');
  });

  it("keeps a macro import that is never called", () => {
    const output = transformSource(`
import { matches } from "@untagged/runtime";
export const x = 1;
`);

    expect(output).toContain('import { matches } from "@untagged/runtime";');
  });

  it("follows renamed imports", () => {
    const output = transformSource(`
import { deftuple as shape } from "@untagged/runtime";
const pair = shape(["a", "b"]);
`);

    expect(output).toContain('const pair = Object.freeze({ name: "pair", fields: ["a", "b"] });');
    expect(output).not.toContain("import");
  });

  it("ignores same-named functions from other modules", () => {
    const output = transformSource(`
import { deftuple } from "./local";
const pair = deftuple(["a", "b"]);
`);

    expect(output).toContain('import { deftuple } from "./local";');
    expect(output).toContain('const pair = deftuple(["a", "b"]);');
  });

  it("ignores type-only imports", () => {
    const output = transformSource(`
import type { deftuple } from "@untagged/runtime";
declare const make: typeof deftuple;
const pair = make(["a"]);
`);

    expect(output).toContain('const pair = make(["a"]);');
  });
});
