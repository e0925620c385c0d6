/**
 * Tests for shape call generation, evaluated through the value emitter
 */

import { describe, it, expect } from "vitest";
import { ShapeMismatchError } from "@untagged/runtime";
import {
  InvalidArgumentShapeError,
  UnknownFieldError,
  UpdateInMatchContextError,
  createShapeDescriptor,
  generateShapeCall,
  planConstruct,
  planUpdate,
  type AssociationEntry,
  type CallSiteArgument,
} from "@untagged/tuple";
import { valueEmitter } from "./value-emitter.js";

const point = createShapeDescriptor("deftuple", "point", [
  ["x", "0"],
  ["y", "0"],
  ["z", "0"],
]);

const timestamp = createShapeDescriptor("deftuplep", "timestamp", ["date", "time"]);

function entries(...pairs: [string, unknown][]): AssociationEntry<unknown>[] {
  return pairs.map(([key, value]) => ({ key, value }));
}

function run(arg: CallSiteArgument<unknown>, shape = point): unknown {
  return generateShapeCall(valueEmitter, shape, arg);
}

describe("construct", () => {
  it("should fill every field from its default", () => {
    expect(run({ kind: "empty" })).toEqual([0, 0, 0]);
  });

  it("should return a distinct container for each construction", () => {
    const a = run({ kind: "empty" });
    const b = run({ kind: "empty" });

    expect(a).toEqual(b);
    expect(a).not.toBe(b);
  });

  it("should default fields declared without a default to undefined", () => {
    expect(run({ kind: "empty" }, timestamp)).toEqual([undefined, undefined]);
    expect(
      run({ kind: "pairWithFieldName", container: run({ kind: "empty" }, timestamp), field: "date" }, timestamp)
    ).toBeUndefined();
  });

  it("should apply overrides by field name", () => {
    expect(run({ kind: "singleAssociationList", entries: entries(["z", 3], ["x", 7]) })).toEqual([
      7, 0, 3,
    ]);
  });

  it("should keep the first value of a repeated field", () => {
    const arg: CallSiteArgument<unknown> = {
      kind: "singleAssociationList",
      entries: entries(["x", 1], ["y", 2], ["z", 3], ["x", 111], ["y", 222], ["z", 333]),
    };

    expect(run(arg)).toEqual([1, 2, 3]);
  });

  it("should rebind the defaults of unnamed fields through the wildcard key", () => {
    const arg: CallSiteArgument<unknown> = {
      kind: "singleAssociationList",
      entries: entries(["_", undefined], ["y", 2]),
    };

    expect(run(arg)).toEqual([undefined, 2, undefined]);
  });

  it("should report the first key that names no field", () => {
    const arg: CallSiteArgument<unknown> = {
      kind: "singleAssociationList",
      entries: entries(["x", 1], ["w", 2], ["v", 3]),
    };

    expect(() => run(arg)).toThrow(UnknownFieldError);
    expect(() => run(arg)).toThrow('tuple point does not have the key: "w"');
  });

  it("should list the known fields in the unknown key error", () => {
    let caught: unknown;
    try {
      run({ kind: "singleFieldName", field: "w" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(UnknownFieldError);
    expect(caught instanceof UnknownFieldError ? [caught.shapeName, caught.help] : []).toEqual([
      "point",
      "known fields: x, y, z",
    ]);
  });
});

describe("index", () => {
  it("should return the zero-based field position", () => {
    expect(run({ kind: "singleFieldName", field: "y" })).toBe(1);
  });

  it("should reject an unknown field", () => {
    expect(() => run({ kind: "singleFieldName", field: "w" })).toThrow(
      'tuple point does not have the key: "w"'
    );
  });
});

describe("get", () => {
  it("should read the field's slot", () => {
    expect(run({ kind: "pairWithFieldName", container: [4, 5, 6], field: "z" })).toBe(6);
  });

  it("should name the shape and field when the field is unknown", () => {
    const get = () => run({ kind: "pairWithFieldName", container: [4, 5, 6], field: "w" });

    expect(get).toThrow(UnknownFieldError);
    expect(get).toThrow('tuple point does not have the key: "w"');
  });
});

describe("update", () => {
  it("should replace named fields without touching the original", () => {
    const original = [1, 2, 3];
    const updated = run({
      kind: "pairWithAssociationList",
      container: original,
      entries: entries(["y", 9]),
    });

    expect(updated).toEqual([1, 9, 3]);
    expect(original).toEqual([1, 2, 3]);
  });

  it("should let the last write to a field win", () => {
    const arg: CallSiteArgument<unknown> = {
      kind: "pairWithAssociationList",
      container: [0, 0, 0],
      entries: entries(["x", 1], ["y", 2], ["x", 111]),
    };

    expect(run(arg)).toEqual([111, 2, 0]);
  });

  it("should treat the wildcard key as an ordinary field name", () => {
    const arg: CallSiteArgument<unknown> = {
      kind: "pairWithAssociationList",
      container: [0, 0, 0],
      entries: entries(["_", 1]),
    };

    expect(() => run(arg)).toThrow('tuple point does not have the key: "_"');
  });

  it("should reject an unknown field", () => {
    const arg: CallSiteArgument<unknown> = {
      kind: "pairWithAssociationList",
      container: [0, 0, 0],
      entries: entries(["y", 1], ["w", 2]),
    };

    expect(() => run(arg)).toThrow(UnknownFieldError);
    expect(() => run(arg)).toThrow('tuple point does not have the key: "w"');
  });
});

describe("convert", () => {
  it("should zip a run-time tuple with the field names", () => {
    expect(run({ kind: "singleOpaqueExpression", value: [1, 2, 3] })).toEqual([
      ["x", 1],
      ["y", 2],
      ["z", 3],
    ]);
  });

  it("should reject a tuple of the wrong size at run time", () => {
    const convert = () => run({ kind: "singleOpaqueExpression", value: [1, 2] });

    expect(convert).toThrow(ShapeMismatchError);
    expect(convert).toThrow("expected argument to be a point tuple of size 3, got: [ 1, 2 ]");
  });

  it("should rebuild the same association list from its own output", () => {
    const container = [3, "b", null];
    const list = run({ kind: "singleOpaqueExpression", value: container });
    if (!Array.isArray(list)) throw new Error("expected an association list");

    const rebuilt = run({
      kind: "singleAssociationList",
      entries: list.map((pair) => {
        if (!Array.isArray(pair)) throw new Error("expected a pair");
        return { key: String(pair[0]), value: pair[1] };
      }),
    });

    expect(run({ kind: "singleOpaqueExpression", value: rebuilt })).toEqual(list);
  });
});

describe("invalid", () => {
  it("should throw with the given argument text", () => {
    expect(() => run({ kind: "invalid", given: "u" })).toThrow(
      new InvalidArgumentShapeError("u")
    );
    expect(() => run({ kind: "invalid", given: "u" })).toThrow(
      "expected arguments to be a compile time field name or association list, got: u"
    );
  });
});

describe("planning in pattern context", () => {
  it("should leave unnamed fields as wildcards", () => {
    const slots = planConstruct(point, entries(["y", 2]), true);

    expect(slots.map((s) => s.kind)).toEqual(["wildcard", "value", "wildcard"]);
  });

  it("should reject updates before resolving any field", () => {
    const plan = () => planUpdate(point, entries(["w", 1]), true);

    expect(plan).toThrow(UpdateInMatchContextError);
    expect(plan).toThrow("cannot invoke update style macro inside match");
  });
});
