import { describe, it, expect } from "vitest";
import { ShapeMismatchError, toAssociationList } from "@untagged/runtime";

describe("toAssociationList", () => {
  it("should zip values with field names in shape order", () => {
    expect(toAssociationList("point", ["x", "y", "z"], [1, 2, 3])).toEqual([
      ["x", 1],
      ["y", 2],
      ["z", 3],
    ]);
  });

  it("should keep undefined slots", () => {
    expect(toAssociationList("timestamp", ["date", "time"], [undefined, undefined])).toEqual([
      ["date", undefined],
      ["time", undefined],
    ]);
  });

  it("should reject a tuple of the wrong size", () => {
    expect(() => toAssociationList("point", ["x", "y", "z"], [1, 2])).toThrow(
      "expected argument to be a point tuple of size 3, got: [ 1, 2 ]"
    );
  });

  it("should reject a value that is not a tuple", () => {
    expect(() => toAssociationList("point", ["x", "y", "z"], { x: 1 })).toThrow(
      "expected argument to be a literal field name, literal association list or a point tuple, got runtime: { x: 1 }"
    );
  });

  it("should describe the mismatch on the error", () => {
    const value = "abc";
    let caught: unknown;
    try {
      toAssociationList("pair", ["a", "b"], value);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ShapeMismatchError);
    if (caught instanceof ShapeMismatchError) {
      expect(caught.name).toBe("ShapeMismatchError");
      expect(caught.shapeName).toBe("pair");
      expect(caught.expectedArity).toBe(2);
      expect(caught.value).toBe("abc");
      expect(caught.message).toBe(
        "expected argument to be a literal field name, literal association list or a pair tuple, got runtime: 'abc'"
      );
    }
  });
});
