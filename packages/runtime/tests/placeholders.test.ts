import { describe, it, expect } from "vitest";
import { deftuple, deftuplep, matches } from "@untagged/runtime";

describe("macro placeholders", () => {
  it("should fail loudly when the transformer did not run", () => {
    expect(() => deftuple({ x: 0 })).toThrow(
      "deftuple() must be processed by the untagged transformer at compile time"
    );
    expect(() => deftuplep(["date", ["time", 0]])).toThrow(
      "deftuplep() must be processed by the untagged transformer at compile time"
    );
    expect(() => matches([1], [1])).toThrow(
      "matches() must be processed by the untagged transformer at compile time"
    );
  });
});
