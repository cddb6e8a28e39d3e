import { describe, expect, it } from "vitest";
import { attempt } from "./result.js";
import { IndexOutOfRangeError } from "./errors.js";

describe("attempt", () => {
  it("wraps a value", () => {
    expect(attempt(() => 42)).toEqual({ ok: true, value: 42 });
  });

  it("captures timeline errors", () => {
    const error = new IndexOutOfRangeError("Index out of range", { index: 3, size: 2 });
    expect(
      attempt(() => {
        throw error;
      })
    ).toEqual({ ok: false, error });
  });

  it("rethrows anything else", () => {
    expect(() =>
      attempt(() => {
        throw new TypeError("bug");
      })
    ).toThrow(TypeError);
  });
});
