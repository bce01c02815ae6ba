/**
 * @file Tests for type guards
 */
import { isObject, hasOwn, hasErrorCode, errorMessage, isNumberArray, isNonNegativeInteger } from "./guards";

describe("util/guards", () => {
  it("isObject accepts plain records only", () => {
    expect(isObject({})).toBe(true);
    expect(isObject(null)).toBe(false);
    expect(isObject([])).toBe(false);
    expect(isObject("x")).toBe(false);
  });

  it("hasOwn ignores inherited keys", () => {
    expect(hasOwn({ a: 1 }, "a")).toBe(true);
    expect(hasOwn({}, "toString")).toBe(false);
  });

  it("hasErrorCode detects Node-style errors", () => {
    const e = Object.assign(new Error("x"), { code: "ENOENT" });
    expect(hasErrorCode(e)).toBe(true);
    expect(hasErrorCode(new Error("x"))).toBe(false);
  });

  it("errorMessage handles errors, message-bearing objects and primitives", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage({ message: 42 })).toBe("42");
    expect(errorMessage("plain")).toBe("plain");
  });

  it("isNumberArray rejects non-finite entries", () => {
    expect(isNumberArray([1, 2.5, -3])).toBe(true);
    expect(isNumberArray([1, Number.NaN])).toBe(false);
    expect(isNumberArray([1, "2"])).toBe(false);
    expect(isNumberArray("1,2")).toBe(false);
  });

  it("isNonNegativeInteger", () => {
    expect(isNonNegativeInteger(0)).toBe(true);
    expect(isNonNegativeInteger(7)).toBe(true);
    expect(isNonNegativeInteger(-1)).toBe(false);
    expect(isNonNegativeInteger(1.5)).toBe(false);
    expect(isNonNegativeInteger("3")).toBe(false);
  });
});
