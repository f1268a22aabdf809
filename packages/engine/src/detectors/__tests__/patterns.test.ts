import { describe, it, expect } from "vitest";
import { findCommonPatterns } from "../patterns.js";

describe("findCommonPatterns", () => {
  it("returns every matching pattern in list order", () => {
    expect(findCommonPatterns("my12345678", ["qwerty", "123456", "12345678"])).toEqual([
      "123456",
      "12345678",
    ]);
  });

  it("compares case-insensitively on both sides", () => {
    expect(findCommonPatterns("xxQWERTYxx", ["Qwerty"])).toEqual(["Qwerty"]);
  });

  it("returns nothing for an empty list", () => {
    expect(findCommonPatterns("password", [])).toEqual([]);
  });
});
