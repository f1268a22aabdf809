import { describe, it, expect } from "vitest";
import { findRuns } from "../runs.js";
import { toCodePoints } from "../character-classes.js";

const runs = (pw: string, min = 3) => findRuns(toCodePoints(pw), min);

describe("findRuns", () => {
  it("returns nothing for short or run-free input", () => {
    expect(runs("")).toEqual([]);
    expect(runs("ab")).toEqual([]);
    expect(runs("aB3!kT9z")).toEqual([]);
  });

  it("extends a run as far as it goes", () => {
    expect(runs("x1234567y")).toEqual([
      { kind: "sequential", text: "1234567", start: 1, direction: "ascending" },
    ]);
  });

  it("detects descending digits", () => {
    expect(runs("Z987")).toEqual([
      { kind: "sequential", text: "987", start: 1, direction: "descending" },
    ]);
  });

  it("prefers a repeated run at the same position", () => {
    expect(runs("111234")).toEqual([
      { kind: "repeated", text: "111", start: 0 },
      { kind: "sequential", text: "234", start: 3, direction: "ascending" },
    ]);
  });

  it("does not reuse characters of a reported run", () => {
    // "abc" then "cba" would share the 'c'
    expect(runs("abcba")).toEqual([
      { kind: "sequential", text: "abc", start: 0, direction: "ascending" },
    ]);
  });

  it("honours a custom minimum run length", () => {
    expect(runs("abXaaY", 2)).toEqual([
      { kind: "sequential", text: "ab", start: 0, direction: "ascending" },
      { kind: "repeated", text: "aa", start: 3 },
    ]);
    expect(runs("abcd", 5)).toEqual([]);
  });

  it("only steps within one character class", () => {
    expect(runs("?@A")).toEqual([]);
    expect(runs("./0")).toEqual([]);
    expect(runs("789:;")).toEqual([
      { kind: "sequential", text: "789", start: 0, direction: "ascending" },
    ]);
    expect(runs("XYZ[\\")).toEqual([
      { kind: "sequential", text: "XYZ", start: 0, direction: "ascending" },
    ]);
  });

  it("detects keyboard row runs in either direction", () => {
    expect(runs("Tqwe5")).toEqual([{ kind: "keyboard", text: "qwe", start: 1 }]);
    expect(runs("poiu")).toEqual([{ kind: "keyboard", text: "poiu", start: 0 }]);
    expect(runs("ZXCV")).toEqual([{ kind: "keyboard", text: "ZXCV", start: 0 }]);
  });

  it("does not join keyboard neighbours across case or rows", () => {
    expect(runs("qWe")).toEqual([]);
    expect(runs("qaz")).toEqual([]);
  });

  it("tries alphabetical sequences before keyboard runs", () => {
    expect(runs("asdfgh")).toEqual([{ kind: "keyboard", text: "asdfgh", start: 0 }]);
    expect(runs("fghjkl")).toEqual([
      { kind: "sequential", text: "fgh", start: 0, direction: "ascending" },
      { kind: "sequential", text: "jkl", start: 3, direction: "ascending" },
    ]);
  });

  it("ignores consecutive non-ASCII code points for sequences", () => {
    expect(runs("абвг")).toEqual([]);
  });

  it("reports repeated non-ASCII characters with code-point offsets", () => {
    expect(runs("😀ééé")).toEqual([{ kind: "repeated", text: "ééé", start: 1 }]);
  });
});
