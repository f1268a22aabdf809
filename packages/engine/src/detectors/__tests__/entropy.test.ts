import { describe, it, expect } from "vitest";
import { shannonEntropy } from "../entropy.js";
import { toCodePoints } from "../character-classes.js";

const entropy = (pw: string) => shannonEntropy(toCodePoints(pw));

describe("shannonEntropy", () => {
  it("is zero for empty input", () => {
    expect(entropy("")).toEqual({ bitsPerCharacter: 0, bits: 0 });
  });

  it("is zero for a single repeated character", () => {
    expect(entropy("zzzzzz")).toEqual({ bitsPerCharacter: 0, bits: 0 });
  });

  it("is log2(n) per character when all characters differ", () => {
    expect(entropy("abcd")).toEqual({ bitsPerCharacter: 2, bits: 8 });
    expect(entropy("abcdefgh")).toEqual({ bitsPerCharacter: 3, bits: 24 });
  });

  it("penalises repetition relative to full diversity", () => {
    expect(entropy("aabb")).toEqual({ bitsPerCharacter: 1, bits: 4 });
    expect(entropy("aabb").bits).toBeLessThan(entropy("abcd").bits);
  });
});
