import { describe, it, expect } from "vitest";
import { buildSuggestions, suggestionCategory } from "../suggestions.js";
import { DEFAULT_SCORING_CONFIG } from "../config.js";
import type { Finding } from "../schemas.js";

describe("buildSuggestions", () => {
  it("deduplicates by category but keeps each missing class", () => {
    const findings: Finding[] = [
      { kind: "too-short", length: 4, minLength: 8 },
      { kind: "missing-character-class", characterClass: "uppercase" },
      { kind: "missing-character-class", characterClass: "digit" },
      { kind: "common-pattern", pattern: "admin" },
      { kind: "common-pattern", pattern: "qwerty" },
      { kind: "repeated-run", run: "aaa", start: 0 },
      { kind: "repeated-run", run: "bbb", start: 3 },
    ];

    expect(buildSuggestions(findings, DEFAULT_SCORING_CONFIG)).toEqual([
      "Use at least 12 characters.",
      "Add at least one uppercase letter (A-Z).",
      "Add at least one number (0-9).",
      "Avoid dictionary words and well-known passwords.",
      "Avoid repeating the same character 3 or more times in a row.",
    ]);
  });

  it("suggests avoiding neighbouring keys for a keyboard run", () => {
    expect(
      buildSuggestions([{ kind: "keyboard-run", run: "qwe", start: 0 }], DEFAULT_SCORING_CONFIG),
    ).toEqual(["Avoid runs of neighbouring keys such as 'qwe' or 'asd'."]);
  });

  it("returns nothing without findings", () => {
    expect(buildSuggestions([], DEFAULT_SCORING_CONFIG)).toEqual([]);
  });

  it("keys missing classes by class", () => {
    expect(suggestionCategory({ kind: "missing-character-class", characterClass: "lowercase" })).toBe(
      "missing-character-class:lowercase",
    );
    expect(suggestionCategory({ kind: "low-entropy", bitsPerCharacter: 1, threshold: 2.5 })).toBe("low-entropy");
  });
});
