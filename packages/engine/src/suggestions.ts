import type { CharacterClass, Finding } from "./schemas.js";
import type { ScoringConfig } from "./config.js";

/** Findings that share a category share one suggestion. */
export function suggestionCategory(finding: Finding): string {
  return finding.kind === "missing-character-class"
    ? `${finding.kind}:${finding.characterClass}`
    : finding.kind;
}

function classSuggestion(characterClass: CharacterClass): string {
  switch (characterClass) {
    case "lowercase": return "Add lowercase letters (a-z).";
    case "uppercase": return "Add at least one uppercase letter (A-Z).";
    case "digit": return "Add at least one number (0-9).";
    case "special": return "Add special characters (e.g. ! @ # $ %).";
  }
}

function suggestionFor(finding: Finding, config: ScoringConfig): string {
  switch (finding.kind) {
    case "too-short":
      return `Use at least ${config.idealLength} characters.`;
    case "missing-character-class":
      return classSuggestion(finding.characterClass);
    case "low-entropy":
      return "Use a wider variety of characters instead of repeating a few.";
    case "common-pattern":
      return "Avoid dictionary words and well-known passwords.";
    case "sequential-run":
      return "Avoid obvious sequences such as 'abc' or '123'.";
    case "keyboard-run":
      return "Avoid runs of neighbouring keys such as 'qwe' or 'asd'.";
    case "repeated-run":
      return `Avoid repeating the same character ${config.minRunLength} or more times in a row.`;
  }
}

/**
 * One suggestion per distinct finding category, in finding order.
 */
export function buildSuggestions(findings: readonly Finding[], config: ScoringConfig): string[] {
  const seen = new Set<string>();
  const suggestions: string[] = [];

  for (const finding of findings) {
    const category = suggestionCategory(finding);
    if (seen.has(category)) continue;
    seen.add(category);
    suggestions.push(suggestionFor(finding, config));
  }

  return suggestions;
}
