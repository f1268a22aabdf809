/**
 * Character classification.
 *
 * Each class is a pure predicate over a single code point. The scorer only
 * iterates CHARACTER_CLASSES, so a new class needs an entry here and in
 * CharacterClassSchema, nothing else.
 */

import type { CharacterClass } from "../schemas.js";

export interface CharacterClassPredicate {
  id: CharacterClass;
  label: string;
  matches(char: string): boolean;
}

const ASCII_ALNUM = /^[A-Za-z0-9]$/;

export const CHARACTER_CLASSES: readonly CharacterClassPredicate[] = [
  { id: "lowercase", label: "lowercase letters", matches: (ch) => /^[a-z]$/.test(ch) },
  { id: "uppercase", label: "uppercase letters", matches: (ch) => /^[A-Z]$/.test(ch) },
  { id: "digit", label: "digits", matches: (ch) => /^[0-9]$/.test(ch) },
  // Punctuation, whitespace and everything outside ASCII.
  { id: "special", label: "special characters", matches: (ch) => !ASCII_ALNUM.test(ch) },
];

export interface CharacterClassProfile {
  length: number;
  distinct: number;
  present: Record<CharacterClass, boolean>;
  classCount: number;
}

/** Split into code points so astral characters count once. */
export function toCodePoints(password: string): string[] {
  return Array.from(password);
}

export function profileCharacters(chars: readonly string[]): CharacterClassProfile {
  const present: Record<CharacterClass, boolean> = {
    lowercase: false,
    uppercase: false,
    digit: false,
    special: false,
  };

  for (const cls of CHARACTER_CLASSES) {
    present[cls.id] = chars.some((ch) => cls.matches(ch));
  }

  return {
    length: chars.length,
    distinct: new Set(chars).size,
    present,
    classCount: CHARACTER_CLASSES.filter((cls) => present[cls.id]).length,
  };
}

export function classLabel(id: CharacterClass): string {
  return CHARACTER_CLASSES.find((cls) => cls.id === id)?.label ?? id;
}
