/**
 * Password strength scorer.
 *
 * Positive sub-scores (length, character classes, entropy) are blended by
 * their weights into 0–100, then every common-pattern and run finding
 * subtracts `weights.penalty`. The result is rounded and clamped once.
 */

import { DEFAULT_SCORING_CONFIG, type ScoringConfig, type ScoreThresholds } from "./config.js";
import type { Assessment, Finding, Rating } from "./schemas.js";
import { RATINGS } from "./schemas.js";
import { CHARACTER_CLASSES, profileCharacters, toCodePoints } from "./detectors/character-classes.js";
import { shannonEntropy } from "./detectors/entropy.js";
import { findCommonPatterns } from "./detectors/patterns.js";
import { findRuns } from "./detectors/runs.js";
import { buildSuggestions } from "./suggestions.js";

/**
 * Length contribution in [0, 1]. Zero below `minLength`, 1 at and beyond
 * `idealLength`, linear in between with `minLength` itself above zero.
 */
export function lengthScore(length: number, config: Pick<ScoringConfig, "minLength" | "idealLength">): number {
  if (length < config.minLength) return 0;
  const span = config.idealLength - config.minLength + 1;
  return Math.min(1, (length - config.minLength + 1) / span);
}

/** Highest band whose lower bound is <= score; below the first bound is very-weak. */
export function ratingForScore(score: number, thresholds: ScoreThresholds): Rating {
  let rating: Rating = RATINGS[0];
  for (let i = 0; i < thresholds.length; i++) {
    if (score >= thresholds[i]) rating = RATINGS[i];
  }
  return rating;
}

export function assess(password: string, config: ScoringConfig = DEFAULT_SCORING_CONFIG): Assessment {
  const chars = toCodePoints(password);
  const findings: Finding[] = [];
  let penalties = 0;

  // 1. Length
  const fLength = lengthScore(chars.length, config);
  if (chars.length < config.minLength) {
    findings.push({ kind: "too-short", length: chars.length, minLength: config.minLength });
  }

  // 2. Character classes
  const profile = profileCharacters(chars);
  for (const cls of CHARACTER_CLASSES) {
    if (!profile.present[cls.id]) {
      findings.push({ kind: "missing-character-class", characterClass: cls.id });
    }
  }
  const fClasses = profile.classCount / CHARACTER_CLASSES.length;

  // 3. Entropy
  const entropy = shannonEntropy(chars);
  const fEntropy = Math.min(1, entropy.bits / config.entropyTargetBits);
  if (entropy.bitsPerCharacter < config.minBitsPerCharacter) {
    findings.push({
      kind: "low-entropy",
      bitsPerCharacter: entropy.bitsPerCharacter,
      threshold: config.minBitsPerCharacter,
    });
  }

  // 4. Common patterns
  for (const pattern of findCommonPatterns(password, config.commonPatterns)) {
    findings.push({ kind: "common-pattern", pattern });
    penalties += config.weights.penalty;
  }

  // 5. Runs
  for (const run of findRuns(chars, config.minRunLength)) {
    switch (run.kind) {
      case "repeated":
        findings.push({ kind: "repeated-run", run: run.text, start: run.start });
        break;
      case "keyboard":
        findings.push({ kind: "keyboard-run", run: run.text, start: run.start });
        break;
      case "sequential":
        findings.push({ kind: "sequential-run", run: run.text, start: run.start, direction: run.direction });
        break;
    }
    penalties += config.weights.penalty;
  }

  // 6. Combine, then clamp exactly once
  const { length: wLength, classes: wClasses, entropy: wEntropy } = config.weights;
  const positive =
    (100 * (wLength * fLength + wClasses * fClasses + wEntropy * fEntropy)) /
    (wLength + wClasses + wEntropy);
  const score = Math.max(0, Math.min(100, Math.round(positive - penalties)));

  return Object.freeze({
    score,
    rating: ratingForScore(score, config.scoreThresholds),
    entropy: entropy.bits,
    findings: Object.freeze(findings.map((f) => Object.freeze(f))),
    suggestions: Object.freeze(buildSuggestions(findings, config)),
  });
}
