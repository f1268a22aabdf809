// ---------------------------------------------------------------------------
// @pwgauge/engine
//
// Heuristic password strength scoring. Pure, synchronous, no I/O in the
// scorer; configuration loading and formatting live alongside it.
// ---------------------------------------------------------------------------

// Schemas
export {
  AssessmentSchema,
  CharacterClassSchema,
  FindingSchema,
  RatingSchema,
  RATINGS,
  RATING_LABELS,
  type Assessment,
  type CharacterClass,
  type Finding,
  type FindingKind,
  type Rating,
} from "./schemas.js";

// Scoring
export { assess, lengthScore, ratingForScore } from "./scoring.js";
export { buildSuggestions, suggestionCategory } from "./suggestions.js";

// Detectors
export {
  CHARACTER_CLASSES,
  classLabel,
  profileCharacters,
  toCodePoints,
  type CharacterClassPredicate,
  type CharacterClassProfile,
} from "./detectors/character-classes.js";
export { shannonEntropy, type EntropyEstimate } from "./detectors/entropy.js";
export { findCommonPatterns } from "./detectors/patterns.js";
export { findRuns, type Run } from "./detectors/runs.js";

// Config
export {
  CONFIG_FILE_NAME,
  ConfigError,
  DEFAULT_SCORING_CONFIG,
  ScoringConfigOverridesSchema,
  didYouMean,
  loadConfig,
  loadConfigFile,
  resolveScoringConfig,
  type ScoreThresholds,
  type ScoringConfig,
  type ScoringConfigOverrides,
  type ScoringWeights,
} from "./config.js";

// Formatters
export { describeFinding } from "./formatters/describe.js";
export { generateMarkdownReport, type ReportOptions } from "./formatters/markdown-report.js";

// Logging
export { logger } from "./logger.js";
