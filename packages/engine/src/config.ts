/**
 * Scoring configuration: defaults, validated overrides and `.pwgauge.yml`
 * loading. Uses Zod for schema validation with helpful error messages.
 *
 * Invalid values fail here, at load time, so the scorer only ever sees a
 * configuration that passed every check.
 */

import { readFileSync, existsSync } from "node:fs";
import { resolve, join } from "node:path";
import { load as parseYaml } from "js-yaml";
import { z } from "zod";
import { logger } from "./logger.js";

/* ------------------------------------------------------------------ */
/*  Types                                                              */
/* ------------------------------------------------------------------ */

export interface ScoringWeights {
  readonly length: number;
  readonly classes: number;
  readonly entropy: number;
  /** Points subtracted per common-pattern or run finding. */
  readonly penalty: number;
}

/** Inclusive lower bounds of very-weak, weak, moderate, strong, very-strong. */
export type ScoreThresholds = readonly [number, number, number, number, number];

export interface ScoringConfig {
  readonly minLength: number;
  readonly idealLength: number;
  /** Case-insensitive substrings that mark a password as predictable. */
  readonly commonPatterns: readonly string[];
  readonly weights: ScoringWeights;
  readonly scoreThresholds: ScoreThresholds;
  readonly minBitsPerCharacter: number;
  /** Total entropy that earns full entropy marks. */
  readonly entropyTargetBits: number;
  readonly minRunLength: number;
}

export class ConfigError extends Error {
  readonly issues: readonly string[];
  readonly source: string | undefined;

  constructor(issues: readonly string[], source?: string) {
    const where = source ? ` in ${source}` : "";
    super(`invalid configuration${where}: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
    this.source = source;
  }
}

export const CONFIG_FILE_NAME = ".pwgauge.yml";

function freezeConfig(config: ScoringConfig): ScoringConfig {
  return Object.freeze({
    ...config,
    commonPatterns: Object.freeze([...config.commonPatterns]),
    weights: Object.freeze({ ...config.weights }),
    scoreThresholds: Object.freeze<ScoreThresholds>([...config.scoreThresholds]),
  });
}

export const DEFAULT_SCORING_CONFIG: ScoringConfig = freezeConfig({
  minLength: 8,
  idealLength: 12,
  commonPatterns: [
    "password",
    "123456",
    "12345678",
    "qwerty",
    "abc123",
    "letmein",
    "admin",
    "welcome",
    "iloveyou",
    "monkey",
    "dragon",
    "football",
  ],
  weights: { length: 30, classes: 30, entropy: 40, penalty: 15 },
  scoreThresholds: [0, 30, 50, 70, 88],
  minBitsPerCharacter: 2.5,
  entropyTargetBits: 60,
  minRunLength: 3,
});

/* ------------------------------------------------------------------ */
/*  Zod schema                                                         */
/* ------------------------------------------------------------------ */

const weight = z.number().finite().nonnegative();
const threshold = z.number().min(0).max(100);

export const ScoringConfigOverridesSchema = z.object({
  minLength: z.number().int().min(1).optional(),
  idealLength: z.number().int().min(1).optional(),
  commonPatterns: z.array(z.string().min(1)).optional(),
  /** Appended to the base (or replaced) pattern list. */
  extraPatterns: z.array(z.string().min(1)).optional(),
  weights: z.object({
    length: weight.optional(),
    classes: weight.optional(),
    entropy: weight.optional(),
    penalty: weight.optional(),
  }).strict().optional(),
  scoreThresholds: z.tuple([threshold, threshold, threshold, threshold, threshold]).optional(),
  minBitsPerCharacter: z.number().finite().nonnegative().optional(),
  entropyTargetBits: z.number().finite().positive().optional(),
  minRunLength: z.number().int().min(2).optional(),
}).strict();

export type ScoringConfigOverrides = z.infer<typeof ScoringConfigOverridesSchema>;

/* ------------------------------------------------------------------ */
/*  Helpers                                                            */
/* ------------------------------------------------------------------ */

function formatIssues(issues: z.ZodIssue[], rename?: (key: string) => string): string[] {
  return issues.map((issue) => {
    const path = issue.path.map((p, i) => (i === 0 && rename ? rename(String(p)) : String(p)));
    return path.length > 0 ? `${path.join(".")}: ${issue.message}` : issue.message;
  });
}

function dedupePatterns(patterns: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const p of patterns) {
    const key = p.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(p);
  }
  return out;
}

function crossFieldIssues(config: ScoringConfig): string[] {
  const issues: string[] = [];
  if (config.idealLength < config.minLength) {
    issues.push(`idealLength (${config.idealLength}) must be >= minLength (${config.minLength})`);
  }
  const { length, classes, entropy } = config.weights;
  if (length + classes + entropy <= 0) {
    issues.push("weights: length, classes and entropy must not all be zero");
  }
  const t = config.scoreThresholds;
  for (let i = 1; i < t.length; i++) {
    if (t[i] <= t[i - 1]) {
      issues.push(`scoreThresholds must be strictly ascending, got [${t.join(", ")}]`);
      break;
    }
  }
  return issues;
}

export function didYouMean(input: string, valid: readonly string[]): string | null {
  let best: string | null = null;
  let bestDist = Infinity;

  for (const candidate of valid) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDist && dist <= 3) {
      bestDist = dist;
      best = candidate;
    }
  }

  return best;
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] = a[i - 1] === b[j - 1]
        ? dp[i - 1][j - 1]
        : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}

/* ------------------------------------------------------------------ */
/*  Resolution                                                         */
/* ------------------------------------------------------------------ */

/**
 * Validate `overrides` and merge them over `base`.
 *
 * `commonPatterns` replaces the base list, `extraPatterns` appends to
 * whichever list results; `weights` merges key by key.
 *
 * @throws ConfigError when a value or a cross-field check is invalid.
 */
export function resolveScoringConfig(
  overrides: unknown,
  base: ScoringConfig = DEFAULT_SCORING_CONFIG,
  source?: string,
): ScoringConfig {
  const result = ScoringConfigOverridesSchema.safeParse(overrides ?? {});
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error.issues), source);
  }
  const o = result.data;

  const merged: ScoringConfig = {
    minLength: o.minLength ?? base.minLength,
    idealLength: o.idealLength ?? base.idealLength,
    commonPatterns: dedupePatterns([
      ...(o.commonPatterns ?? base.commonPatterns),
      ...(o.extraPatterns ?? []),
    ]),
    weights: {
      length: o.weights?.length ?? base.weights.length,
      classes: o.weights?.classes ?? base.weights.classes,
      entropy: o.weights?.entropy ?? base.weights.entropy,
      penalty: o.weights?.penalty ?? base.weights.penalty,
    },
    scoreThresholds: o.scoreThresholds ?? base.scoreThresholds,
    minBitsPerCharacter: o.minBitsPerCharacter ?? base.minBitsPerCharacter,
    entropyTargetBits: o.entropyTargetBits ?? base.entropyTargetBits,
    minRunLength: o.minRunLength ?? base.minRunLength,
  };

  const issues = crossFieldIssues(merged);
  if (issues.length > 0) throw new ConfigError(issues, source);

  return freezeConfig(merged);
}

/* ------------------------------------------------------------------ */
/*  Loader                                                             */
/* ------------------------------------------------------------------ */

const FILE_KEYS: Record<string, keyof ScoringConfigOverrides> = {
  min_length: "minLength",
  ideal_length: "idealLength",
  common_patterns: "commonPatterns",
  extra_patterns: "extraPatterns",
  weights: "weights",
  score_thresholds: "scoreThresholds",
  min_bits_per_character: "minBitsPerCharacter",
  entropy_target_bits: "entropyTargetBits",
  min_run_length: "minRunLength",
};

const fileKeyFor = (key: string): string =>
  Object.keys(FILE_KEYS).find((k) => FILE_KEYS[k] === key) ?? key;

const fileDocumentSchema = z.record(z.string(), z.unknown());

/**
 * Read a YAML configuration file with snake_case keys and return the
 * overrides it declares. Unknown keys are warned about and ignored.
 *
 * @throws ConfigError when the file is missing, unparsable or invalid.
 */
export function loadConfigFile(path: string): ScoringConfigOverrides {
  const configPath = resolve(path);

  if (!existsSync(configPath)) {
    throw new ConfigError(["file not found"], configPath);
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new ConfigError([`could not read file: ${(err as Error).message}`], configPath);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ConfigError([`could not parse YAML: ${(err as Error).message}`], configPath);
  }

  if (parsed === undefined || parsed === null) return {};

  const doc = fileDocumentSchema.safeParse(parsed);
  if (!doc.success) {
    throw new ConfigError(["expected a mapping of settings at the top level"], configPath);
  }

  const overrides: Record<string, unknown> = {};
  const knownKeys = Object.keys(FILE_KEYS);
  for (const [key, value] of Object.entries(doc.data)) {
    const mapped = FILE_KEYS[key];
    if (mapped === undefined) {
      const suggestion = didYouMean(key, knownKeys);
      const hint = suggestion ? `, did you mean '${suggestion}'?` : "";
      logger.warn(`Warning: unknown config key '${key}'${hint}`);
      continue;
    }
    overrides[mapped] = value;
  }

  const result = ScoringConfigOverridesSchema.safeParse(overrides);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error.issues, fileKeyFor), configPath);
  }

  logger.debug(`Loaded configuration from ${configPath}`);
  return result.data;
}

/**
 * Load `.pwgauge.yml` from the given directory.
 * Returns its overrides, or null if no config file exists.
 */
export function loadConfig(dir: string): ScoringConfigOverrides | null {
  const configPath = resolve(join(dir, CONFIG_FILE_NAME));
  if (!existsSync(configPath)) return null;
  return loadConfigFile(configPath);
}
