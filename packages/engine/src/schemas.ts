import { z } from "zod";

export const CharacterClassSchema = z.enum([
  "lowercase",
  "uppercase",
  "digit",
  "special",
]);

export type CharacterClass = z.infer<typeof CharacterClassSchema>;

/** Ordered weakest to strongest. */
export const RatingSchema = z.enum([
  "very-weak",
  "weak",
  "moderate",
  "strong",
  "very-strong",
]);

export type Rating = z.infer<typeof RatingSchema>;

export const RATINGS: readonly Rating[] = RatingSchema.options;

export const RATING_LABELS: Record<Rating, string> = {
  "very-weak": "Very Weak",
  weak: "Weak",
  moderate: "Moderate",
  strong: "Strong",
  "very-strong": "Very Strong",
};

export const FindingSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("too-short"),
    length: z.number().int().nonnegative(),
    minLength: z.number().int().positive(),
  }),
  z.object({
    kind: z.literal("missing-character-class"),
    characterClass: CharacterClassSchema,
  }),
  z.object({
    kind: z.literal("low-entropy"),
    bitsPerCharacter: z.number().nonnegative(),
    threshold: z.number().nonnegative(),
  }),
  z.object({
    kind: z.literal("common-pattern"),
    pattern: z.string().min(1),
  }),
  z.object({
    kind: z.literal("sequential-run"),
    run: z.string(),
    start: z.number().int().nonnegative(),
    direction: z.enum(["ascending", "descending"]),
  }),
  z.object({
    kind: z.literal("keyboard-run"),
    run: z.string(),
    start: z.number().int().nonnegative(),
  }),
  z.object({
    kind: z.literal("repeated-run"),
    run: z.string(),
    start: z.number().int().nonnegative(),
  }),
]);

export type Finding = z.infer<typeof FindingSchema>;
export type FindingKind = Finding["kind"];

export const AssessmentSchema = z
  .object({
    score: z.number().int().min(0).max(100),
    rating: RatingSchema,
    /** Total Shannon entropy in bits. */
    entropy: z.number().nonnegative(),
    findings: z.array(FindingSchema).readonly(),
    suggestions: z.array(z.string()).readonly(),
  })
  .strict()
  .readonly();

export type Assessment = z.infer<typeof AssessmentSchema>;
