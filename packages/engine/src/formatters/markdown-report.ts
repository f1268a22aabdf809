/**
 * Markdown strength report generator.
 *
 * Produces a standalone document for an assessment. The password itself is
 * never part of the report.
 */

import type { Assessment, FindingKind } from "../schemas.js";
import { RATING_LABELS } from "../schemas.js";
import { describeFinding } from "./describe.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ReportOptions {
  title?: string;
  timestamp?: string | Date;
}

// ---------------------------------------------------------------------------
// Finding helpers
// ---------------------------------------------------------------------------

const KIND_LABELS: Record<FindingKind, string> = {
  "too-short": "Length",
  "missing-character-class": "Character classes",
  "low-entropy": "Entropy",
  "common-pattern": "Common pattern",
  "sequential-run": "Sequence",
  "keyboard-run": "Keyboard run",
  "repeated-run": "Repetition",
};

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function generateMarkdownReport(
  assessment: Assessment,
  options?: ReportOptions,
): string {
  const title = options?.title ?? "Password Strength Report";
  const ts =
    options?.timestamp instanceof Date
      ? options.timestamp.toISOString()
      : options?.timestamp ?? new Date().toISOString();

  const sections: string[] = [];

  sections.push(`# ${title}`);
  sections.push("");
  sections.push(`*Generated: ${ts}*`);
  sections.push("");

  // ── Summary ───────────────────────────────────────────────────────────
  sections.push("## Summary");
  sections.push("");
  sections.push("| Metric | Value |");
  sections.push("|--------|-------|");
  sections.push(`| Score | ${assessment.score}/100 |`);
  sections.push(`| Rating | ${RATING_LABELS[assessment.rating]} |`);
  sections.push(`| Entropy | ${assessment.entropy.toFixed(1)} bits |`);
  sections.push(`| Findings | ${assessment.findings.length} |`);
  sections.push("");

  // ── Findings ──────────────────────────────────────────────────────────
  sections.push("## Findings");
  sections.push("");

  if (assessment.findings.length === 0) {
    sections.push("No weaknesses detected.");
  } else {
    for (const f of assessment.findings) {
      sections.push(`- **${KIND_LABELS[f.kind]}:** ${describeFinding(f)}`);
    }
  }
  sections.push("");

  // ── Suggestions ───────────────────────────────────────────────────────
  if (assessment.suggestions.length > 0) {
    sections.push("## Suggestions");
    sections.push("");
    assessment.suggestions.forEach((s, i) => sections.push(`${i + 1}. ${s}`));
    sections.push("");
  }

  sections.push("---");
  sections.push("*Advisory only: a heuristic estimate, not a guarantee.*");
  sections.push("");

  return sections.join("\n");
}
