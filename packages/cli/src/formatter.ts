import type { Assessment, Rating } from "@pwgauge/engine";
import { RATING_LABELS, describeFinding, generateMarkdownReport } from "@pwgauge/engine";
import type { OutputFormat } from "./args.js";

// ANSI escape codes
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const CYAN = "\x1b[36m";
const BG_RED = "\x1b[41m";
const BG_GREEN = "\x1b[42m";
const WHITE = "\x1b[37m";

export interface FormatOptions {
  format: OutputFormat;
  noColor?: boolean;
}

type Paint = (color: string, text: string) => string;

function painter(noColor: boolean | undefined): Paint {
  return noColor ? (_color, text) => text : (color, text) => `${color}${text}${RESET}`;
}

function ratingColor(rating: Rating): string {
  switch (rating) {
    case "very-weak": return BG_RED + WHITE;
    case "weak": return RED;
    case "moderate": return YELLOW;
    case "strong": return GREEN;
    case "very-strong": return BG_GREEN + WHITE;
  }
}

function banner(title: string, c: Paint): string[] {
  const width = 42;
  const left = Math.floor((width - title.length) / 2);
  const inner = " ".repeat(left) + title + " ".repeat(width - title.length - left);
  return [
    c(CYAN, `  ╔${"═".repeat(width)}╗`),
    c(CYAN, "  ║") + c(BOLD, inner) + c(CYAN, "║"),
    c(CYAN, `  ╚${"═".repeat(width)}╝`),
  ];
}

export function formatResult(assessment: Assessment, options: FormatOptions): string {
  switch (options.format) {
    case "json":
      return formatJson(assessment);
    case "markdown":
      return generateMarkdownReport(assessment);
    case "table":
    default:
      return formatTable(assessment, options.noColor === true);
  }
}

function formatJson(assessment: Assessment): string {
  return JSON.stringify(assessment, null, 2);
}

function formatTable(assessment: Assessment, noColor: boolean): string {
  const c = painter(noColor);
  const lines: string[] = [];

  lines.push("");
  lines.push(...banner("PASSWORD STRENGTH", c));
  lines.push("");

  const label = RATING_LABELS[assessment.rating];
  const badge = noColor ? label : c(ratingColor(assessment.rating), ` ${label} `);
  lines.push(`  Score: ${c(BOLD, String(assessment.score))}${c(DIM, "/100")}  Rating: ${badge}`);
  lines.push(`  Entropy: ${assessment.entropy.toFixed(1)} bits`);
  lines.push("");

  if (assessment.findings.length === 0) {
    lines.push(c(GREEN, "  No weaknesses detected."));
    lines.push("");
  } else {
    lines.push(c(BOLD, `  Issues (${assessment.findings.length})`));
    for (const f of assessment.findings) {
      lines.push(`    - ${describeFinding(f)}`);
    }
    lines.push("");
  }

  if (assessment.suggestions.length > 0) {
    lines.push(c(BOLD, "  Suggestions"));
    for (const s of assessment.suggestions) {
      lines.push(`    - ${s}`);
    }
    lines.push("");
  }

  return lines.join("\n");
}

export function formatPatternList(patterns: readonly string[], options: FormatOptions): string {
  switch (options.format) {
    case "json":
      return JSON.stringify({ commonPatterns: patterns }, null, 2);
    case "markdown":
      return ["## Common patterns", "", ...patterns.map((p) => `- \`${p}\``), ""].join("\n");
    case "table":
    default: {
      const c = painter(options.noColor);
      const lines: string[] = [""];
      lines.push(...banner("COMMON PATTERNS", c));
      lines.push("");
      for (const p of patterns) lines.push(`  ${p}`);
      lines.push("");
      lines.push(`  ${patterns.length} pattern${patterns.length === 1 ? "" : "s"} total`);
      lines.push("");
      return lines.join("\n");
    }
  }
}
