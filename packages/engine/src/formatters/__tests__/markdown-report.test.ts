import { describe, it, expect } from "vitest";
import { generateMarkdownReport } from "../markdown-report.js";
import { assess } from "../../scoring.js";

const TIMESTAMP = "2026-01-01T00:00:00.000Z";

describe("generateMarkdownReport", () => {
  it("includes the summary table", () => {
    const report = generateMarkdownReport(assess("password"), { timestamp: TIMESTAMP });
    const lines = report.split("\n");
    expect(lines[0]).toBe("# Password Strength Report");
    expect(lines).toContain(`*Generated: ${TIMESTAMP}*`);
    expect(lines).toContain("| Score | 13/100 |");
    expect(lines).toContain("| Rating | Very Weak |");
    expect(lines).toContain("| Entropy | 22.0 bits |");
    expect(lines).toContain("| Findings | 4 |");
  });

  it("lists findings with their category", () => {
    const lines = generateMarkdownReport(assess("password"), { timestamp: TIMESTAMP }).split("\n");
    expect(lines).toContain("- **Character classes:** No uppercase letters.");
    expect(lines).toContain("- **Common pattern:** Contains the common pattern 'password'.");
  });

  it("numbers suggestions", () => {
    const lines = generateMarkdownReport(assess("password"), { timestamp: TIMESTAMP }).split("\n");
    expect(lines).toContain("1. Add at least one uppercase letter (A-Z).");
    expect(lines).toContain("4. Avoid dictionary words and well-known passwords.");
  });

  it("omits suggestions for a clean assessment", () => {
    const report = generateMarkdownReport(assess("Xk9#mP2$vL7q"), {
      title: "Vault key",
      timestamp: new Date(TIMESTAMP),
    });
    const lines = report.split("\n");
    expect(lines[0]).toBe("# Vault key");
    expect(lines).toContain(`*Generated: ${TIMESTAMP}*`);
    expect(lines).toContain("No weaknesses detected.");
    expect(lines).not.toContain("## Suggestions");
  });

  it("never includes the password", () => {
    const report = generateMarkdownReport(assess("Xk9#mP2$vL7q"), { timestamp: TIMESTAMP });
    expect(report.includes("Xk9#mP2$vL7q")).toBe(false);
  });
});
