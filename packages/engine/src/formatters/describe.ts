import type { Finding } from "../schemas.js";
import { classLabel } from "../detectors/character-classes.js";

/**
 * One-line English description of a finding, shared by the text and
 * markdown renderers.
 */
export function describeFinding(finding: Finding): string {
  switch (finding.kind) {
    case "too-short":
      return `Shorter than ${finding.minLength} characters (${finding.length}).`;
    case "missing-character-class":
      return `No ${classLabel(finding.characterClass)}.`;
    case "low-entropy":
      return `Low character diversity (${finding.bitsPerCharacter.toFixed(2)} bits per character, below ${finding.threshold}).`;
    case "common-pattern":
      return `Contains the common pattern '${finding.pattern}'.`;
    case "sequential-run":
      return `Contains the ${finding.direction} sequence '${finding.run}'.`;
    case "keyboard-run":
      return `Contains the keyboard run '${finding.run}'.`;
    case "repeated-run":
      return `Contains the repeated run '${finding.run}'.`;
  }
}
