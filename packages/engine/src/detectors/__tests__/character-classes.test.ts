import { describe, it, expect } from "vitest";
import { CHARACTER_CLASSES, classLabel, profileCharacters, toCodePoints } from "../character-classes.js";

const profile = (pw: string) => profileCharacters(toCodePoints(pw));

describe("profileCharacters", () => {
  it("reports no classes for the empty string", () => {
    const p = profile("");
    expect(p.length).toBe(0);
    expect(p.distinct).toBe(0);
    expect(p.classCount).toBe(0);
    expect(p.present).toEqual({ lowercase: false, uppercase: false, digit: false, special: false });
  });

  it("detects every class", () => {
    const p = profile("aB3!");
    expect(p.classCount).toBe(4);
    expect(p.present).toEqual({ lowercase: true, uppercase: true, digit: true, special: true });
  });

  it("counts distinct characters", () => {
    expect(profile("aabbc").distinct).toBe(3);
  });

  it("treats whitespace and non-ASCII letters as special", () => {
    expect(profile(" ").present.special).toBe(true);
    expect(profile("é").present).toEqual({ lowercase: false, uppercase: false, digit: false, special: true });
  });

  it("measures length in code points", () => {
    expect(profile("🔑a").length).toBe(2);
  });
});

describe("CHARACTER_CLASSES", () => {
  it("lists classes in reporting order", () => {
    expect(CHARACTER_CLASSES.map((c) => c.id)).toEqual(["lowercase", "uppercase", "digit", "special"]);
  });

  it("labels classes for display", () => {
    expect(classLabel("digit")).toBe("digits");
  });
});
