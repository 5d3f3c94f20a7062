/**
 * Unit tests for profile validation and loading
 *
 * Reads tests/fixtures/profile.json. No network, no side effects
 */

import { describe, it, expect } from "vitest";
import {
  buildTaxonomy,
  compileProfile,
  loadProfile,
  parseLineCount,
  splitCommaList,
} from "@/profile";
import { ProfileValidationError, validateProfileRaw } from "@/utils/profileValidation";

describe("splitCommaList", () => {
  it("should split, trim and drop empty parts", () => {
    expect(splitCommaList("a, b,,c ")).toEqual(["a", "b", "c"]);
    expect(splitCommaList([" x ", ""])).toEqual(["x"]);
    expect(splitCommaList(null)).toEqual([]);
  });
});

describe("parseLineCount", () => {
  it("should truncate numbers and zero out non-numeric cells", () => {
    expect(parseLineCount(2.7)).toBe(2);
    expect(parseLineCount("2.7")).toBe(2);
    expect(parseLineCount("two")).toBe(0);
    expect(parseLineCount("")).toBe(0);
    expect(parseLineCount(null)).toBe(0);
  });
});

describe("buildTaxonomy", () => {
  it("should keep the last row of a repeated skill", () => {
    expect(
      buildTaxonomy([
        { skill: "Go", category: "Languages" },
        { skill: "Go", category: "Backend, Languages" },
      ]),
    ).toEqual({ Go: ["Backend", "Languages"] });
  });
});

describe("loadProfile", () => {
  it("should group bullets by role and build the taxonomy", () => {
    const profile = loadProfile("tests/fixtures/profile.json");

    expect(profile.version).toBe("1.0.0");
    expect(profile.bulletsByRole).toEqual({
      Acme: [
        {
          role: "Acme",
          bullet: "Built Python services on Kubernetes",
          category: "Backend",
          keywords: ["python", "kubernetes"],
          lines: 2,
        },
        {
          role: "Acme",
          bullet: "Wrote SQL reports",
          category: null,
          keywords: ["sql", "reporting"],
          lines: 1,
        },
      ],
      Beta: [
        {
          role: "Beta",
          bullet: "Organized team events",
          category: null,
          keywords: [],
          lines: 0,
        },
      ],
    });
    expect(profile.taxonomy).toEqual({
      Python: ["Programming Languages"],
      Docker: ["Cloud Platforms", "DevOps Tools"],
      AWS: ["Cloud Platforms"],
    });
  });
});

describe("validateProfileRaw", () => {
  it("should accept a profile without skills", () => {
    expect(compileProfile(validateProfileRaw({ version: "1", bullets: [] }))).toEqual({
      version: "1",
      bulletsByRole: {},
      taxonomy: {},
    });
  });

  it("should reject a non-object profile", () => {
    expect(() => validateProfileRaw(null)).toThrow(ProfileValidationError);
    expect(() => validateProfileRaw(null)).toThrow(
      "Profile validation failed: Profile must be an object",
    );
  });

  it("should name the offending field", () => {
    expect(() => validateProfileRaw({ bullets: [] })).toThrow(
      "version must be a string, got undefined",
    );
    expect(() => validateProfileRaw({ version: "1", bullets: {} })).toThrow(
      "bullets must be an array, got object",
    );
    expect(() => validateProfileRaw({ version: "1", bullets: [42] })).toThrow(
      "bullets[0] must be an object",
    );
    expect(() =>
      validateProfileRaw({ version: "1", bullets: [{ role: "A", bullet: "B", keywords: [1] }] }),
    ).toThrow("bullets[0].keywords[0] must be a string, got number");
    expect(() =>
      validateProfileRaw({ version: "1", bullets: [{ role: "A", bullet: "B", lines: true }] }),
    ).toThrow("bullets[0].lines must be a number or string, got boolean");
    expect(() =>
      validateProfileRaw({ version: "1", bullets: [], skills: [{ skill: "X", category: {} }] }),
    ).toThrow("skills[0].category must be a string, got object");
  });
});
