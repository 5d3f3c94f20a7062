/**
 * Profile validation module
 *
 * Checks the structure of a profile JSON document before compilation:
 * - top-level object with a non-empty `version`
 * - `bullets` and `skills` arrays of objects
 * - cell-like fields hold strings, numbers, string lists or null
 *
 * Content rules (blank roles, blank skills) are not errors here; the loader
 * skips such rows the same way the spreadsheet export did.
 *
 * Validation is fail-fast: throws on first error with the offending field path.
 */

import type { BulletRowRaw, ProfileRaw, SkillRowRaw } from "@/types";

/**
 * Error thrown when profile validation fails.
 */
export class ProfileValidationError extends Error {
  constructor(message: string) {
    super(`Profile validation failed: ${message}`);
    this.name = "ProfileValidationError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeValue(value: unknown): string {
  if (value === null) {
    return "null";
  }
  return Array.isArray(value) ? "array" : typeof value;
}

function validateNonEmptyString(
  value: unknown,
  fieldPath: string,
): asserts value is string {
  if (typeof value !== "string") {
    throw new ProfileValidationError(
      `${fieldPath} must be a string, got ${describeValue(value)}`,
    );
  }
  if (value.trim().length === 0) {
    throw new ProfileValidationError(
      `${fieldPath} cannot be empty or whitespace-only`,
    );
  }
}

function validateStringList(value: unknown, fieldPath: string): asserts value is string[] {
  if (!Array.isArray(value)) {
    throw new ProfileValidationError(`${fieldPath} must be an array, got ${describeValue(value)}`);
  }
  value.forEach((item: unknown, i: number) => {
    if (typeof item !== "string") {
      throw new ProfileValidationError(
        `${fieldPath}[${i}] must be a string, got ${describeValue(item)}`,
      );
    }
  });
}

/**
 * Cell text: a string, or absent/null (treated as empty).
 */
function readCell(value: unknown, fieldPath: string): string {
  if (value === undefined || value === null) {
    return "";
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  throw new ProfileValidationError(
    `${fieldPath} must be a string, got ${describeValue(value)}`,
  );
}

function readKeywords(value: unknown, fieldPath: string): string | string[] | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === "string") {
    return value;
  }
  validateStringList(value, fieldPath);
  return value;
}

function readLines(value: unknown, fieldPath: string): number | string | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === "number" || typeof value === "string") {
    return value;
  }
  throw new ProfileValidationError(
    `${fieldPath} must be a number or string, got ${describeValue(value)}`,
  );
}

function validateBulletRow(row: unknown, index: number): BulletRowRaw {
  const prefix = `bullets[${index}]`;
  if (!isRecord(row)) {
    throw new ProfileValidationError(`${prefix} must be an object`);
  }

  return {
    role: readCell(row.role, `${prefix}.role`),
    bullet: readCell(row.bullet, `${prefix}.bullet`),
    category:
      row.category === undefined || row.category === null
        ? null
        : readCell(row.category, `${prefix}.category`),
    keywords: readKeywords(row.keywords, `${prefix}.keywords`),
    lines: readLines(row.lines, `${prefix}.lines`),
  };
}

function validateSkillRow(row: unknown, index: number): SkillRowRaw {
  const prefix = `skills[${index}]`;
  if (!isRecord(row)) {
    throw new ProfileValidationError(`${prefix} must be an object`);
  }

  const { category } = row;
  let categories: string | string[];
  if (Array.isArray(category)) {
    validateStringList(category, `${prefix}.category`);
    categories = category;
  } else {
    categories = readCell(category, `${prefix}.category`);
  }

  return {
    skill: readCell(row.skill, `${prefix}.skill`),
    category: categories,
  };
}

/**
 * Validates raw profile JSON and returns it in typed form.
 *
 * @param raw - Parsed JSON value
 * @returns Typed profile with cell values as strings
 * @throws {ProfileValidationError} With the offending field path
 */
export function validateProfileRaw(raw: unknown): ProfileRaw {
  if (!isRecord(raw)) {
    throw new ProfileValidationError("Profile must be an object");
  }

  const { version, bullets, skills } = raw;
  validateNonEmptyString(version, "version");

  if (!Array.isArray(bullets)) {
    throw new ProfileValidationError(`bullets must be an array, got ${describeValue(bullets)}`);
  }
  let skillRows: unknown[] = [];
  if (skills !== undefined) {
    if (!Array.isArray(skills)) {
      throw new ProfileValidationError(`skills must be an array, got ${describeValue(skills)}`);
    }
    skillRows = skills;
  }

  return {
    version,
    bullets: bullets.map((row: unknown, i: number) => validateBulletRow(row, i)),
    skills: skillRows.map((row, i) => validateSkillRow(row, i)),
  };
}
