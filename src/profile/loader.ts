/**
 * Profile loading and compilation
 *
 * Loads a profile JSON file, validates it, and compiles it into the bullet
 * pool and skill taxonomy the recommenders consume.
 */

import * as fs from "fs";
import * as path from "path";
import type {
  BulletPool,
  BulletRecord,
  BulletRowRaw,
  ProfileRaw,
  ProfileRuntime,
  SkillRowRaw,
  SkillTaxonomy,
} from "@/types";
import { validateProfileRaw } from "@/utils/profileValidation";
import * as logger from "@/logger";

/**
 * Splits a comma-separated cell into trimmed, non-empty parts.
 * Lists are trimmed the same way.
 */
export function splitCommaList(value: string | string[] | null | undefined): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  const parts = Array.isArray(value) ? value : value.split(",");
  return parts.map((part) => part.trim()).filter((part) => part.length > 0);
}

/**
 * Integer line cost of a cell; blanks and non-numeric text become 0.
 *
 * @example
 * parseLineCount("2.7") // 2
 * parseLineCount("two") // 0
 */
export function parseLineCount(value: number | string | null | undefined): number {
  if (value === undefined || value === null) {
    return 0;
  }
  const parsed =
    typeof value === "number" ? value : value.trim() === "" ? Number.NaN : Number(value);
  return Number.isFinite(parsed) ? Math.trunc(parsed) : 0;
}

/**
 * Groups bullet rows by role, preserving row order.
 * Rows without a role or bullet text are skipped.
 */
export function groupBulletsByRole(rows: BulletRowRaw[]): BulletPool {
  const pool: BulletPool = {};
  let skipped = 0;

  for (const row of rows) {
    const role = row.role.trim();
    const bullet = row.bullet.trim();
    if (!role || !bullet) {
      skipped++;
      continue;
    }

    const category = row.category?.trim();
    const record: BulletRecord = {
      role,
      bullet,
      category: category ? category : null,
      keywords: splitCommaList(row.keywords),
      lines: parseLineCount(row.lines),
    };
    (pool[role] ??= []).push(record);
  }

  if (skipped > 0) {
    logger.debug("Skipped bullet rows without role or text", { skipped });
  }
  return pool;
}

/**
 * Builds the skill → categories taxonomy.
 * Rows without a skill or category are skipped; a repeated skill keeps its last row.
 */
export function buildTaxonomy(rows: SkillRowRaw[]): SkillTaxonomy {
  const taxonomy: SkillTaxonomy = {};

  for (const row of rows) {
    const skill = row.skill.trim();
    const categories = splitCommaList(row.category);
    if (!skill || categories.length === 0) {
      continue;
    }
    if (Object.hasOwn(taxonomy, skill)) {
      logger.warn("Duplicate skill row, keeping the last one", { skill });
    }
    taxonomy[skill] = categories;
  }

  return taxonomy;
}

/**
 * Compiles a validated profile into runtime form.
 */
export function compileProfile(raw: ProfileRaw): ProfileRuntime {
  return {
    version: raw.version,
    bulletsByRole: groupBulletsByRole(raw.bullets),
    taxonomy: buildTaxonomy(raw.skills),
  };
}

/**
 * Loads and compiles a profile file.
 *
 * Fail-fast: unreadable files, malformed JSON and invalid structure throw.
 *
 * @param profilePath - Path to the profile JSON (relative paths resolve against cwd)
 * @throws {Error} If the file cannot be read
 * @throws {SyntaxError} If JSON is malformed
 * @throws {ProfileValidationError} If validation fails
 *
 * @example
 * const profile = loadProfile("data/profile.json");
 * console.log(Object.keys(profile.bulletsByRole));
 */
export function loadProfile(profilePath: string): ProfileRuntime {
  const resolved = path.resolve(process.cwd(), profilePath);
  const jsonContent = fs.readFileSync(resolved, "utf-8");
  const raw: unknown = JSON.parse(jsonContent);
  const profile = compileProfile(validateProfileRaw(raw));

  logger.debug("Profile loaded", {
    path: resolved,
    version: profile.version,
    roles: Object.keys(profile.bulletsByRole).length,
    skills: Object.keys(profile.taxonomy).length,
  });
  return profile;
}
