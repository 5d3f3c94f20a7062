/**
 * Candidate profile type definitions
 *
 * A profile bundles the candidate's bullet pool and skill taxonomy.
 * Two forms exist:
 * - ProfileRaw: JSON shape (deserialized from file)
 * - ProfileRuntime: compiled form handed to the recommenders
 */

import type { BulletPool } from "./candidates";
import type { SkillTaxonomy } from "./skills";

/**
 * Bullet row as exported from the candidate spreadsheet.
 *
 * `keywords` may be a comma-separated string or a list; `lines` may be any
 * cell value and falls back to 0 when it is not numeric.
 */
export type BulletRowRaw = {
  role: string;
  bullet: string;
  category?: string | null;
  keywords?: string | string[] | null;
  lines?: number | string | null;
};

/**
 * Skill row as exported from the Skills sheet.
 *
 * `category` may list several categories separated by commas.
 */
export type SkillRowRaw = {
  skill: string;
  category: string | string[];
};

export type ProfileRaw = {
  /** Profile format version */
  version: string;
  bullets: BulletRowRaw[];
  skills: SkillRowRaw[];
};

export type ProfileRuntime = {
  version: string;
  bulletsByRole: BulletPool;
  taxonomy: SkillTaxonomy;
};
