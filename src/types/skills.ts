/**
 * Skill recommendation type definitions
 */

/**
 * Skill name → category names. A skill may belong to several categories.
 */
export type SkillTaxonomy = Record<string, string[]>;

/**
 * Coarse category families used to keep the selected categories diverse.
 */
export type CategoryType =
  | "programming"
  | "infrastructure"
  | "data"
  | "tools"
  | "other";

/**
 * One recommended skill line: a category and up to four of its skills.
 */
export type SkillRecommendation = {
  category: string;
  skills: string[];
};

/**
 * Category and skills recovered from a formatted skill line.
 */
export type ParsedSkillLine = {
  category: string;
  skills: string[];
};

/**
 * Length status of a formatted skill line against its character budget.
 */
export type SkillLineStatus = "empty" | "ok" | "warning" | "over";
