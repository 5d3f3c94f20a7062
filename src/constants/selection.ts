/**
 * Selection constraint constants
 */

/** Total bullet lines that fill the resume page exactly */
export const DEFAULT_LINE_BUDGET = 21;

/** Fraction of the score range above which a bullet is "high" */
export const SCORE_BAND_HIGH_THRESHOLD = 0.7;

/** Fraction of the score range above which a bullet is "medium" */
export const SCORE_BAND_MEDIUM_THRESHOLD = 0.4;

/** Bullet placeholders per role in the document template */
export const BULLET_SLOTS_PER_ROLE = 5;

/** Skill line placeholders in the document template */
export const SKILL_SLOTS = 4;

export const SKILL_FIELD_PREFIX = "SKILL_";
