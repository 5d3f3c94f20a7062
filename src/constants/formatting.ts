/**
 * Skill line formatting constants
 *
 * These values define the exact visual contract of a skill line on the
 * rendered resume and are asserted by tests.
 */

/** Maximum characters of a rendered skill line */
export const DEFAULT_SKILL_LINE_LIMIT = 50;

/** Characters around a single skill: " [" and "]" plus one spare */
export const SINGLE_SKILL_FRAME_CHARS = 4;

/** A single skill is only truncated if more than this many characters remain */
export const MIN_TRUNCATED_SKILL_CHARS = 10;

export const ELLIPSIS = "...";

/** Room needed to append a " +N" overflow marker */
export const OVERFLOW_MARKER_CHARS = 5;

/** Lines within this many characters of the limit are flagged as a warning */
export const SKILL_LINE_WARNING_MARGIN = 5;

/** Skill list shown when nothing fits */
export const SKILL_LINE_FALLBACK = "[...]";

/** Parses "Category [a, b, c]" */
export const SKILL_LINE_PATTERN = /^(.+?)\s*\[(.+?)\]$/s;
