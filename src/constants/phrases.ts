/**
 * Job phrase extraction constants
 */

/** Phrases returned by extractJobPhrases when no limit is given */
export const JOB_PHRASE_TOP_K = 40;

/**
 * Word tokens: runs of at least three letters, digits or underscores.
 * Shorter runs are skipped, not split off.
 */
export const PHRASE_TOKEN_PATTERN = /[\p{L}\p{N}_]{3,}/gu;

/**
 * Function words and resume boilerplate removed before n-gram building.
 */
export const PHRASE_STOPWORDS: ReadonlySet<string> = new Set([
  "using", "with", "and", "or", "the", "for", "in", "on", "at", "to", "from",
  "by", "of", "experience", "experienced", "years", "year", "skills", "skill",
  "ability", "abilities", "work", "works", "working", "used", "use", "apply",
  "applied", "that", "is", "are", "a", "an", "as", "be", "have", "has",
  "will", "would", "should", "can", "may", "technologies",
]);
