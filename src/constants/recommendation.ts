/**
 * Recommendation pipeline constants
 */

import type { CategoryType } from "@/types";

/** Number of bullets returned when the caller does not ask for a count */
export const DEFAULT_TOP_N = 5;

/** Raw cosine similarity → 0-100-ish retrieval score */
export const SIMILARITY_SCALE = 100;

/** Cross-encoder relevance → re-ranked score */
export const RELEVANCE_SCALE = 100;

/** Lowest score after re-rank normalization (all scores shifted so min == this) */
export const NORMALIZED_MIN_SCORE = 1;

/** Added per must-have phrase found in a bullet */
export const MUST_HAVE_BOOST = 20;

/** Added per nice-to-have phrase found in a bullet */
export const NICE_TO_HAVE_BOOST = 10;

/** Evidence phrases kept per bullet */
export const MAX_MATCHED_PHRASES = 3;

/** Phrase must be strictly more similar than this to count as evidence */
export const MATCH_SIMILARITY_THRESHOLD = 0.1;

/** Skill lines recommended when the caller does not ask for a count */
export const DEFAULT_NUM_CATEGORIES = 4;

/** Skills kept per recommended category */
export const MAX_SKILLS_PER_CATEGORY = 4;

/** First N category picks are accepted regardless of type repetition */
export const DIVERSITY_GUARANTEED_PICKS = 2;

/**
 * Category type sniffing rules, checked in order; first match wins.
 * Terms are matched as substrings of the lowercased category name.
 */
export const CATEGORY_TYPE_RULES: ReadonlyArray<{
  type: Exclude<CategoryType, "other">;
  terms: readonly string[];
}> = [
  { type: "programming", terms: ["programming", "language", "framework"] },
  { type: "infrastructure", terms: ["cloud", "infrastructure", "devops"] },
  { type: "data", terms: ["data", "analytics", "machine learning", "ai"] },
  { type: "tools", terms: ["tool", "software", "platform"] },
];
