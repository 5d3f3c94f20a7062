/**
 * Priority extraction constants
 */

import chunkBreakWords from "../../data/chunkBreakWords.json";

/**
 * Header token sequences that open the must-have section.
 * Compared token by token against the lowercased sentence.
 */
export const MUST_HAVE_HEADERS: readonly (readonly string[])[] = [
  ["must", "have"],
  ["must-have"],
  ["required"],
  ["essential"],
];

/**
 * Header token sequences that open the nice-to-have section.
 */
export const NICE_TO_HAVE_HEADERS: readonly (readonly string[])[] = [
  ["nice", "to", "have"],
  ["nice-to-have"],
  ["preferred"],
  ["might", "also", "have"],
];

/**
 * Sentence boundaries for the heuristic analyzer: terminators followed by
 * whitespace, line breaks, bullet glyphs and colons (job posts put list
 * headers before a colon).
 */
export const SENTENCE_BOUNDARY_PATTERN = /(?<=[.!?])\s+|[\r\n]+|[•▪●◦·:;]+/u;

/**
 * Header tokens keep intra-word hyphens ("must-have") and tech suffixes ("c++", "c#").
 */
export const HEADER_TOKEN_PATTERN = /[\p{L}\p{N}][\p{L}\p{N}+#\-]*/gu;

/**
 * Words that end a noun chunk: determiners, pronouns, prepositions,
 * conjunctions, auxiliaries/modals and common requirement verbs.
 */
export const CHUNK_BREAK_WORDS: ReadonlySet<string> = new Set(chunkBreakWords);

/**
 * Noun chunk words: letters/digits with inner punctuation used by tech names
 * ("node.js", "ci/cd", "c++", "5+").
 */
export const CHUNK_WORD_PATTERN = /[\p{L}\p{N}][\p{L}\p{N}.+#/&'’\-]*/gu;
