/**
 * Section header detection for job descriptions
 *
 * A header is one of the configured token sequences, matched
 * case-insensitively against whole tokens anywhere in the sentence.
 */

import type { PrioritySection } from "@/types";
import {
  HEADER_TOKEN_PATTERN,
  MUST_HAVE_HEADERS,
  NICE_TO_HAVE_HEADERS,
} from "@/constants/priorities";

const HEADER_RULES: ReadonlyArray<{
  section: PrioritySection;
  patterns: readonly (readonly string[])[];
}> = [
  { section: "must_have", patterns: MUST_HAVE_HEADERS },
  { section: "nice_to_have", patterns: NICE_TO_HAVE_HEADERS },
];

/**
 * Tokenizes a sentence for header matching (lowercase, hyphens kept).
 */
export function tokenizeHeader(sentence: string): string[] {
  return sentence.toLowerCase().match(HEADER_TOKEN_PATTERN) ?? [];
}

function matchesAt(
  tokens: string[],
  position: number,
  pattern: readonly string[],
): boolean {
  if (position + pattern.length > tokens.length) {
    return false;
  }
  return pattern.every((token, offset) => tokens[position + offset] === token);
}

/**
 * Detects which section a sentence opens, if any.
 *
 * When a sentence contains several header phrases, the one that starts
 * earliest wins.
 *
 * @param sentence - One sentence of the job description
 * @returns The section opened by the sentence, or null if it is not a header
 *
 * @example
 * detectSectionHeader("Nice-to-have") // "nice_to_have"
 * detectSectionHeader("Python is required") // "must_have"
 * detectSectionHeader("Python experience") // null
 */
export function detectSectionHeader(sentence: string): PrioritySection | null {
  const tokens = tokenizeHeader(sentence);

  for (let position = 0; position < tokens.length; position++) {
    for (const rule of HEADER_RULES) {
      if (rule.patterns.some((pattern) => matchesAt(tokens, position, pattern))) {
        return rule.section;
      }
    }
  }
  return null;
}
