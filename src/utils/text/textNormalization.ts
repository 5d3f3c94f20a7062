/**
 * Text normalization and tokenization utilities
 *
 * Deterministic text processing shared by the recommenders and the
 * in-process capabilities. No stemming, no language detection.
 */

import {
  EDGE_PERIOD_PATTERN,
  TOKEN_SEPARATOR_PATTERN,
} from "@/constants/textNormalization";
import { removeDiacritics } from "@/utils/text/removeDiacritics";

/**
 * Normalizes text and splits it into tokens.
 *
 * Normalization steps (applied in order):
 * 1. Lowercase the text
 * 2. Remove diacritics (e.g., á → a)
 * 3. Split on whitespace and common separators (see TOKEN_SEPARATOR_PATTERN)
 * 4. Strip periods at token edges
 * 5. Remove empty tokens
 *
 * @example
 * normalizeToTokens("Built a Node.js API (REST/GraphQL).")
 * // ["built", "a", "node.js", "api", "rest", "graphql"]
 *
 * normalizeToTokens("Café-grade full-stack work")
 * // ["cafe-grade", "full-stack", "work"]
 */
export function normalizeToTokens(text: string): string[] {
  const normalized = removeDiacritics(text.toLowerCase());

  const tokens: string[] = [];
  for (const raw of normalized.split(TOKEN_SEPARATOR_PATTERN)) {
    const token = raw.replace(EDGE_PERIOD_PATTERN, "");
    if (token.length > 0) {
      tokens.push(token);
    }
  }
  return tokens;
}

/**
 * Lowercases text and collapses every whitespace run into one space.
 *
 * This is the form bullets take before retrieval, re-ranking and the
 * priority substring checks.
 *
 * @example
 * normalizeCandidateText("  Led   the\nMigration ") // "led the migration"
 */
export function normalizeCandidateText(text: string): string {
  return text.toLowerCase().split(/\s+/).filter(Boolean).join(" ");
}
