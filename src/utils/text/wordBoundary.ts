/**
 * Whole-word containment with regex word-boundary semantics
 *
 * A boundary sits between two characters when exactly one of them is a
 * word character (letter, digit, underscore); text edges count as
 * non-word. This mirrors `\bneedle\b`, including needles that start or
 * end with punctuation ("c++" needs a word character after its "+" to
 * close the boundary, so "c++ developer" does not match).
 */

import { WORD_CHAR_PATTERN } from "@/constants/textNormalization";

function isWordChar(char: string | undefined): boolean {
  return char !== undefined && WORD_CHAR_PATTERN.test(char);
}

function isBoundary(text: string, position: number): boolean {
  return isWordChar(text[position - 1]) !== isWordChar(text[position]);
}

/**
 * Returns true if `needle` occurs in `haystack` delimited by word boundaries.
 *
 * Both strings are compared as given; callers lowercase them first.
 */
export function containsWholeWord(haystack: string, needle: string): boolean {
  if (needle.length === 0) {
    return false;
  }

  let from = 0;
  while (from <= haystack.length - needle.length) {
    const start = haystack.indexOf(needle, from);
    if (start === -1) {
      return false;
    }
    if (isBoundary(haystack, start) && isBoundary(haystack, start + needle.length)) {
      return true;
    }
    from = start + 1;
  }
  return false;
}
