/**
 * Heuristic text analyzer
 *
 * Rule-based sentence segmentation and noun chunking for job descriptions.
 * No parser or model is involved: a chunk is a maximal run of words that
 * is not interrupted by punctuation or by a chunk-breaking function word.
 *
 * @example
 * const analyzer = new HeuristicTextAnalyzer();
 * analyzer.sentences("Must have: Python experience. Nice to have: Docker.")
 * // ["Must have", "Python experience.", "Nice to have", "Docker."]
 * analyzer.nounChunks("5+ years of experience with Kubernetes and Terraform")
 * // ["5+ years", "experience", "Kubernetes", "Terraform"]
 */

import type { TextAnalyzer } from "@/interfaces";
import {
  CHUNK_BREAK_WORDS,
  CHUNK_WORD_PATTERN,
  SENTENCE_BOUNDARY_PATTERN,
} from "@/constants/priorities";

/** Punctuation a word may carry at its end without it being part of the word */
const TRAILING_WORD_PUNCTUATION = /[.'’\-/&]+$/u;

type Span = { start: number; end: number };

export class HeuristicTextAnalyzer implements TextAnalyzer {
  sentences(text: string): string[] {
    return text
      .split(SENTENCE_BOUNDARY_PATTERN)
      .map((segment) => segment.trim())
      .filter((segment) => segment.length > 0);
  }

  nounChunks(sentence: string): string[] {
    const chunks: Span[] = [];
    let current: Span | null = null;

    for (const match of sentence.matchAll(CHUNK_WORD_PATTERN)) {
      const start = match.index ?? 0;
      const word = match[0].replace(TRAILING_WORD_PUNCTUATION, "");
      if (word.length === 0) {
        continue;
      }
      const end = start + word.length;

      if (CHUNK_BREAK_WORDS.has(word.toLowerCase())) {
        current = null;
        continue;
      }

      // Anything other than whitespace between two words ends the chunk
      if (current && /\S/.test(sentence.slice(current.end, start))) {
        current = null;
      }

      if (current) {
        current.end = end;
      } else {
        current = { start, end };
        chunks.push(current);
      }
    }

    return chunks.map((span) => sentence.slice(span.start, span.end).trim());
  }
}
