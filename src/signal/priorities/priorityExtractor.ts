/**
 * Priority extractor
 *
 * Structural parse of a job description into must-have and nice-to-have
 * requirement phrases. Header sentences ("Must have", "Preferred", ...)
 * switch the active section; noun chunks of the sentences that follow are
 * collected under it. Nothing is collected before the first header.
 *
 * This is a heuristic: postings without recognizable headers yield empty
 * lists, and that is an expected outcome.
 */

import type { TextAnalyzer } from "@/interfaces";
import type { PrioritySection, PrioritySet } from "@/types";
import { detectSectionHeader } from "./headerMatcher";

function dedupe(phrases: string[]): string[] {
  return [...new Set(phrases)];
}

/**
 * Extracts must-have and nice-to-have phrases from a job description.
 *
 * @param jobText - Job description
 * @param analyzer - Sentence segmentation and noun chunking capability
 * @returns Phrases per section, de-duplicated in first-seen order
 */
export function extractPriorities(
  jobText: string,
  analyzer: TextAnalyzer,
): PrioritySet {
  const collected: Record<PrioritySection, string[]> = {
    must_have: [],
    nice_to_have: [],
  };
  let current: PrioritySection | null = null;

  for (const sentence of analyzer.sentences(jobText)) {
    const header = detectSectionHeader(sentence);
    if (header) {
      current = header;
      continue;
    }
    if (!current) {
      continue;
    }

    for (const chunk of analyzer.nounChunks(sentence)) {
      const phrase = chunk.trim();
      if (phrase.length > 0) {
        collected[current].push(phrase);
      }
    }
  }

  return {
    mustHave: dedupe(collected.must_have),
    niceToHave: dedupe(collected.nice_to_have),
  };
}
