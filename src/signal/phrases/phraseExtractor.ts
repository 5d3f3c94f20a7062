/**
 * Job phrase extraction
 *
 * Pulls skill-like candidate phrases (unigrams, bigrams, trigrams) out of a
 * job description. Used as the evidence vocabulary for bullet matches and
 * available on its own.
 */

import {
  JOB_PHRASE_TOP_K,
  PHRASE_STOPWORDS,
  PHRASE_TOKEN_PATTERN,
} from "@/constants/phrases";

/**
 * Tokenizes job text for n-gram building.
 *
 * Lowercases, keeps word runs of 3+ characters, drops stopwords.
 */
export function tokenizeForPhrases(jobText: string): string[] {
  const words = jobText.toLowerCase().match(PHRASE_TOKEN_PATTERN) ?? [];
  return words.filter((word) => !PHRASE_STOPWORDS.has(word));
}

/**
 * Returns the most salient phrases of a job description.
 *
 * Candidates are the unique unigrams (first-occurrence order) followed by
 * every adjacent bigram and trigram of the filtered token sequence.
 * Candidates are ranked by occurrence count, then by character length,
 * both descending; remaining ties keep first-seen order. Unigrams enter
 * the count once each, so repeated n-grams rank above them.
 *
 * @param jobText - Job description
 * @param topK - Maximum phrases to return
 * @returns Up to `topK` phrases, most salient first
 *
 * @example
 * extractJobPhrases("Python developer. Python developer with AWS.")
 * // ["python developer", "developer python developer", "python developer python", ...]
 */
export function extractJobPhrases(
  jobText: string,
  topK: number = JOB_PHRASE_TOP_K,
): string[] {
  const words = tokenizeForPhrases(jobText);
  if (words.length === 0 || topK <= 0) {
    return [];
  }

  const candidates: string[] = [...new Set(words)];
  for (let i = 0; i + 1 < words.length; i++) {
    candidates.push(`${words[i]} ${words[i + 1]}`);
  }
  for (let i = 0; i + 2 < words.length; i++) {
    candidates.push(`${words[i]} ${words[i + 1]} ${words[i + 2]}`);
  }

  const frequency = new Map<string, number>();
  for (const candidate of candidates) {
    frequency.set(candidate, (frequency.get(candidate) ?? 0) + 1);
  }

  return [...frequency.entries()]
    .sort((a, b) => b[1] - a[1] || b[0].length - a[0].length)
    .slice(0, topK)
    .map(([phrase]) => phrase);
}
