/**
 * Re-ranker (cross-encoder pass)
 *
 * Replaces retrieval scores with joint (job, candidate) relevance, sorts
 * by it, and shifts the list so its lowest score is exactly
 * NORMALIZED_MIN_SCORE. Later priority boosts add to this strictly
 * positive baseline.
 */

import type { RelevanceScorer } from "@/interfaces";
import type { RankedCandidate } from "@/types";
import { NORMALIZED_MIN_SCORE, RELEVANCE_SCALE } from "@/constants/recommendation";
import { assertScoreBatch } from "@/utils/capabilityErrors";

/**
 * Shift scores so the minimum equals NORMALIZED_MIN_SCORE.
 */
function normalizeScores(candidates: RankedCandidate[]): RankedCandidate[] {
  if (candidates.length === 0) {
    return candidates;
  }
  const minScore = Math.min(...candidates.map((c) => c.score));
  return candidates.map((c) => ({
    ...c,
    score: c.score - minScore + NORMALIZED_MIN_SCORE,
  }));
}

/**
 * Re-scores and re-orders candidates with the relevance capability.
 *
 * Every candidate is scored (no further shortlisting) in one batch.
 * Ties keep the incoming order.
 *
 * @param jobText - Job description
 * @param candidates - Candidates from the retrieval stage (incoming scores are discarded)
 * @param scorer - Injected relevance capability
 * @returns Candidates sorted by relevance, minimum score shifted to 1
 * @throws Whatever the scorer throws; nothing is caught here
 */
export async function rerankCandidates(
  jobText: string,
  candidates: RankedCandidate[],
  scorer: RelevanceScorer,
): Promise<RankedCandidate[]> {
  if (candidates.length === 0) {
    return [];
  }

  const relevance = await scorer.score(
    jobText,
    candidates.map((c) => c.text),
  );
  assertScoreBatch(relevance, candidates.length, scorer.name);

  const rescored = candidates.map((c, i) => ({
    ...c,
    score: relevance[i] * RELEVANCE_SCALE,
  }));
  rescored.sort((a, b) => b.score - a.score);

  return normalizeScores(rescored);
}
