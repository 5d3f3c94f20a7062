/**
 * Candidate scorer
 *
 * Scores a short candidate string (typically a skill name) against a job
 * description using stacked lexical signals:
 * - direct mention: candidate is a substring of the job text
 * - word boundary: candidate appears as a whole word
 * - word presence: each candidate word found as a standalone token
 * - related terms: candidate contains a base skill whose related terms
 *   appear in the job text
 *
 * Pure function of its inputs and the static RELATED_TERMS table.
 */

import {
  DIRECT_MENTION_POINTS,
  WORD_BOUNDARY_POINTS,
  WORD_PRESENCE_POINTS,
  RELATED_TERM_POINTS,
  RELATED_TERMS,
} from "@/constants/scoring";
import { containsWholeWord } from "@/utils/text/wordBoundary";

/**
 * Per-signal breakdown of a candidate score.
 */
export type CandidateScoreBreakdown = {
  directMention: number;
  wordBoundary: number;
  wordPresence: number;
  relatedTerms: number;
  total: number;
};

/**
 * Points for related terms of every base skill contained in the candidate.
 *
 * A term listed under two matching bases (e.g. "react" under both
 * javascript and frontend) is counted once per base.
 */
function relatedTermPoints(candidate: string, jobText: string): number {
  let points = 0;
  for (const [baseSkill, terms] of Object.entries(RELATED_TERMS)) {
    if (!candidate.includes(baseSkill)) {
      continue;
    }
    for (const term of terms) {
      if (jobText.includes(term)) {
        points += RELATED_TERM_POINTS;
      }
    }
  }
  return points;
}

/**
 * Computes the score of a candidate with its per-signal breakdown.
 *
 * @param candidateText - Skill or other short candidate string
 * @param jobText - Job description
 * @returns Breakdown whose `total` is the candidate score (>= 0)
 *
 * @example
 * explainCandidateScore("python", "We need a Python developer with Django experience")
 * // { directMention: 10, wordBoundary: 5, wordPresence: 1, relatedTerms: 0.5, total: 16.5 }
 */
export function explainCandidateScore(
  candidateText: string,
  jobText: string,
): CandidateScoreBreakdown {
  const candidate = candidateText.toLowerCase();
  const job = jobText.toLowerCase();

  const directMention =
    candidate.length > 0 && job.includes(candidate) ? DIRECT_MENTION_POINTS : 0;
  const wordBoundary = containsWholeWord(job, candidate) ? WORD_BOUNDARY_POINTS : 0;

  let wordPresence = 0;
  for (const word of candidate.split(/\s+/).filter(Boolean)) {
    if (containsWholeWord(job, word)) {
      wordPresence += WORD_PRESENCE_POINTS;
    }
  }

  const relatedTerms = relatedTermPoints(candidate, job);

  return {
    directMention,
    wordBoundary,
    wordPresence,
    relatedTerms,
    total: directMention + wordBoundary + wordPresence + relatedTerms,
  };
}

/**
 * Scores a candidate string against a job description.
 *
 * @param candidateText - Skill or other short candidate string
 * @param jobText - Job description
 * @returns Non-negative relevance score; 0 means no lexical evidence
 */
export function scoreCandidate(candidateText: string, jobText: string): number {
  return explainCandidateScore(candidateText, jobText).total;
}
