/**
 * BulletRecommender — ranks resume bullets against a job description
 *
 * Pipeline per call:
 * 1. normalize bullet texts (index carried as identity)
 * 2. semantic retrieval of the top N
 * 3. cross-encoder re-ranking of everything retrieved
 * 4. evidence phrases + must-have / nice-to-have boosts, integer scores
 *
 * Capabilities are injected once and shared across calls.
 */

import type { Embedder, RelevanceScorer, TextAnalyzer } from "@/interfaces";
import type {
  BulletPool,
  BulletRecord,
  PrioritySet,
  RankedCandidate,
  ScoredBullet,
  ScoredBulletSummary,
} from "@/types";
import {
  DEFAULT_TOP_N,
  MUST_HAVE_BOOST,
  NICE_TO_HAVE_BOOST,
  SIMILARITY_SCALE,
} from "@/constants";
import { retrieveCandidates } from "@/signal/retrieval";
import { rerankCandidates } from "@/signal/rerank";
import { extractJobPhrases } from "@/signal/phrases";
import { extractPriorities } from "@/signal/priorities";
import { normalizeCandidateText } from "@/utils/text/textNormalization";
import { matchPhrases } from "./phraseMatches";
import * as logger from "@/logger";

export interface BulletRecommenderCapabilities {
  embedder: Embedder;
  scorer: RelevanceScorer;
  analyzer: TextAnalyzer;
}

/**
 * Boost for priority phrases contained in the (lowercased) bullet text.
 */
export function priorityBoost(bulletText: string, priorities: PrioritySet): number {
  const text = bulletText.toLowerCase();
  let boost = 0;
  for (const phrase of priorities.mustHave) {
    if (text.includes(phrase.toLowerCase())) {
      boost += MUST_HAVE_BOOST;
    }
  }
  for (const phrase of priorities.niceToHave) {
    if (text.includes(phrase.toLowerCase())) {
      boost += NICE_TO_HAVE_BOOST;
    }
  }
  return boost;
}

export class BulletRecommender {
  private readonly embedder: Embedder;
  private readonly scorer: RelevanceScorer;
  private readonly analyzer: TextAnalyzer;

  constructor(capabilities: BulletRecommenderCapabilities) {
    this.embedder = capabilities.embedder;
    this.scorer = capabilities.scorer;
    this.analyzer = capabilities.analyzer;
  }

  /**
   * Ranks bullets and attaches evidence phrases.
   *
   * @param bullets - Candidate bullets (not mutated)
   * @param jobText - Job description
   * @param topN - Maximum bullets returned
   * @returns Up to `topN` bullets, integer scores, highest first
   * @throws Whatever a capability throws
   */
  async recommendWithMatches(
    bullets: BulletRecord[],
    jobText: string,
    topN: number = DEFAULT_TOP_N,
  ): Promise<ScoredBullet[]> {
    if (bullets.length === 0 || jobText.trim() === "") {
      return [];
    }
    const startedAt = Date.now();

    const normalized = bullets.map((b) => normalizeCandidateText(b.bullet));

    const retrieved = await retrieveCandidates(jobText, normalized, topN, this.embedder);
    const retrievedRanked: RankedCandidate[] = retrieved.map((c) => ({
      index: c.index,
      text: c.text,
      score: c.similarity * SIMILARITY_SCALE,
    }));

    const reranked = await rerankCandidates(jobText, retrievedRanked, this.scorer);

    const priorities = extractPriorities(jobText, this.analyzer);
    const phrases = extractJobPhrases(jobText);
    const matches = await matchPhrases(
      reranked.map((c) => c.text),
      phrases,
      this.embedder,
    );

    const results: ScoredBullet[] = reranked.map((candidate, position) => ({
      bullet: bullets[candidate.index],
      score: Math.trunc(candidate.score + priorityBoost(candidate.text, priorities)),
      matches: matches[position],
    }));
    results.sort((a, b) => b.score - a.score);

    logger.debug("Bullets ranked", {
      bullets: bullets.length,
      retrieved: retrieved.length,
      phrases: phrases.length,
      mustHave: priorities.mustHave.length,
      niceToHave: priorities.niceToHave.length,
      durationMs: Date.now() - startedAt,
    });

    return results;
  }

  /**
   * Same ranking as recommendWithMatches, without evidence phrases.
   */
  async recommend(
    bullets: BulletRecord[],
    jobText: string,
    topN: number = DEFAULT_TOP_N,
  ): Promise<ScoredBulletSummary[]> {
    const ranked = await this.recommendWithMatches(bullets, jobText, topN);
    return ranked.map(({ bullet, score }) => ({ bullet, score }));
  }

  /**
   * Ranks every role of a pool, each over all of its bullets.
   * Roles are processed one after another, in pool order.
   */
  async recommendForRoles(
    pool: BulletPool,
    jobText: string,
  ): Promise<Record<string, ScoredBullet[]>> {
    const byRole: Record<string, ScoredBullet[]> = {};
    for (const [role, bullets] of Object.entries(pool)) {
      byRole[role] = await this.recommendWithMatches(bullets, jobText, bullets.length);
    }
    return byRole;
  }
}
