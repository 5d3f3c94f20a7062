/**
 * Evidence phrases — job phrases most similar to each bullet
 */

import type { Embedder } from "@/interfaces";
import { MATCH_SIMILARITY_THRESHOLD, MAX_MATCHED_PHRASES } from "@/constants";
import { cosineSimilarity } from "@/utils/vector";
import { assertVectorBatch } from "@/utils/capabilityErrors";

/**
 * For every bullet text, returns up to MAX_MATCHED_PHRASES job phrases
 * ordered by similarity, keeping only those above the threshold.
 *
 * Phrases and bullets are embedded in one batch each. With no phrases or
 * no bullets the embedder is not called.
 */
export async function matchPhrases(
  bulletTexts: string[],
  phrases: string[],
  embedder: Embedder,
): Promise<string[][]> {
  if (bulletTexts.length === 0) {
    return [];
  }
  if (phrases.length === 0) {
    return bulletTexts.map(() => []);
  }

  const phraseVectors = await embedder.embed(phrases);
  assertVectorBatch(phraseVectors, phrases.length, embedder.name);
  const bulletVectors = await embedder.embed(bulletTexts);
  assertVectorBatch(bulletVectors, bulletTexts.length, embedder.name);

  return bulletVectors.map((bulletVector) => {
    const ranked = phraseVectors
      .map((phraseVector, index) => ({
        index,
        similarity: cosineSimilarity(bulletVector, phraseVector),
      }))
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, MAX_MATCHED_PHRASES);

    return ranked
      .filter((entry) => entry.similarity > MATCH_SIMILARITY_THRESHOLD)
      .map((entry) => phrases[entry.index]);
  });
}
