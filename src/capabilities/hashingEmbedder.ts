/**
 * Hashing embedder — in-process fallback for the Embedder capability
 *
 * Maps each text to a bag of hashed features (content unigrams and
 * bigrams) with sublinear term frequency, then L2-normalizes. Cosine
 * similarity between two vectors approximates weighted token overlap.
 * Deterministic and dependency-free; far weaker than a sentence model,
 * but it keeps the pipeline usable offline.
 */

import type { Embedder } from "@/interfaces";
import { HASHING_EMBEDDER_DIMENSIONS } from "@/constants/capabilities";
import { PHRASE_STOPWORDS } from "@/constants/phrases";
import { normalizeToTokens } from "@/utils/text/textNormalization";

/** Bigram features count for half a unigram */
const BIGRAM_WEIGHT = 0.5;

/**
 * 32-bit FNV-1a hash
 */
function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export class HashingEmbedder implements Embedder {
  readonly name = "hashing";

  constructor(private readonly dimensions: number = HASHING_EMBEDDER_DIMENSIONS) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new RangeError(`dimensions must be a positive integer, got ${dimensions}`);
    }
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }

  private embedOne(text: string): number[] {
    const tokens = normalizeToTokens(text).filter((t) => !PHRASE_STOPWORDS.has(t));

    const features = new Map<string, number>();
    const add = (feature: string, weight: number): void => {
      features.set(feature, (features.get(feature) ?? 0) + weight);
    };
    tokens.forEach((token, i) => {
      add(token, 1);
      if (i + 1 < tokens.length) {
        add(`${token} ${tokens[i + 1]}`, BIGRAM_WEIGHT);
      }
    });

    const vector = new Array<number>(this.dimensions).fill(0);
    for (const [feature, count] of features) {
      vector[fnv1a(feature) % this.dimensions] += 1 + Math.log(count);
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }
}
