/**
 * In-process capability fakes for recommender tests
 *
 * - KeywordEmbedder: one dimension per vocabulary word, 1 when the text
 *   contains the word (substring, lowercased), 0 otherwise
 * - TableScorer: relevance looked up by candidate text, default 0
 * - FailingEmbedder / FailingScorer: reject every call
 *
 * Each fake records its calls.
 */

import type { Embedder, RelevanceScorer } from "@/interfaces";

export class KeywordEmbedder implements Embedder {
  readonly name = "keyword-fake";
  readonly calls: string[][] = [];

  constructor(private readonly vocabulary: string[]) {}

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map((text) => {
      const lower = text.toLowerCase();
      return this.vocabulary.map((word) => (lower.includes(word) ? 1 : 0));
    });
  }
}

export class TableScorer implements RelevanceScorer {
  readonly name = "table-fake";
  readonly calls: Array<{ query: string; candidates: string[] }> = [];

  constructor(private readonly table: Record<string, number> = {}) {}

  async score(query: string, candidates: string[]): Promise<number[]> {
    this.calls.push({ query, candidates: [...candidates] });
    return candidates.map((c) => this.table[c] ?? 0);
  }
}

export class FailingEmbedder implements Embedder {
  readonly name = "failing-embedder";

  constructor(private readonly error: Error) {}

  async embed(): Promise<number[][]> {
    throw this.error;
  }
}

export class FailingScorer implements RelevanceScorer {
  readonly name = "failing-scorer";

  constructor(private readonly error: Error) {}

  async score(): Promise<number[]> {
    throw this.error;
  }
}
