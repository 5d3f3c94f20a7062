/**
 * Unit tests for semantic retrieval and re-ranking
 *
 * Capabilities are in-process fakes. No network, no side effects
 */

import { describe, it, expect } from "vitest";
import { retrieveCandidates } from "@/signal/retrieval";
import { rerankCandidates } from "@/signal/rerank";
import type { Embedder, RelevanceScorer } from "@/interfaces";
import { CapabilityResponseError } from "@/utils/capabilityErrors";
import {
  FailingEmbedder,
  FailingScorer,
  KeywordEmbedder,
  TableScorer,
} from "../helpers/fakeCapabilities";

describe("retrieveCandidates", () => {
  const candidates = ["sql reports", "python scripts", "aws and python", "python scripts"];

  it("should rank by cosine similarity and keep duplicate texts", async () => {
    const embedder = new KeywordEmbedder(["python", "aws", "sql"]);
    const results = await retrieveCandidates("python aws", candidates, 3, embedder);

    expect(results.map((r) => r.index)).toEqual([2, 1, 3]);
    expect(results.map((r) => r.text)).toEqual([
      "aws and python",
      "python scripts",
      "python scripts",
    ]);
    expect(results[0].similarity).toBeCloseTo(1);
    expect(results[1].similarity).toBeCloseTo(Math.SQRT1_2);
  });

  it("should embed the job and all candidates in one batch", async () => {
    const embedder = new KeywordEmbedder(["python"]);
    await retrieveCandidates("python aws", candidates, 2, embedder);
    expect(embedder.calls).toEqual([["python aws", ...candidates]]);
  });

  it("should return at most the number of candidates", async () => {
    const embedder = new KeywordEmbedder(["python"]);
    const results = await retrieveCandidates("python", candidates, 10, embedder);
    expect(results).toHaveLength(4);
  });

  it("should skip the embedder for empty input or non-positive topN", async () => {
    const embedder = new KeywordEmbedder(["python"]);
    expect(await retrieveCandidates("python", [], 5, embedder)).toEqual([]);
    expect(await retrieveCandidates("python", candidates, 0, embedder)).toEqual([]);
    expect(embedder.calls).toHaveLength(0);
  });

  it("should reject a batch with the wrong number of vectors", async () => {
    const shortEmbedder: Embedder = {
      name: "short",
      embed: async () => [[1]],
    };
    await expect(
      retrieveCandidates("python", candidates, 2, shortEmbedder),
    ).rejects.toThrow(CapabilityResponseError);
  });

  it("should propagate embedder errors unchanged", async () => {
    const error = new Error("model offline");
    await expect(
      retrieveCandidates("python", candidates, 2, new FailingEmbedder(error)),
    ).rejects.toBe(error);
  });
});

describe("rerankCandidates", () => {
  const retrieved = [
    { index: 0, text: "a", score: 10 },
    { index: 1, text: "b", score: 50 },
    { index: 2, text: "c", score: 0 },
  ];

  it("should replace scores with relevance and shift the minimum to 1", async () => {
    const scorer = new TableScorer({ a: 0.75, b: 0.25, c: 0.5 });
    const results = await rerankCandidates("job", retrieved, scorer);

    expect(results).toEqual([
      { index: 0, text: "a", score: 51 },
      { index: 2, text: "c", score: 26 },
      { index: 1, text: "b", score: 1 },
    ]);
    expect(scorer.calls).toEqual([{ query: "job", candidates: ["a", "b", "c"] }]);
  });

  it("should keep incoming order for equal relevance", async () => {
    const results = await rerankCandidates("job", retrieved, new TableScorer());
    expect(results.map((r) => [r.index, r.score])).toEqual([
      [0, 1],
      [1, 1],
      [2, 1],
    ]);
  });

  it("should return empty list without calling the scorer", async () => {
    const scorer = new TableScorer();
    expect(await rerankCandidates("job", [], scorer)).toEqual([]);
    expect(scorer.calls).toHaveLength(0);
  });

  it("should reject a score batch of the wrong length", async () => {
    const shortScorer: RelevanceScorer = {
      name: "short",
      score: async () => [1],
    };
    await expect(rerankCandidates("job", retrieved, shortScorer)).rejects.toThrow(
      "short returned an invalid response: expected 3 scores, got 1",
    );
  });

  it("should propagate scorer errors unchanged", async () => {
    const error = new Error("reranker offline");
    await expect(
      rerankCandidates("job", retrieved, new FailingScorer(error)),
    ).rejects.toBe(error);
  });
});
