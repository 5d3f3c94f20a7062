/**
 * Semantic retriever (two-tower)
 *
 * Embeds the job description and every candidate independently, ranks the
 * candidates by cosine similarity to the job and keeps the top N.
 *
 * Candidates are identified by their input index, never by text, so two
 * candidates with identical text are both returned.
 */

import type { Embedder } from "@/interfaces";
import type { RetrievedCandidate } from "@/types";
import { cosineSimilarity } from "@/utils/vector";
import { assertVectorBatch } from "@/utils/capabilityErrors";

/**
 * Ranks candidates by embedding similarity to the job text.
 *
 * The job text and all candidates go to the embedder in a single batch.
 * Ties keep input order.
 *
 * @param jobText - Job description (query tower)
 * @param candidates - Candidate texts (candidate tower)
 * @param topN - Maximum number of results
 * @param embedder - Injected embedding capability
 * @returns Up to `topN` candidates, most similar first
 * @throws Whatever the embedder throws; nothing is caught here
 */
export async function retrieveCandidates(
  jobText: string,
  candidates: string[],
  topN: number,
  embedder: Embedder,
): Promise<RetrievedCandidate[]> {
  if (candidates.length === 0 || topN <= 0) {
    return [];
  }

  const vectors = await embedder.embed([jobText, ...candidates]);
  assertVectorBatch(vectors, candidates.length + 1, embedder.name);

  const [jobVector, ...candidateVectors] = vectors;

  const ranked: RetrievedCandidate[] = candidates.map((text, index) => ({
    index,
    text,
    similarity: cosineSimilarity(jobVector, candidateVectors[index]),
  }));

  ranked.sort((a, b) => b.similarity - a.similarity);
  return ranked.slice(0, topN);
}
