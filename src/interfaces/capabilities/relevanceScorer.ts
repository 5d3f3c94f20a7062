/**
 * RelevanceScorer interface — joint (query, candidate) relevance capability
 *
 * The cross-encoder role in the pipeline: scores each candidate against
 * the query with a model that sees both texts at once.
 */

export interface RelevanceScorer {
  /**
   * Backend identifier, used in logs
   */
  readonly name: string;

  /**
   * Score every candidate against the query.
   *
   * @param query - Job description text
   * @param candidates - Candidate texts (may be empty)
   * @returns One relevance score per candidate, in input order
   */
  score(query: string, candidates: string[]): Promise<number[]>;
}
