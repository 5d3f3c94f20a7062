/**
 * Lexical relevance scorer — in-process fallback for the RelevanceScorer capability
 *
 * Relevance is the share of a candidate's distinct content tokens that
 * also occur in the query, in [0, 1].
 */

import type { RelevanceScorer } from "@/interfaces";
import { PHRASE_STOPWORDS } from "@/constants/phrases";
import { normalizeToTokens } from "@/utils/text/textNormalization";

function contentTokens(text: string): Set<string> {
  return new Set(normalizeToTokens(text).filter((t) => !PHRASE_STOPWORDS.has(t)));
}

export class LexicalRelevanceScorer implements RelevanceScorer {
  readonly name = "lexical";

  async score(query: string, candidates: string[]): Promise<number[]> {
    const queryTokens = contentTokens(query);

    return candidates.map((candidate) => {
      const tokens = contentTokens(candidate);
      if (tokens.size === 0) {
        return 0;
      }
      let covered = 0;
      for (const token of tokens) {
        if (queryTokens.has(token)) {
          covered += 1;
        }
      }
      return covered / tokens.size;
    });
  }
}
