/**
 * TeiRerankClient — RelevanceScorer backed by a TEI cross-encoder
 *
 * TEI answers POST /rerank with entries sorted by score; this client puts
 * the scores back in candidate order. Candidates are sent in batches the
 * server accepts.
 */

import type { RelevanceScorer } from "@/interfaces";
import type {
  HttpRequestFn,
  TeiClientConfig,
  TeiRerankRequest,
  TeiRerankResponse,
} from "@/types";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import { TEI_MAX_BATCH_SIZE, TEI_RERANK_PATH } from "@/constants";
import { CapabilityResponseError, assertScoreBatch } from "@/utils/capabilityErrors";
import { buildTeiHeaders, buildTeiUrl } from "./teiShared";

export class TeiRerankClient implements RelevanceScorer {
  readonly name = "tei-rerank";
  private readonly httpRequest: HttpRequestFn;

  constructor(private readonly config: TeiClientConfig) {
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
  }

  async score(query: string, candidates: string[]): Promise<number[]> {
    if (candidates.length === 0) {
      return [];
    }

    const url = buildTeiUrl(this.config.baseUrl, TEI_RERANK_PATH);
    const scores = new Array<number | undefined>(candidates.length).fill(undefined);

    for (let offset = 0; offset < candidates.length; offset += TEI_MAX_BATCH_SIZE) {
      const batch = candidates.slice(offset, offset + TEI_MAX_BATCH_SIZE);
      const body: TeiRerankRequest = {
        query,
        texts: batch,
        raw_scores: false,
        truncate: true,
      };

      const response = await this.httpRequest<TeiRerankResponse>({
        method: "POST",
        url,
        headers: buildTeiHeaders(this.config),
        json: body,
        timeoutMs: this.config.timeoutMs,
      });

      if (!Array.isArray(response)) {
        throw new CapabilityResponseError(this.name, "expected an array of {index, score}");
      }

      // Indexes are relative to the batch
      for (const item of response) {
        const index = item?.index;
        if (!Number.isInteger(index) || index < 0 || index >= batch.length) {
          throw new CapabilityResponseError(this.name, `index ${String(index)} is out of range`);
        }
        if (scores[offset + index] !== undefined) {
          throw new CapabilityResponseError(this.name, `index ${offset + index} appears twice`);
        }
        scores[offset + index] = item.score;
      }
    }

    const ordered = scores.filter((score): score is number => score !== undefined);
    assertScoreBatch(ordered, candidates.length, this.name);
    return ordered;
  }
}
