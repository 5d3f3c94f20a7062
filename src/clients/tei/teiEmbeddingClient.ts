/**
 * TeiEmbeddingClient — Embedder backed by a Text Embeddings Inference server
 *
 * Sends texts to POST /embed in batches the server accepts and concatenates
 * the vectors back in input order.
 */

import type { Embedder } from "@/interfaces";
import type {
  HttpRequestFn,
  TeiClientConfig,
  TeiEmbedRequest,
  TeiEmbedResponse,
} from "@/types";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import { TEI_EMBED_PATH, TEI_MAX_BATCH_SIZE } from "@/constants";
import { assertVectorBatch } from "@/utils/capabilityErrors";
import * as logger from "@/logger";
import { buildTeiHeaders, buildTeiUrl } from "./teiShared";

export class TeiEmbeddingClient implements Embedder {
  readonly name = "tei-embed";
  private readonly httpRequest: HttpRequestFn;

  constructor(private readonly config: TeiClientConfig) {
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const url = buildTeiUrl(this.config.baseUrl, TEI_EMBED_PATH);
    const vectors: number[][] = [];

    for (let start = 0; start < texts.length; start += TEI_MAX_BATCH_SIZE) {
      const batch = texts.slice(start, start + TEI_MAX_BATCH_SIZE);
      const body: TeiEmbedRequest = { inputs: batch, normalize: true, truncate: true };

      const response = await this.httpRequest<TeiEmbedResponse>({
        method: "POST",
        url,
        headers: buildTeiHeaders(this.config),
        json: body,
        timeoutMs: this.config.timeoutMs,
      });

      assertVectorBatch(response, batch.length, this.name);
      vectors.push(...response);
    }

    logger.debug("TEI embeddings fetched", {
      texts: texts.length,
      batches: Math.ceil(texts.length / TEI_MAX_BATCH_SIZE),
    });

    // Batches are checked one by one; dimensions must also agree across them
    assertVectorBatch(vectors, texts.length, this.name);
    return vectors;
  }
}
