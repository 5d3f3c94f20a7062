/**
 * Text Embeddings Inference (TEI) wire types
 *
 * TEI serves sentence embedding and cross-encoder models over HTTP.
 * Only the fields this project sends or reads are modelled.
 */

import type { HttpRequestFn } from "./http";

/** Body of POST /embed */
export type TeiEmbedRequest = {
  inputs: string[];
  normalize: boolean;
  truncate: boolean;
};

/** Response of POST /embed: one vector per input, in input order */
export type TeiEmbedResponse = number[][];

/** Body of POST /rerank */
export type TeiRerankRequest = {
  query: string;
  texts: string[];
  raw_scores: boolean;
  truncate: boolean;
};

/** One entry of the POST /rerank response (sorted by score, not by index) */
export type TeiRerankItem = {
  index: number;
  score: number;
};

export type TeiRerankResponse = TeiRerankItem[];

export interface TeiClientConfig {
  /** Base URL of the TEI deployment (no trailing path) */
  baseUrl: string;
  /** Optional bearer token for gated deployments */
  apiKey?: string;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  /** Optional HTTP request function (for testing/mocking) */
  httpRequest?: HttpRequestFn;
}
