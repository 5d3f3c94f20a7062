/**
 * Engine factory — builds the capabilities once and wires the recommenders
 *
 * Backend selection:
 * - explicit capability overrides always win
 * - "tei": both HTTP backends, URLs required
 * - "local": in-process fallbacks only
 * - "auto" (default): TEI where a URL is configured, fallback otherwise
 */

import type { Embedder, RelevanceScorer, TextAnalyzer } from "@/interfaces";
import type { CapabilityEnvConfig, HttpRequestFn, SkillTaxonomy } from "@/types";
import { EMBEDDINGS_URL_ENV, RERANKER_URL_ENV } from "@/constants";
import { readCapabilityConfig } from "@/config";
import { TeiEmbeddingClient, TeiRerankClient } from "@/clients/tei";
import {
  HashingEmbedder,
  HeuristicTextAnalyzer,
  LexicalRelevanceScorer,
} from "@/capabilities";
import { BulletRecommender, SkillRecommender } from "@/recommend";
import { CapabilityConfigError } from "@/utils/capabilityErrors";
import * as logger from "@/logger";

export type CapabilityBackend = "auto" | "tei" | "local";

export interface EngineOptions {
  backend?: CapabilityBackend;
  /** Settings to use instead of reading the environment */
  config?: CapabilityEnvConfig;
  embedder?: Embedder;
  scorer?: RelevanceScorer;
  analyzer?: TextAnalyzer;
  /** HTTP function handed to the TEI clients (for testing/mocking) */
  httpRequest?: HttpRequestFn;
}

export interface Engine {
  readonly embedder: Embedder;
  readonly scorer: RelevanceScorer;
  readonly analyzer: TextAnalyzer;
  readonly bullets: BulletRecommender;
  skillsFor(taxonomy: SkillTaxonomy): SkillRecommender;
}

function requireUrl(url: string | undefined, envName: string): string {
  if (!url) {
    throw new CapabilityConfigError(`${envName} is not set`);
  }
  return url;
}

function buildEmbedder(
  backend: CapabilityBackend,
  loadConfig: () => CapabilityEnvConfig,
  httpRequest: HttpRequestFn | undefined,
): Embedder {
  if (backend === "local") {
    return new HashingEmbedder();
  }
  const config = loadConfig();
  if (backend === "auto" && !config.embeddingsUrl) {
    return new HashingEmbedder();
  }
  return new TeiEmbeddingClient({
    baseUrl: requireUrl(config.embeddingsUrl, EMBEDDINGS_URL_ENV),
    apiKey: config.apiKey,
    timeoutMs: config.timeoutMs,
    httpRequest,
  });
}

function buildScorer(
  backend: CapabilityBackend,
  loadConfig: () => CapabilityEnvConfig,
  httpRequest: HttpRequestFn | undefined,
): RelevanceScorer {
  if (backend === "local") {
    return new LexicalRelevanceScorer();
  }
  const config = loadConfig();
  if (backend === "auto" && !config.rerankerUrl) {
    return new LexicalRelevanceScorer();
  }
  return new TeiRerankClient({
    baseUrl: requireUrl(config.rerankerUrl, RERANKER_URL_ENV),
    apiKey: config.apiKey,
    timeoutMs: config.timeoutMs,
    httpRequest,
  });
}

/**
 * Creates the recommendation engine.
 *
 * @throws {CapabilityConfigError} If a required backend URL is missing or malformed
 *
 * @example
 * const engine = createEngine();
 * const ranked = await engine.bullets.recommendForRoles(profile.bulletsByRole, jobText);
 * const skills = engine.skillsFor(profile.taxonomy).recommendSkills(jobText);
 */
export function createEngine(options: EngineOptions = {}): Engine {
  const backend = options.backend ?? "auto";
  let config = options.config;
  const loadConfig = (): CapabilityEnvConfig => (config ??= readCapabilityConfig());

  const embedder =
    options.embedder ?? buildEmbedder(backend, loadConfig, options.httpRequest);
  const scorer = options.scorer ?? buildScorer(backend, loadConfig, options.httpRequest);
  const analyzer = options.analyzer ?? new HeuristicTextAnalyzer();

  logger.info("Recommendation engine ready", {
    embedder: embedder.name,
    scorer: scorer.name,
  });

  return {
    embedder,
    scorer,
    analyzer,
    bullets: new BulletRecommender({ embedder, scorer, analyzer }),
    skillsFor: (taxonomy) => new SkillRecommender(taxonomy),
  };
}
