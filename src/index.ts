/**
 * Public API
 */

export { createEngine } from "@/engine";
export type { Engine, EngineOptions, CapabilityBackend } from "@/engine";
export { BulletRecommender, SkillRecommender, classifyCategory, selectTopCategories } from "@/recommend";
export type { BulletRecommenderCapabilities } from "@/recommend";
export { scoreCandidate, explainCandidateScore } from "@/signal/scorer";
export type { CandidateScoreBreakdown } from "@/signal/scorer";
export { retrieveCandidates } from "@/signal/retrieval";
export { rerankCandidates } from "@/signal/rerank";
export { extractPriorities, detectSectionHeader } from "@/signal/priorities";
export { extractJobPhrases } from "@/signal/phrases";
export { formatSkillLine, fitSkillLine, parseSkillLine, skillLineStatus } from "@/format";
export {
  preselectTopBullets,
  countSelectedLines,
  lineBudgetStatus,
  validateSelection,
  scoreBand,
  selectionStats,
  buildTemplateFields,
  deriveTemplatePrefix,
} from "@/selection";
export { loadProfile, compileProfile, groupBulletsByRole, buildTaxonomy } from "@/profile";
export { readCapabilityConfig } from "@/config";
export { TeiEmbeddingClient, TeiRerankClient } from "@/clients/tei";
export { HttpError } from "@/clients/http";
export { HashingEmbedder, LexicalRelevanceScorer, HeuristicTextAnalyzer } from "@/capabilities";
export { ProfileValidationError } from "@/utils/profileValidation";
export { CapabilityConfigError, CapabilityResponseError } from "@/utils/capabilityErrors";
export type { Embedder, RelevanceScorer, TextAnalyzer } from "@/interfaces";
export type * from "@/types";
