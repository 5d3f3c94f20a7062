export type { Embedder } from "./capabilities/embedder";
export type { RelevanceScorer } from "./capabilities/relevanceScorer";
export type { TextAnalyzer } from "./capabilities/textAnalyzer";
