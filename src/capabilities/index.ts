export { HeuristicTextAnalyzer } from "./heuristicTextAnalyzer";
export { HashingEmbedder } from "./hashingEmbedder";
export { LexicalRelevanceScorer } from "./lexicalRelevanceScorer";
