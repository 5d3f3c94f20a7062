export { rerankCandidates } from "./reranker";
