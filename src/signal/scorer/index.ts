export { scoreCandidate, explainCandidateScore } from "./scorer";
export type { CandidateScoreBreakdown } from "./scorer";
