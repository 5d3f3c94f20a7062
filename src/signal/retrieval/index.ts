export { retrieveCandidates } from "./semanticRetriever";
