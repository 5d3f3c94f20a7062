export { extractJobPhrases, tokenizeForPhrases } from "./phraseExtractor";
