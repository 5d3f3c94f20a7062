export { extractPriorities } from "./priorityExtractor";
export { detectSectionHeader, tokenizeHeader } from "./headerMatcher";
