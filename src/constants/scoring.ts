/**
 * Candidate scoring constants
 *
 * Lexical relevance weights for skills (and any short candidate string)
 * against a job description. Weights stack: a skill mentioned as a whole
 * word earns both the direct and the word-boundary points.
 */

/** Candidate appears anywhere in the job text (substring) */
export const DIRECT_MENTION_POINTS = 10.0;

/** Candidate appears as a whole word in the job text */
export const WORD_BOUNDARY_POINTS = 5.0;

/** Per candidate word found as a standalone token in the job text */
export const WORD_PRESENCE_POINTS = 1.0;

/** Per related term found in the job text when the candidate contains the base skill */
export const RELATED_TERM_POINTS = 0.5;

/**
 * Base skill → related terms.
 *
 * Base skills are matched as substrings of the lowercased candidate,
 * related terms as substrings of the lowercased job text.
 */
export const RELATED_TERMS: Readonly<Record<string, readonly string[]>> = {
  python: ["django", "flask", "pandas", "numpy", "scikit"],
  javascript: ["js", "react", "angular", "vue", "node"],
  java: ["spring", "maven", "gradle"],
  sql: ["database", "mysql", "postgresql", "oracle"],
  cloud: ["aws", "azure", "gcp", "kubernetes", "docker"],
  "machine learning": ["ml", "ai", "neural", "tensorflow", "pytorch"],
  frontend: ["react", "angular", "vue", "css", "html"],
  backend: ["api", "server", "database", "microservices"],
  devops: ["ci/cd", "deployment", "automation", "infrastructure"],
};
