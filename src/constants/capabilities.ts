/**
 * Capability backend constants
 */

/** Environment variable holding the TEI embeddings base URL */
export const EMBEDDINGS_URL_ENV = "EMBEDDINGS_URL";

/** Environment variable holding the TEI reranker base URL */
export const RERANKER_URL_ENV = "RERANKER_URL";

/** Environment variable holding an optional bearer token for both backends */
export const CAPABILITY_API_KEY_ENV = "CAPABILITY_API_KEY";

/** Environment variable overriding the per-request timeout */
export const CAPABILITY_TIMEOUT_ENV = "CAPABILITY_TIMEOUT_MS";

/** Vector size of the in-process hashing embedder */
export const HASHING_EMBEDDER_DIMENSIONS = 512;
