/**
 * Text Embeddings Inference clients
 */

export { TeiEmbeddingClient } from "./teiEmbeddingClient";
export { TeiRerankClient } from "./teiRerankClient";
