/**
 * Text Embeddings Inference client constants
 */

export const TEI_EMBED_PATH = "/embed";

export const TEI_RERANK_PATH = "/rerank";

/**
 * Inputs per /embed request. TEI rejects batches above its
 * --max-client-batch-size (32 by default).
 */
export const TEI_MAX_BATCH_SIZE = 32;
