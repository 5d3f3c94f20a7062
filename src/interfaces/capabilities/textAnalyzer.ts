/**
 * TextAnalyzer interface — sentence segmentation and noun chunking
 */

export interface TextAnalyzer {
  /**
   * Split text into sentence-like segments, in document order.
   * Segments are trimmed; empty segments are not returned.
   */
  sentences(text: string): string[];

  /**
   * Extract contiguous noun-phrase spans from one sentence, in order.
   * Each chunk is returned verbatim (original casing), trimmed.
   */
  nounChunks(sentence: string): string[];
}
