/**
 * Embedder interface — sentence embedding capability
 *
 * Implementations turn texts into fixed-length vectors whose cosine
 * similarity reflects semantic relatedness. The engine never owns model
 * lifecycle: an Embedder is constructed once by the host and injected.
 */

export interface Embedder {
  /**
   * Backend identifier, used in logs
   */
  readonly name: string;

  /**
   * Embed a batch of texts.
   *
   * Must return exactly one vector per input, in input order, all of the
   * same length. Embedding the texts one at a time must give the same
   * vectors as embedding them together.
   *
   * @param texts - Texts to embed (may be empty)
   * @returns One vector per input text
   */
  embed(texts: string[]): Promise<number[][]>;
}
