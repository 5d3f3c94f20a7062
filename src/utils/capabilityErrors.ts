/**
 * Capability error utilities
 *
 * Errors raised around the injected capabilities (embedder, relevance
 * scorer). The recommenders never catch these; they surface as the single
 * failure of the recommendation call.
 */

/**
 * Error thrown when a capability returns a payload of the wrong shape.
 */
export class CapabilityResponseError extends Error {
  constructor(source: string, message: string) {
    super(`${source} returned an invalid response: ${message}`);
    this.name = "CapabilityResponseError";
  }
}

/**
 * Error thrown when a capability backend cannot be configured.
 */
export class CapabilityConfigError extends Error {
  constructor(message: string) {
    super(`Capability configuration failed: ${message}`);
    this.name = "CapabilityConfigError";
  }
}

/**
 * Checks that an embedding batch has one finite vector per input and that
 * all vectors share the same length.
 *
 * @param vectors - Value returned by the embedder
 * @param expectedCount - Number of texts that were embedded
 * @param source - Embedder name for error messages
 * @throws {CapabilityResponseError} If the batch is malformed
 */
export function assertVectorBatch(
  vectors: unknown,
  expectedCount: number,
  source: string,
): asserts vectors is number[][] {
  if (!Array.isArray(vectors)) {
    throw new CapabilityResponseError(source, `expected an array, got ${typeof vectors}`);
  }
  if (vectors.length !== expectedCount) {
    throw new CapabilityResponseError(
      source,
      `expected ${expectedCount} vectors, got ${vectors.length}`,
    );
  }

  let dimensions: number | null = null;
  vectors.forEach((vector: unknown, index: number) => {
    if (!Array.isArray(vector) || !vector.every((v) => typeof v === "number" && Number.isFinite(v))) {
      throw new CapabilityResponseError(source, `vector ${index} is not a list of finite numbers`);
    }
    if (dimensions === null) {
      dimensions = vector.length;
    } else if (vector.length !== dimensions) {
      throw new CapabilityResponseError(
        source,
        `vector ${index} has ${vector.length} dimensions, expected ${dimensions}`,
      );
    }
  });
}

/**
 * Checks that a relevance batch has one finite score per candidate.
 *
 * @throws {CapabilityResponseError} If the batch is malformed
 */
export function assertScoreBatch(
  scores: unknown,
  expectedCount: number,
  source: string,
): asserts scores is number[] {
  if (!Array.isArray(scores)) {
    throw new CapabilityResponseError(source, `expected an array, got ${typeof scores}`);
  }
  if (scores.length !== expectedCount) {
    throw new CapabilityResponseError(
      source,
      `expected ${expectedCount} scores, got ${scores.length}`,
    );
  }
  scores.forEach((score: unknown, index: number) => {
    if (typeof score !== "number" || !Number.isFinite(score)) {
      throw new CapabilityResponseError(source, `score ${index} is not a finite number`);
    }
  });
}
