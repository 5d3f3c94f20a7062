/**
 * Runtime configuration type definitions
 */

/**
 * Capability backend settings read from the environment.
 *
 * A missing URL means the in-process fallback is used for that capability.
 */
export type CapabilityEnvConfig = {
  embeddingsUrl?: string;
  rerankerUrl?: string;
  apiKey?: string;
  timeoutMs: number;
};
