/**
 * Runtime configuration from environment variables
 */

import type { CapabilityEnvConfig } from "@/types";
import {
  CAPABILITY_API_KEY_ENV,
  CAPABILITY_TIMEOUT_ENV,
  DEFAULT_HTTP_TIMEOUT_MS,
  EMBEDDINGS_URL_ENV,
  RERANKER_URL_ENV,
} from "@/constants";
import { CapabilityConfigError } from "@/utils/capabilityErrors";

type Env = Record<string, string | undefined>;

function readOptional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readUrl(env: Env, name: string): string | undefined {
  const value = readOptional(env, name);
  if (value === undefined) {
    return undefined;
  }
  try {
    new URL(value);
  } catch {
    throw new CapabilityConfigError(`${name} is not a valid URL: "${value}"`);
  }
  return value;
}

function readTimeout(env: Env): number {
  const value = readOptional(env, CAPABILITY_TIMEOUT_ENV);
  if (value === undefined) {
    return DEFAULT_HTTP_TIMEOUT_MS;
  }
  const timeoutMs = Number(value);
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new CapabilityConfigError(
      `${CAPABILITY_TIMEOUT_ENV} must be a positive integer, got "${value}"`,
    );
  }
  return timeoutMs;
}

/**
 * Reads capability backend settings.
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws {CapabilityConfigError} On a malformed URL or timeout
 */
export function readCapabilityConfig(env: Env = process.env): CapabilityEnvConfig {
  return {
    embeddingsUrl: readUrl(env, EMBEDDINGS_URL_ENV),
    rerankerUrl: readUrl(env, RERANKER_URL_ENV),
    apiKey: readOptional(env, CAPABILITY_API_KEY_ENV),
    timeoutMs: readTimeout(env),
  };
}
