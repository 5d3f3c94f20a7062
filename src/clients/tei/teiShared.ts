/**
 * Helpers shared by the TEI clients
 */

import type { TeiClientConfig } from "@/types";

/**
 * Join a base URL and an endpoint path without doubling slashes
 */
export function buildTeiUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, "")}${path}`;
}

/**
 * Authorization header for gated deployments, empty otherwise
 */
export function buildTeiHeaders(config: TeiClientConfig): Record<string, string> {
  return config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : {};
}
