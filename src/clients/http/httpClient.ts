/**
 * HTTP client wrapper — JSON client over native fetch
 * Supports per-request timeouts and structured error handling.
 *
 * No retries: a failed capability call fails the recommendation call, and
 * the caller decides whether to run it again.
 */

import type { HttpRequest } from "@/types";
import { HttpError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JSON_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
} from "@/constants/clients/http";
import * as logger from "@/logger";

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(response: Response): Promise<string | undefined> {
  const text = await response.text().catch(() => "");
  if (!text) {
    return undefined;
  }
  return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
    ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
    : text;
}

/**
 * Perform an HTTP request with a timeout and parse the JSON response
 *
 * @template T - Expected response type (the caller validates the shape)
 * @param req - HTTP request configuration
 * @returns Parsed JSON response
 * @throws {HttpError} On non-2xx status codes
 * @throws {Error} On network errors, timeouts (AbortError) or non-JSON bodies
 */
export async function httpRequest<T>(req: HttpRequest): Promise<T> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;

  // Setup timeout using AbortController
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    // Build headers - defaults first, caller headers override
    const headers: Record<string, string> = {};
    if (req.json !== undefined) {
      Object.assign(headers, DEFAULT_JSON_HEADERS);
    }
    Object.assign(headers, req.headers);

    const options: RequestInit = {
      method: req.method,
      headers,
      signal: controller.signal,
    };
    if (req.json !== undefined) {
      options.body = JSON.stringify(req.json);
    }

    const response = await fetch(req.url, options);

    if (!response.ok) {
      const bodySnippet = await extractBodySnippet(response);
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url: req.url,
        bodySnippet,
      });
    }

    const contentType = response.headers.get("content-type") ?? "";
    if (!contentType.includes("application/json") && !contentType.includes("+json")) {
      logger.warn("Non-JSON response received", {
        method: req.method,
        url: req.url,
        status: response.status,
        contentType: contentType || "none",
      });
      throw new Error(`Expected a JSON response from ${req.url}, got ${contentType || "no content type"}`);
    }

    return (await response.json()) as T;
  } finally {
    clearTimeout(timeoutId);
  }
}
