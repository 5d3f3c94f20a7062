/**
 * Mock HTTP harness for offline client tests
 *
 * Provides a controllable HTTP mock that:
 * - Returns canned JSON for registered routes
 * - Throws loudly on unmocked requests (prevents accidental real calls)
 * - Supports basic method+url matching
 *
 * Usage:
 *   const mock = createMockHttp();
 *   mock.on("POST", "http://tei.test/embed", [[1, 0]]);
 *   const client = new TeiEmbeddingClient({ baseUrl: "http://tei.test", httpRequest: mock.request });
 */

import type { HttpRequest } from "@/types";
import { HttpError } from "@/clients/http";

type RouteKey = string; // "METHOD URL"
type RouteHandler = (req: HttpRequest) => Promise<unknown>;

type MockHttpReply = {
  status: number;
  body: unknown;
};

export interface MockHttp {
  /**
   * Register a 200 response for a given method+url
   */
  on(method: string, url: string, response: unknown): void;

  /**
   * Register a response with an explicit status
   */
  onResponse(method: string, url: string, response: MockHttpReply): void;

  /**
   * Register a custom handler; its return value is the response body
   */
  onCustom(method: string, url: string, handler: RouteHandler): void;

  /**
   * Mock httpRequest function (inject into clients)
   */
  request: <T>(req: HttpRequest) => Promise<T>;

  /**
   * Get recorded requests (for assertions)
   */
  getRecordedRequests(): HttpRequest[];

  /**
   * Clear all mocks and recorded requests
   */
  reset(): void;
}

function buildRouteKey(method: string, url: string): RouteKey {
  const urlWithoutQuery = url.split("?")[0];
  return `${method.toUpperCase()} ${urlWithoutQuery}`;
}

export function createMockHttp(): MockHttp {
  const routes = new Map<RouteKey, (req: HttpRequest) => Promise<MockHttpReply>>();
  const recordedRequests: HttpRequest[] = [];

  const on = (method: string, url: string, response: unknown): void => {
    routes.set(buildRouteKey(method, url), async () => ({ status: 200, body: response }));
  };

  const onResponse = (method: string, url: string, response: MockHttpReply): void => {
    routes.set(buildRouteKey(method, url), async () => response);
  };

  const onCustom = (method: string, url: string, handler: RouteHandler): void => {
    routes.set(buildRouteKey(method, url), async (req) => ({
      status: 200,
      body: await handler(req),
    }));
  };

  const request = async <T>(req: HttpRequest): Promise<T> => {
    recordedRequests.push({ ...req });

    const key = buildRouteKey(req.method, req.url);
    const handler = routes.get(key);
    if (!handler) {
      throw new Error(
        `[MockHttp] Unmocked request: ${key}\n` +
          `Available routes: ${Array.from(routes.keys()).join(", ") || "(none)"}`,
      );
    }

    const response = await handler(req);
    if (response.status >= 200 && response.status < 300) {
      return response.body as T;
    }

    throw new HttpError({
      status: response.status,
      statusText: "Mock Response",
      url: req.url,
      bodySnippet:
        typeof response.body === "string" ? response.body : JSON.stringify(response.body),
    });
  };

  return {
    on,
    onResponse,
    onCustom,
    request,
    getRecordedRequests: () => [...recordedRequests],
    reset: () => {
      routes.clear();
      recordedRequests.length = 0;
    },
  };
}
