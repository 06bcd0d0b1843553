/**
 * Mock HTTP Harness for Offline Tests
 *
 * Provides a controllable HTTP mock that:
 * - Returns fixture bodies for registered routes
 * - Throws loudly on unmocked requests (prevents accidental real calls)
 * - Supports basic method+url matching (query params ignored)
 *
 * Two entry points share the same routes:
 * - request: drop-in for httpRequest (non-2xx replies throw HttpError)
 * - session(site): a SourceSession for adapters (non-2xx replies and
 *   blocked bodies throw SourceError the way ProxySession surfaces them)
 *
 * Usage:
 *   const mock = createMockHttp();
 *   mock.on("GET", "https://portal.api.gupy.io/api/job", fixtureData);
 *   const result = await new GupySource().fetch(spec, mock.session("gupy"));
 */

import type { HttpRequest, SessionRequest, SiteId } from "@/types";
import type { SourceSession } from "@/interfaces";
import { HttpError } from "@/clients/http";
import { SourceError } from "@/errors";
import { readFileSync } from "fs";
import { join } from "path";

type RouteKey = string; // "METHOD URL"
type MockRequest = HttpRequest | SessionRequest;
type RouteHandler = (req: MockRequest) => Promise<unknown>;

type MockHttpReply = {
  __mockHttpReply: true;
  status: number;
  body: unknown;
  retryAfter?: string;
};

function asReply(input: { status: number; body: unknown; retryAfter?: string }): MockHttpReply {
  return {
    __mockHttpReply: true,
    status: input.status,
    body: input.body,
    retryAfter: input.retryAfter,
  };
}

function isReply(value: unknown): value is MockHttpReply {
  return (
    typeof value === "object" &&
    value !== null &&
    "__mockHttpReply" in value &&
    value.__mockHttpReply === true &&
    "status" in value &&
    typeof value.status === "number"
  );
}

/**
 * Mock HTTP client for testing
 */
export interface MockHttp {
  /**
   * Register a 200 response for a given method+url
   */
  on(method: string, url: string, response: unknown): void;

  /**
   * Register a response with explicit status/body
   */
  onResponse(
    method: string,
    url: string,
    response: { status: number; body: unknown; retryAfter?: string },
  ): void;

  /**
   * Register a custom handler for a given method+url
   */
  onCustom(method: string, url: string, handler: RouteHandler): void;

  /**
   * Mock httpRequest function (inject into clients)
   */
  request: <T>(req: HttpRequest) => Promise<T>;

  /**
   * Source session backed by the same routes
   */
  session(site: SiteId, signal?: AbortSignal): SourceSession;

  /**
   * Get recorded requests (for debugging/assertions)
   */
  getRecordedRequests(): MockRequest[];

  /**
   * Clear all mocks and recorded requests
   */
  reset(): void;
}

/**
 * Load fixture content from tests/fixtures as UTF-8 text
 *
 * @param relativePath - Path relative to tests/fixtures (e.g. "wellfound/search_page.html")
 */
export function loadFixtureText(relativePath: string): string {
  const fullPath = join(process.cwd(), "tests", "fixtures", relativePath);
  return readFileSync(fullPath, "utf-8");
}

/**
 * Build route key from method and URL (ignores query params)
 */
function buildRouteKey(method: string, url: string): RouteKey {
  const urlWithoutQuery = url.split("?")[0];
  return `${method.toUpperCase()} ${urlWithoutQuery}`;
}

/**
 * Create a mock HTTP client
 */
export function createMockHttp(): MockHttp {
  const routes = new Map<RouteKey, RouteHandler>();
  const recordedRequests: MockRequest[] = [];

  const on = (method: string, url: string, response: unknown): void => {
    routes.set(buildRouteKey(method, url), async () => asReply({ status: 200, body: response }));
  };

  const onResponse = (
    method: string,
    url: string,
    response: { status: number; body: unknown; retryAfter?: string },
  ): void => {
    routes.set(buildRouteKey(method, url), async () => asReply(response));
  };

  const onCustom = (method: string, url: string, handler: RouteHandler): void => {
    routes.set(buildRouteKey(method, url), handler);
  };

  /**
   * Record, match and resolve a request to a reply
   */
  const dispatch = async (req: MockRequest): Promise<MockHttpReply> => {
    recordedRequests.push({ ...req });

    const key = buildRouteKey(req.method, req.url);
    const handler = routes.get(key);

    if (!handler) {
      throw new Error(
        `[MockHttp] Unmocked request: ${key}\n` +
          `All HTTP requests must be explicitly mocked to prevent accidental network calls.\n` +
          `Available routes: ${Array.from(routes.keys()).join(", ") || "(none)"}`,
      );
    }

    const response = await handler(req);
    // Custom handlers may return a bare body
    return isReply(response) ? response : asReply({ status: 200, body: response });
  };

  const toHttpError = (req: MockRequest, reply: MockHttpReply): HttpError =>
    new HttpError({
      status: reply.status,
      statusText: "Mock Response",
      url: req.url,
      bodySnippet: typeof reply.body === "string" ? reply.body : JSON.stringify(reply.body),
      retryAfter: reply.retryAfter,
    });

  const request = async <T>(req: HttpRequest): Promise<T> => {
    const reply = await dispatch(req);
    if (reply.status >= 200 && reply.status < 300) {
      return reply.body as T;
    }
    throw toHttpError(req, reply);
  };

  const session = (site: SiteId, signal: AbortSignal = new AbortController().signal): SourceSession => ({
    site,
    signal,
    request: async <T>(req: SessionRequest): Promise<T> => {
      const reply = await dispatch(req);
      if (reply.status === 403 || reply.status === 429) {
        throw new SourceError(site, "SourceBlocked", `HTTP ${reply.status} from ${req.url}`, {
          cause: toHttpError(req, reply),
        });
      }
      if (reply.status < 200 || reply.status >= 300) {
        throw new SourceError(site, "SourceNetworkError", `HTTP ${reply.status} from ${req.url}`, {
          cause: toHttpError(req, reply),
        });
      }
      if (req.isBlockedBody?.(reply.body)) {
        throw new SourceError(site, "SourceBlocked", `blocked page from ${req.url}`);
      }
      return reply.body as T;
    },
  });

  const getRecordedRequests = (): MockRequest[] => [...recordedRequests];

  const reset = (): void => {
    routes.clear();
    recordedRequests.length = 0;
  };

  return { on, onResponse, onCustom, request, session, getRecordedRequests, reset };
}
