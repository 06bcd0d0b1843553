/**
 * HTTP client type definitions
 */

import type { Dispatcher } from "undici";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD";

/**
 * How the response body is decoded
 * - json: parse JSON when the content-type says so, otherwise return text
 * - text: always return the body as a string
 */
export type HttpResponseType = "json" | "text";

/**
 * Retry configuration for HTTP requests
 */
export interface HttpRetryConfig {
  /** Maximum number of attempts (including initial request). Default from constants. */
  maxAttempts?: number;
  /** Base delay in ms for exponential backoff. Default from constants. */
  baseDelayMs?: number;
  /** Maximum delay in ms between retries. Default from constants. */
  maxDelayMs?: number;
  /** Maximum time in ms to wait for Retry-After header. Default from constants. */
  maxRetryAfterMs?: number;
}

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean | Array<string | number | boolean>>;
  json?: unknown;
  timeoutMs?: number;
  retry?: HttpRetryConfig;
  responseType?: HttpResponseType;
  /** Caller cancellation; combined with the per-request timeout */
  signal?: AbortSignal;
  /** undici dispatcher (proxy agent or custom-CA agent) */
  dispatcher?: Dispatcher;
}

/**
 * HTTP request function type for dependency injection
 */
export type HttpRequestFn = <T>(req: HttpRequest) => Promise<T>;

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  /** Raw Retry-After header value, when present */
  retryAfter?: string;
}
