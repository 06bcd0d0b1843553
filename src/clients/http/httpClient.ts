/**
 * HTTP client wrapper: general-purpose client on undici fetch
 * Supports timeouts, caller cancellation, query params, proxy dispatchers,
 * retries with exponential backoff, and structured error handling
 */

import { fetch, type RequestInit, type Response } from "undici";
import type { HttpRequest } from "@/types/clients/http";
import { HttpError, parseRetryAfter } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JSON_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_MAX_RETRY_AFTER_MS,
  RETRYABLE_HTTP_METHODS,
  RETRYABLE_STATUS_CODES,
} from "@/constants/clients/http";
import { isAbortError, linkedTimeoutSignal, sleep } from "@/utils/async/abort";
import * as logger from "@/logger";

/**
 * Build URL with query parameters (supports arrays for repeated params)
 */
function buildUrl(
  baseUrl: string,
  query?: Record<string, string | number | boolean | Array<string | number | boolean>>,
): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  Object.entries(query).forEach(([key, value]) => {
    if (Array.isArray(value)) {
      // Append each array element as a repeated query param
      value.forEach((item) => url.searchParams.append(key, String(item)));
    } else {
      url.searchParams.append(key, String(value));
    }
  });

  return url.toString();
}

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(response: Response): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
      : text;
  } catch (err) {
    logger.debug("Could not read error response body", {
      url: response.url,
      error: err instanceof Error ? err.message : String(err),
    });
    return undefined;
  }
}

/**
 * Check if an HTTP status code warrants a retry
 */
export function isStatusRetryable(status: number): boolean {
  return RETRYABLE_STATUS_CODES.includes(status);
}

/**
 * Check if an error is retryable
 * Returns true for network errors, timeouts, and retryable HTTP status codes.
 * A caller abort is never retried.
 */
function isErrorRetryable(
  error: unknown,
  method: string,
  callerSignal?: AbortSignal,
): boolean {
  // Only retry idempotent methods
  if (!RETRYABLE_HTTP_METHODS.includes(method)) {
    return false;
  }

  if (callerSignal?.aborted) {
    return false;
  }

  // HttpError with retryable status
  if (error instanceof HttpError) {
    return isStatusRetryable(error.status);
  }

  // Timeouts (TimeoutError) and network failures (TypeError: fetch failed)
  if (error instanceof Error) {
    return isAbortError(error) || error.name === "TypeError";
  }

  return false;
}

/**
 * Compute exponential backoff delay with jitter
 * Formula: min(maxDelay, baseDelay * 2^(attempt-1)) * (0.5 + random(0.5))
 * Jitter reduces thundering herd problem
 */
export function computeBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = 0.5 + Math.random() * 0.5; // Random between 0.5 and 1.0
  return Math.floor(cappedDelay * jitter);
}

/**
 * Compute retry delay considering Retry-After header and exponential backoff
 */
function computeRetryDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  maxRetryAfterMs: number,
  retryAfterHeader: string | undefined,
): number {
  // Check for Retry-After header
  const retryAfterMs = parseRetryAfter(retryAfterHeader);
  if (retryAfterMs !== null) {
    // Respect Retry-After but clamp to max
    return Math.min(retryAfterMs, maxRetryAfterMs);
  }

  // Fall back to exponential backoff with jitter
  return computeBackoffDelay(attempt, baseDelayMs, maxDelayMs);
}

function isJsonContentType(contentType: string | null): boolean {
  return (
    contentType !== null &&
    (contentType.includes("application/json") || contentType.includes("+json"))
  );
}

/**
 * Perform a single HTTP request attempt (no retries)
 *
 * Resolves to the decoded body: parsed JSON for JSON responses when
 * responseType is "json", the raw text otherwise, undefined on 204.
 */
async function performRequest(
  req: HttpRequest,
  url: string,
  timeoutMs: number,
): Promise<unknown> {
  const { signal, dispose } = linkedTimeoutSignal(timeoutMs, req.signal);

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
      signal,
    };

    if (req.json !== undefined) {
      options.body = JSON.stringify(req.json);
    }

    if (req.dispatcher) {
      options.dispatcher = req.dispatcher;
    }

    const response = await fetch(url, options);

    // Check for HTTP errors (non-2xx)
    if (!response.ok) {
      const bodySnippet = await extractBodySnippet(response);
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet,
        retryAfter: response.headers.get("retry-after") ?? undefined,
      });
    }

    // Handle 204 No Content
    if (response.status === 204) {
      return undefined;
    }

    const text = await response.text();
    const contentType = response.headers.get("content-type");

    if ((req.responseType ?? "json") === "text" || !isJsonContentType(contentType)) {
      if ((req.responseType ?? "json") === "json") {
        logger.debug("Non-JSON response received", {
          method: req.method,
          url,
          status: response.status,
          contentType: contentType ?? "none",
        });
      }
      // Return text content, let caller handle it
      return text;
    }

    try {
      const data: unknown = JSON.parse(text);
      return data;
    } catch (parseError) {
      logger.warn("JSON parse failed", {
        method: req.method,
        url,
        status: response.status,
        error: parseError instanceof Error ? parseError.message : String(parseError),
      });
      // Hand back the text so callers can tell a broken body from an empty one
      return text;
    }
  } finally {
    dispose();
  }
}

/**
 * Perform an HTTP request with timeout, retries, and error handling
 *
 * Retries are only performed for idempotent methods (GET, HEAD) on:
 * - Network errors (no response received)
 * - Timeout errors
 * - HTTP 408 (Request Timeout)
 * - HTTP 429 (Too Many Requests) - respects Retry-After header
 * - HTTP 5xx (Server errors)
 *
 * Uses exponential backoff with jitter to avoid thundering herd.
 * Waits between attempts abort with `req.signal`.
 *
 * The type parameter is the caller's expectation of the body shape; callers
 * receiving untrusted payloads should request `unknown` and validate.
 *
 * @throws {HttpError} On non-2xx status codes (after all retries exhausted)
 * @throws {Error} On network errors, timeouts or caller abort
 */
export function httpRequest<T>(req: HttpRequest): Promise<T>;
export async function httpRequest(req: HttpRequest): Promise<unknown> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const url = buildUrl(req.url, req.query);

  // Retry configuration with defaults
  const maxAttempts = req.retry?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const baseDelayMs = req.retry?.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const maxDelayMs = req.retry?.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const maxRetryAfterMs = req.retry?.maxRetryAfterMs ?? DEFAULT_MAX_RETRY_AFTER_MS;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await performRequest(req, url, timeoutMs);
    } catch (error) {
      lastError = error;

      // Don't retry if this is the last attempt
      if (attempt >= maxAttempts) {
        break;
      }

      // Check if error is retryable
      if (!isErrorRetryable(error, req.method, req.signal)) {
        throw error;
      }

      // Retry-After is only meaningful on 429 and 503
      const retryAfterHeader =
        error instanceof HttpError && (error.status === 429 || error.status === 503)
          ? error.retryAfter
          : undefined;

      // Compute delay before next retry
      const delayMs = computeRetryDelay(
        attempt,
        baseDelayMs,
        maxDelayMs,
        maxRetryAfterMs,
        retryAfterHeader,
      );

      logger.debug("Retrying HTTP request", {
        method: req.method,
        url: req.url,
        attempt,
        maxAttempts,
        delayMs,
        reason:
          error instanceof HttpError
            ? `status ${error.status}`
            : error instanceof Error
              ? error.name
              : "unknown",
      });

      // Wait before retrying
      await sleep(delayMs, req.signal);
    }
  }

  // All retries exhausted, throw the last error
  throw lastError;
}
