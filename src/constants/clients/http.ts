/**
 * HTTP transport constants: timeouts, retry defaults, error snippets
 */

/**
 * Per-attempt request timeout (30 seconds)
 */
export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

/**
 * Headers sent with JSON request bodies
 */
export const DEFAULT_JSON_HEADERS: Record<string, string> = {
  "Content-Type": "application/json",
  Accept: "application/json",
};

/**
 * Maximum length of the response body kept on HttpError
 */
export const ERROR_BODY_SNIPPET_MAX_LENGTH = 200;

/**
 * Attempts for standalone httpRequest calls (1 initial + 2 retries).
 * Source traffic goes through ProxySession, which runs single attempts
 * and owns its own retry/rotation loop.
 */
export const DEFAULT_MAX_ATTEMPTS = 3;

/**
 * Base delay for exponential backoff (~1s, ~2s with jitter)
 */
export const DEFAULT_BASE_DELAY_MS = 1_000;

export const DEFAULT_MAX_DELAY_MS = 30_000;

/**
 * Upper bound applied to a server-provided Retry-After
 */
export const DEFAULT_MAX_RETRY_AFTER_MS = 60_000;

/**
 * Idempotent methods that may be retried
 */
export const RETRYABLE_HTTP_METHODS: readonly string[] = ["GET", "HEAD"];

/**
 * 408, 429 and 5xx are worth another attempt
 */
export const RETRYABLE_STATUS_CODES: readonly number[] = [408, 429, 500, 502, 503, 504];
