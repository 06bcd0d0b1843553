/**
 * Proxy/rate session constants: rotation, cooldown and pacing defaults
 */

/**
 * Attempts per logical request (1 initial + 2 retries)
 */
export const DEFAULT_SESSION_MAX_ATTEMPTS = 3;

/**
 * Consecutive blocked responses on one identity before it is cooled down
 */
export const DEFAULT_BLOCK_THRESHOLD = 1;

/**
 * First cooldown window; doubles with each strike on the same identity
 */
export const DEFAULT_BASE_COOLDOWN_MS = 30_000;

export const DEFAULT_MAX_COOLDOWN_MS = 300_000;

/**
 * Fixed delay between requests when no proxies are configured
 */
export const DEFAULT_DIRECT_DELAY_MS = 1_000;

/**
 * Base delay for transient-failure backoff (timeouts, 5xx, network)
 */
export const DEFAULT_RETRY_BASE_DELAY_MS = 1_000;

export const DEFAULT_RETRY_MAX_DELAY_MS = 15_000;

/**
 * Statuses treated as anti-automation blocks
 */
export const BLOCKED_STATUS_CODES: readonly number[] = [403];

/**
 * Statuses treated as rate limiting
 */
export const RATE_LIMIT_STATUS_CODES: readonly number[] = [429];

/**
 * Proxy URI schemes the dispatcher can tunnel through
 */
export const SUPPORTED_PROXY_PROTOCOLS: readonly string[] = ["http:", "https:"];

/**
 * Headers mimicking a desktop browser
 */
export const BROWSER_HEADERS: Record<string, string> = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  Accept:
    "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9",
  DNT: "1",
  "Upgrade-Insecure-Requests": "1",
  "Sec-Fetch-Dest": "document",
  "Sec-Fetch-Mode": "navigate",
  "Sec-Fetch-Site": "none",
  "Sec-Fetch-User": "?1",
  "Cache-Control": "max-age=0",
};
