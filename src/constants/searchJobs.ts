/**
 * Background search job constants
 */

/**
 * Bounded delivery timeout for webhook callbacks
 */
export const WEBHOOK_TIMEOUT_MS = 10_000;

/**
 * Maximum length of stored error messages
 */
export const JOB_ERROR_MAX_LENGTH = 500;

/**
 * User-Agent sent with webhook callbacks
 */
export const WEBHOOK_USER_AGENT = "job-board-aggregator-callback/1.0";
