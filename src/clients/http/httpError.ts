/**
 * HttpError class: non-2xx responses with status, URL and Retry-After
 */

import type { HttpErrorDetails } from "@/types";

/**
 * Retry-After as milliseconds: delay-seconds or an HTTP-date in the future
 *
 * @returns null when missing, unparseable or already past
 */
export function parseRetryAfter(
  retryAfterHeader: string | undefined,
  now: number = Date.now(),
): number | null {
  if (!retryAfterHeader) {
    return null;
  }

  const seconds = parseInt(retryAfterHeader, 10);
  if (!isNaN(seconds) && seconds > 0) {
    return seconds * 1000;
  }

  const date = new Date(retryAfterHeader);
  if (!isNaN(date.getTime())) {
    const delayMs = date.getTime() - now;
    return delayMs > 0 ? delayMs : null;
  }

  return null;
}

export class HttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly bodySnippet?: string;
  /** Raw Retry-After header of the response */
  public readonly retryAfter?: string;

  constructor(details: HttpErrorDetails) {
    const snippet = details.bodySnippet ? ` - ${details.bodySnippet}` : "";
    super(`HTTP ${details.status} ${details.statusText} - ${details.url}${snippet}`);
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
    this.retryAfter = details.retryAfter;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HttpError);
    }
  }

  /**
   * Server-requested wait before the next attempt, if any
   */
  retryAfterMs(now: number = Date.now()): number | null {
    return parseRetryAfter(this.retryAfter, now);
  }
}
