/**
 * Secondary description fetch: job page HTML to description fragment
 */

import { load } from "cheerio";
import type { Logger } from "@/types";
import type { SourceSession } from "@/interfaces";

/**
 * Extract the first non-empty container matching the selectors, as HTML
 */
export function extractDescriptionHtml(
  html: string,
  selectors: readonly string[],
): string | undefined {
  const $ = load(html);
  for (const selector of selectors) {
    const node = $(selector).first();
    if (node.length > 0 && node.text().trim().length > 0) {
      const inner = node.html();
      if (inner && inner.trim()) {
        return inner.trim();
      }
    }
  }
  return undefined;
}

/**
 * Fetch a job page and extract its description
 *
 * Failures are logged and yield undefined; the posting is kept without a
 * description. An abort of the session signal propagates.
 */
export async function fetchJobDescription(
  session: SourceSession,
  url: string,
  selectors: readonly string[],
  logger: Logger,
  isBlockedBody?: (body: unknown) => boolean,
): Promise<string | undefined> {
  try {
    const html = await session.request<unknown>({
      method: "GET",
      url,
      responseType: "text",
      isBlockedBody,
    });
    return typeof html === "string" ? extractDescriptionHtml(html, selectors) : undefined;
  } catch (error) {
    if (session.signal.aborted) {
      throw error;
    }
    logger.debug("Description fetch failed, keeping posting without it", {
      url,
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}
