/**
 * Shared pagination loop for source adapters
 *
 * Stops on: results wanted reached, empty page, page limit, last page
 * reported by the source, or (newest-first sources only) the age cutoff.
 * A page failure ends the loop and is reported alongside the items
 * gathered so far; an abort of the session signal propagates.
 */

import type {
  Logger,
  PageResult,
  PaginationStopReason,
  PostingOrder,
  SiteId,
  SourceFailure,
} from "@/types";
import { toSourceFailure } from "@/errors";

export type PaginateOptions<T> = {
  site: SiteId;
  signal: AbortSignal;
  maxPages: number;
  resultsWanted: number;
  ordering: PostingOrder;
  /** Postings older than this are dropped */
  cutoff?: Date;
  /** Page numbers start at 1 */
  fetchPage: (page: number) => Promise<PageResult<T>>;
  /** Posting time of an item, when known */
  postedAt: (item: T) => Date | undefined;
  /** Source-side filter (location, duplicates); rejected items do not count */
  keep?: (item: T) => boolean;
  logger: Logger;
};

export type PaginateResult<T> = {
  items: T[];
  pagesFetched: number;
  stopReason: PaginationStopReason;
  failure?: SourceFailure;
};

export async function paginate<T>(options: PaginateOptions<T>): Promise<PaginateResult<T>> {
  const { site, signal, maxPages, resultsWanted, ordering, cutoff, logger } = options;
  const items: T[] = [];
  let pagesFetched = 0;

  for (let page = 1; page <= maxPages; page++) {
    let result: PageResult<T>;
    try {
      result = await options.fetchPage(page);
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      const failure = toSourceFailure(site, error);
      logger.warn("Page fetch failed, stopping pagination", {
        page,
        kind: failure.kind,
        error: failure.message,
        pagesFetched,
        itemsFetched: items.length,
      });
      return { items, pagesFetched, stopReason: "error", failure };
    }

    pagesFetched++;

    if (result.items.length === 0) {
      logger.debug("Empty page, stopping pagination", { page });
      return { items, pagesFetched, stopReason: "empty-page" };
    }

    let crossedCutoff = false;
    for (const item of result.items) {
      const posted = options.postedAt(item);
      if (cutoff && posted && posted.getTime() < cutoff.getTime()) {
        crossedCutoff = true;
        continue;
      }
      if (options.keep && !options.keep(item)) {
        continue;
      }
      items.push(item);
      if (items.length >= resultsWanted) {
        logger.debug("Reached results wanted, stopping pagination", {
          page,
          itemsFetched: items.length,
        });
        return { items, pagesFetched, stopReason: "results-wanted" };
      }
    }

    if (crossedCutoff && ordering === "newest-first") {
      logger.debug("Crossed age cutoff, stopping pagination", { page });
      return { items, pagesFetched, stopReason: "age-cutoff" };
    }

    if (result.hasMore === false) {
      logger.debug("Source reported last page, stopping pagination", { page });
      return { items, pagesFetched, stopReason: "last-page" };
    }
  }

  return { items, pagesFetched, stopReason: "page-limit" };
}
