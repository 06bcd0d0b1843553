/**
 * WellfoundSource: adapter scraping Wellfound role search pages
 *
 * Page-number pagination over /role/l/{role}/{location} (or
 * /remote/{role}-jobs), listings from __NEXT_DATA__ or job anchors,
 * optional job page fetch for descriptions.
 */

import type { SourceAdapter, SourceSession } from "@/interfaces";
import type {
  Logger,
  PageResult,
  PostingOrder,
  RawJobPosting,
  RawSourceResult,
  SalaryExtractionPolicy,
  SearchSpec,
  SiteId,
} from "@/types";
import type { WellfoundSearchPage } from "@/types/clients/wellfound";
import {
  WELLFOUND_BASE_URL,
  WELLFOUND_DESCRIPTION_SELECTORS,
  WELLFOUND_MAX_PAGES,
  WELLFOUND_RESULTS_PER_PAGE,
} from "@/constants/clients/wellfound";
import { MS_PER_HOUR, VERBOSITY_LOG_LEVELS } from "@/constants";
import { SourceError } from "@/errors";
import { parsePostedAt } from "@/normalization/dates";
import { fetchJobDescription, paginate } from "@/sources/shared";
import { withContext } from "@/logger";
import { buildSearchUrl } from "./urls";
import { hidesListings, isBlockedPage, parseSearchPage } from "./parsing";
import { mapWellfoundListingToRaw } from "./mappers";

export interface WellfoundSourceConfig {
  /** Reference clock for relative dates and the age cutoff */
  now?: () => Date;
  maxPages?: number;
}

function isBlockedBody(body: unknown): boolean {
  return typeof body === "string" && isBlockedPage(body);
}

export class WellfoundSource implements SourceAdapter {
  readonly site: SiteId = "wellfound";
  readonly ordering: PostingOrder = "unordered";
  readonly salaryExtraction: SalaryExtractionPolicy = { enabled: true };

  private readonly now: () => Date;
  private readonly maxPages: number;

  constructor(config?: WellfoundSourceConfig) {
    this.now = config?.now ?? (() => new Date());
    this.maxPages = config?.maxPages ?? WELLFOUND_MAX_PAGES;
  }

  async fetch(spec: SearchSpec, session: SourceSession): Promise<RawSourceResult> {
    const log = withContext({ site: this.site }, VERBOSITY_LOG_LEVELS[spec.verbose]);
    const now = this.now();
    const seenUrls = new Set<string>();

    log.debug("Starting Wellfound search", {
      url: buildSearchUrl(spec.searchTerm, spec.location, 1),
      maxPages: this.maxPages,
    });

    const result = await paginate<RawJobPosting>({
      site: this.site,
      signal: session.signal,
      maxPages: this.maxPages,
      resultsWanted: spec.resultsWanted,
      ordering: this.ordering,
      cutoff: spec.hoursOld ? new Date(now.getTime() - spec.hoursOld * MS_PER_HOUR) : undefined,
      fetchPage: (page) => this.fetchPage(session, spec, page),
      postedAt: (posting) => parsePostedAt(posting.postedAt, now),
      keep: (posting) => {
        if (seenUrls.has(posting.jobUrl)) return false;
        seenUrls.add(posting.jobUrl);
        return true;
      },
      logger: log,
    });

    const records = spec.fetchDescription
      ? await this.fillDescriptions(result.items, session, log)
      : result.items;

    log.info("Wellfound search finished", {
      records: records.length,
      pagesFetched: result.pagesFetched,
      stopReason: result.stopReason,
    });

    return {
      site: this.site,
      records,
      pagesFetched: result.pagesFetched,
      stopReason: result.stopReason,
      ...(result.failure ? { failure: result.failure } : {}),
    };
  }

  private async fetchPage(
    session: SourceSession,
    spec: SearchSpec,
    page: number,
  ): Promise<PageResult<RawJobPosting>> {
    const url = buildSearchUrl(spec.searchTerm, spec.location, page);
    // Parsed by the detector so the session can rotate on hidden listings
    const parsedPages = new Map<string, WellfoundSearchPage>();
    const body = await session.request<unknown>({
      method: "GET",
      url,
      responseType: "text",
      isBlockedBody: (candidate) => {
        if (typeof candidate !== "string") return false;
        if (isBlockedPage(candidate)) return true;
        const parsed = parseSearchPage(candidate, WELLFOUND_BASE_URL);
        parsedPages.set(candidate, parsed);
        return hidesListings(parsed);
      },
    });

    if (typeof body !== "string") {
      throw new SourceError(this.site, "SourceParseError", `non-HTML response from ${url}`);
    }

    const parsed = parsedPages.get(body) ?? parseSearchPage(body, WELLFOUND_BASE_URL);

    let hasMore: boolean | undefined;
    if (parsed.pageInfo) {
      hasMore = parsed.pageInfo.currentPage < parsed.pageInfo.totalPages;
    } else if (parsed.totalResults !== undefined) {
      hasMore = page * WELLFOUND_RESULTS_PER_PAGE < parsed.totalResults;
    }

    return {
      items: parsed.listings.map(mapWellfoundListingToRaw),
      ...(hasMore !== undefined ? { hasMore } : {}),
    };
  }

  private async fillDescriptions(
    postings: RawJobPosting[],
    session: SourceSession,
    log: Logger,
  ): Promise<RawJobPosting[]> {
    const filled: RawJobPosting[] = [];

    for (const posting of postings) {
      if (posting.description) {
        filled.push(posting);
        continue;
      }
      const html = await fetchJobDescription(
        session,
        posting.jobUrl,
        WELLFOUND_DESCRIPTION_SELECTORS,
        log,
        isBlockedBody,
      );
      filled.push(html ? { ...posting, description: { content: html, format: "html" } } : posting);
    }

    return filled;
  }
}
