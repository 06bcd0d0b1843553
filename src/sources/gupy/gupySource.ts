/**
 * GupySource: adapter for the Gupy public job search API
 *
 * Offset pagination over portal.api.gupy.io, client-side location filter,
 * per-run URL dedupe, optional job page fetch for missing descriptions.
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
import {
  GUPY_API_SEARCH_URL,
  GUPY_DEFAULT_CURRENCY,
  GUPY_DESCRIPTION_SELECTORS,
  GUPY_MAX_PAGES,
  GUPY_MAX_PAGE_SIZE,
} from "@/constants/clients/gupy";
import { MS_PER_HOUR, VERBOSITY_LOG_LEVELS } from "@/constants";
import { SourceError } from "@/errors";
import { parsePostedAt } from "@/normalization/dates";
import { fetchJobDescription, paginate } from "@/sources/shared";
import { withContext } from "@/logger";
import {
  isGupyBlockedBody,
  isGupyJobItem,
  isGupyListResponse,
  mapGupyJobToRaw,
  matchesGupyLocation,
} from "./mappers";

export interface GupySourceConfig {
  /** Reference clock for the age cutoff (tests pin it) */
  now?: () => Date;
  maxPages?: number;
}

export class GupySource implements SourceAdapter {
  readonly site: SiteId = "gupy";
  readonly ordering: PostingOrder = "unordered";
  readonly salaryExtraction: SalaryExtractionPolicy = {
    enabled: true,
    defaultCurrency: GUPY_DEFAULT_CURRENCY,
  };

  private readonly now: () => Date;
  private readonly maxPages: number;

  constructor(config?: GupySourceConfig) {
    this.now = config?.now ?? (() => new Date());
    this.maxPages = config?.maxPages ?? GUPY_MAX_PAGES;
  }

  async fetch(spec: SearchSpec, session: SourceSession): Promise<RawSourceResult> {
    const log = withContext({ site: this.site }, VERBOSITY_LOG_LEVELS[spec.verbose]);
    const now = this.now();
    const limit = Math.min(GUPY_MAX_PAGE_SIZE, spec.resultsWanted);
    const seenUrls = new Set<string>();

    log.debug("Starting Gupy search", {
      searchTerm: spec.searchTerm,
      location: spec.location,
      limit,
      maxPages: this.maxPages,
    });

    const result = await paginate<RawJobPosting>({
      site: this.site,
      signal: session.signal,
      maxPages: this.maxPages,
      resultsWanted: spec.resultsWanted,
      ordering: this.ordering,
      cutoff: spec.hoursOld ? new Date(now.getTime() - spec.hoursOld * MS_PER_HOUR) : undefined,
      fetchPage: (page) => this.fetchPage(session, spec.searchTerm, (page - 1) * limit, limit),
      postedAt: (posting) => parsePostedAt(posting.postedAt, now),
      keep: (posting) => {
        if (seenUrls.has(posting.jobUrl)) return false;
        if (!matchesGupyLocation(posting, spec.location)) return false;
        seenUrls.add(posting.jobUrl);
        return true;
      },
      logger: log,
    });

    const records = spec.fetchDescription
      ? await this.fillDescriptions(result.items, session, log)
      : result.items;

    log.info("Gupy search finished", {
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
    searchTerm: string,
    offset: number,
    limit: number,
  ): Promise<PageResult<RawJobPosting>> {
    const body = await session.request<unknown>({
      method: "GET",
      url: GUPY_API_SEARCH_URL,
      query: { jobName: searchTerm, limit, offset },
      headers: { Accept: "application/json" },
      responseType: "json",
      isBlockedBody: isGupyBlockedBody,
    });

    if (!isGupyListResponse(body)) {
      throw new SourceError(
        this.site,
        "SourceParseError",
        `response at offset ${offset} has no data array`,
      );
    }

    const items = body.data
      .filter(isGupyJobItem)
      .map(mapGupyJobToRaw)
      .filter((posting): posting is RawJobPosting => posting !== null);

    const total = body.pagination?.total;
    const hasMore =
      body.data.length >= limit && (total === undefined || offset + body.data.length < total);

    return { items, hasMore };
  }

  /**
   * Fetch job pages for postings the API returned without a description
   */
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
        GUPY_DESCRIPTION_SELECTORS,
        log,
      );
      filled.push(html ? { ...posting, description: { content: html, format: "html" } } : posting);
    }

    return filled;
  }
}
