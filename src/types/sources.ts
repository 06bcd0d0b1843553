/**
 * Source adapter result and failure type definitions
 */

import type { RawJobPosting } from "./jobs";
import type { SiteId } from "./search";

/**
 * Per-source failure kinds; none of them abort the overall run
 */
export type SourceErrorKind =
  | "SourceBlocked"
  | "SourceTimeout"
  | "SourceNetworkError"
  | "SourceParseError";

/**
 * Failure attached to a source's result
 */
export type SourceFailure = {
  site: SiteId;
  kind: SourceErrorKind;
  message: string;
};

/**
 * Whether the source guarantees newest-first ordering.
 * Only newest-first sources may stop early on the age cutoff.
 */
export type PostingOrder = "newest-first" | "unordered";

/**
 * Salary extraction policy of a source
 */
export type SalaryExtractionPolicy = {
  /** Whether free-text extraction is reliable for this source */
  enabled: boolean;
  /** Currency assumed by the interval-keyword tier (no explicit currency) */
  defaultCurrency?: string;
};

/**
 * Why pagination stopped
 */
export type PaginationStopReason =
  | "results-wanted"
  | "empty-page"
  | "age-cutoff"
  | "page-limit"
  | "last-page"
  | "error";

/**
 * Per-source payload before normalization
 * Owned exclusively by the orchestrator task that produced it.
 */
export type RawSourceResult = {
  site: SiteId;
  records: RawJobPosting[];
  /** Set when the fetch was partial or failed */
  failure?: SourceFailure;
  pagesFetched: number;
  stopReason?: PaginationStopReason;
};

/**
 * One fetched page as seen by the shared pagination loop
 */
export type PageResult<T> = {
  items: T[];
  /** False when the source reports this was the last page */
  hasMore?: boolean;
};
