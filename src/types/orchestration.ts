/**
 * Orchestration and aggregate result type definitions
 */

import type { CanonicalRecord, JobType } from "./jobs";
import type { SiteId } from "./search";
import type { ProxyUsage } from "./session";
import type { RawSourceResult, SourceFailure } from "./sources";

/**
 * Run state machine: pending -> running -> completed | partially_failed.
 * "failed" is reported only by outer layers (AllSourcesFailed is thrown).
 */
export type RunStatus =
  | "pending"
  | "running"
  | "completed"
  | "partially_failed"
  | "failed";

/**
 * Terminal status of a single source task
 *
 * - ok: fetched without failure
 * - partial: some records fetched, then a failure
 * - failed: failure without usable records
 * - timeout: still running at the deadline (records discarded)
 */
export type SourceTaskStatus = "ok" | "partial" | "failed" | "timeout";

/**
 * Terminal outcome of one source task, handed to the aggregator by value
 */
export type SourceTaskOutcome = {
  site: SiteId;
  status: SourceTaskStatus;
  raw: RawSourceResult;
  elapsedMs: number;
  proxyUsage: ProxyUsage;
};

export type SourceStats = {
  site: SiteId;
  status: SourceTaskStatus;
  /** Raw records returned by the source */
  fetched: number;
  /** Records of this source present in the final output */
  kept: number;
  pagesFetched: number;
  elapsedMs: number;
  failure?: SourceFailure;
};

export type AggregateStats = {
  totalJobs: number;
  jobsBySite: Partial<Record<SiteId, number>>;
  jobTypes: Partial<Record<JobType, number>>;
  duplicatesRemoved: number;
  truncated: number;
  sources: SourceStats[];
  totalElapsedMs: number;
  proxy: ProxyUsage;
};

/**
 * Final output of one invocation (frozen)
 */
export type AggregateResult = {
  readonly status: RunStatus;
  readonly records: readonly CanonicalRecord[];
  readonly stats: AggregateStats;
};

/**
 * Core contract result: aggregate plus per-source failure list
 */
export type SearchRunResult = {
  status: RunStatus;
  result: AggregateResult;
  failures: SourceFailure[];
};
