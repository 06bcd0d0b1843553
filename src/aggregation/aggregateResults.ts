/**
 * Result aggregator: normalize, merge, dedupe, sort, truncate, stats
 */

import type {
  AggregateResult,
  AggregateStats,
  CanonicalRecord,
  ProxyUsage,
  RunStatus,
  SalaryExtractionPolicy,
  SearchSpec,
  SiteId,
  SourceStats,
  SourceTaskOutcome,
} from "@/types";
import { normalizeRecord } from "@/normalization";
import { dedupeRecords } from "./dedupe";

export type AggregateInput = {
  spec: SearchSpec;
  /** One outcome per requested source, in requested order */
  outcomes: readonly SourceTaskOutcome[];
  status: RunStatus;
  salaryPolicies: Partial<Record<SiteId, SalaryExtractionPolicy>>;
  totalElapsedMs: number;
  /** Reference time for relative posting dates */
  now: Date;
};

const NO_SALARY_EXTRACTION: SalaryExtractionPolicy = { enabled: false };

/**
 * Site id ascending, then newest first, postings without a date last.
 * Array.prototype.sort is stable, so ties keep merge order.
 */
export function compareRecords(a: CanonicalRecord, b: CanonicalRecord): number {
  if (a.site !== b.site) {
    return a.site < b.site ? -1 : 1;
  }
  const at = a.postedAt?.getTime();
  const bt = b.postedAt?.getTime();
  if (at === undefined && bt === undefined) return 0;
  if (at === undefined) return 1;
  if (bt === undefined) return -1;
  return bt - at;
}

/**
 * Sum per-task proxy counters
 */
export function combineProxyUsage(usages: readonly ProxyUsage[]): ProxyUsage {
  return usages.reduce<ProxyUsage>(
    (total, usage) => ({
      enabled: total.enabled || usage.enabled,
      poolSize: Math.max(total.poolSize, usage.poolSize),
      requests: total.requests + usage.requests,
      rotations: total.rotations + usage.rotations,
      blockedResponses: total.blockedResponses + usage.blockedResponses,
      rateLimitedResponses: total.rateLimitedResponses + usage.rateLimitedResponses,
      identitiesUsed: Math.max(total.identitiesUsed, usage.identitiesUsed),
    }),
    {
      enabled: false,
      poolSize: 0,
      requests: 0,
      rotations: 0,
      blockedResponses: 0,
      rateLimitedResponses: 0,
      identitiesUsed: 0,
    },
  );
}

function countBy<K extends string>(keys: readonly K[]): Partial<Record<K, number>> {
  const counts: Partial<Record<K, number>> = {};
  for (const key of keys) {
    counts[key] = (counts[key] ?? 0) + 1;
  }
  return counts;
}

/**
 * Merge task outcomes into the final frozen result
 */
export function aggregateResults(input: AggregateInput): AggregateResult {
  const { spec, outcomes, status, salaryPolicies, totalElapsedMs, now } = input;

  const normalized: CanonicalRecord[] = [];
  for (const outcome of outcomes) {
    if (outcome.status !== "ok" && outcome.status !== "partial") continue;

    const ctx = {
      salaryPolicy: salaryPolicies[outcome.site] ?? NO_SALARY_EXTRACTION,
      descriptionFormat: spec.descriptionFormat,
      countryHint: spec.country,
      now,
    };
    for (const raw of outcome.raw.records) {
      normalized.push(normalizeRecord(raw, ctx));
    }
  }

  const { records: unique, duplicatesRemoved } = dedupeRecords(normalized);
  const sorted = [...unique].sort(compareRecords);
  const records = sorted.slice(0, spec.resultsWanted);

  const sources: SourceStats[] = outcomes.map((outcome) => ({
    site: outcome.site,
    status: outcome.status,
    fetched: outcome.raw.records.length,
    kept: records.filter((record) => record.site === outcome.site).length,
    pagesFetched: outcome.raw.pagesFetched,
    elapsedMs: outcome.elapsedMs,
    ...(outcome.raw.failure ? { failure: outcome.raw.failure } : {}),
  }));

  const stats: AggregateStats = {
    totalJobs: records.length,
    jobsBySite: countBy(records.map((record) => record.site)),
    jobTypes: countBy(records.map((record) => record.jobType)),
    duplicatesRemoved,
    truncated: sorted.length - records.length,
    sources,
    totalElapsedMs,
    proxy: combineProxyUsage(outcomes.map((outcome) => outcome.proxyUsage)),
  };

  return Object.freeze({
    status,
    records: Object.freeze(records),
    stats: Object.freeze(stats),
  });
}
