/**
 * JSON-safe view of a search run (dates as ISO strings)
 */

import type {
  AggregateStats,
  CanonicalRecord,
  RunStatus,
  SearchRunResult,
  SourceFailure,
} from "@/types";

export type SerializedRecord = Omit<CanonicalRecord, "postedAt"> & {
  postedAt: string | null;
};

export type SerializedSearchResult = {
  status: RunStatus;
  records: SerializedRecord[];
  stats: AggregateStats;
  failures: SourceFailure[];
};

export function serializeRecord(record: CanonicalRecord): SerializedRecord {
  const { postedAt, ...rest } = record;
  return { ...rest, postedAt: postedAt ? postedAt.toISOString() : null };
}

export function serializeSearchResult(run: SearchRunResult): SerializedSearchResult {
  return {
    status: run.status,
    records: run.result.records.map(serializeRecord),
    stats: run.result.stats,
    failures: run.failures,
  };
}
