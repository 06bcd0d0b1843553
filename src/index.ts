/**
 * Library entrypoint
 */

export { runSearch, searchJobs, deriveRunStatus, type SearchDeps } from "./orchestration";
export { validateSearchSpec } from "./search";
export { SearchJobQueue, deliverWebhook, type SearchJobSnapshot, type WebhookPayload } from "./searchJobs";
export { toCsv, serializeSearchResult, type SerializedSearchResult } from "./export";
export { DEFAULT_SOURCE_REGISTRY, GupySource, WellfoundSource, type SourceRegistry } from "./sources";
export { ProxySession } from "./session";
export { InvalidSpecError, SourceError, AllSourcesFailedError } from "./errors";
export { HttpError } from "./clients/http";
export { openDb, openJobStore, closeDb, applyMigrations } from "./db";
export type { SourceAdapter, SourceSession, ManagedSession } from "./interfaces";
export type {
  AggregateResult,
  AggregateStats,
  CanonicalRecord,
  Compensation,
  JobType,
  RawJobPosting,
  RawSourceResult,
  RunStatus,
  SearchRunResult,
  SearchSpec,
  SearchSpecInput,
  SiteId,
  SourceFailure,
} from "./types";
