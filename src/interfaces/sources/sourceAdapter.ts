/**
 * SourceAdapter interface: contract every job board variant implements
 *
 * The set of adapters is closed: each one is tagged with a SiteId and
 * registered in src/sources/registry.ts.
 */

import type {
  PostingOrder,
  ProxyUsage,
  RawSourceResult,
  SalaryExtractionPolicy,
  SearchSpec,
  SessionRequest,
  SiteId,
} from "@/types";

/**
 * What an adapter sees of its ProxySession
 */
export interface SourceSession {
  readonly site: SiteId;
  /** Fires on the run deadline; adapters must stop promptly */
  readonly signal: AbortSignal;
  request<T>(req: SessionRequest): Promise<T>;
}

export interface SourceAdapter {
  readonly site: SiteId;

  /**
   * Only newest-first sources may stop paginating at the age cutoff
   */
  readonly ordering: PostingOrder;

  /**
   * Whether free-text salary extraction applies, and the currency assumed
   * when a salary mentions none
   */
  readonly salaryExtraction: SalaryExtractionPolicy;

  /**
   * Fetch raw postings for a search
   *
   * Failures (blocked, network, parse) are reported on the result with
   * any records gathered before them; only an abort of session.signal rejects.
   */
  fetch(spec: SearchSpec, session: SourceSession): Promise<RawSourceResult>;
}

/**
 * Session as owned by the orchestrator: adapters see SourceSession,
 * the task reads usage and closes it
 */
export interface ManagedSession extends SourceSession {
  usage(): ProxyUsage;
  close(): Promise<void>;
}
