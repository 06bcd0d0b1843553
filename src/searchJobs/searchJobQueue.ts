/**
 * Background search jobs
 *
 * submit() validates the input, stores a pending job and starts the search
 * without waiting for it. Jobs move pending -> running -> completed | failed;
 * state and result snapshots are persisted in search_jobs. When a callback
 * URL was given, the finished job is delivered once via webhook and the
 * delivery outcome recorded on the row.
 *
 * Requires an open job store (openJobStore()).
 */

import { randomUUID } from "crypto";
import type {
  Logger,
  SearchJobRow,
  SearchJobStatus,
  SearchRunResult,
  SearchSpec,
  WebhookDeliveryResult,
} from "@/types";
import { JOB_ERROR_MAX_LENGTH } from "@/constants";
import { InvalidSpecError } from "@/errors";
import { validateSearchSpec } from "@/search";
import { parseProxy } from "@/session";
import { runSearch } from "@/orchestration";
import { serializeSearchResult, type SerializedSearchResult } from "@/export";
import {
  getSearchJob,
  insertSearchJob,
  listSearchJobs,
  markSearchJobCompleted,
  markSearchJobFailed,
  markSearchJobRunning,
  recordCallbackOutcome,
} from "@/db";
import { withContext } from "@/logger";
import { deliverWebhook, type WebhookPayload } from "./webhook";

export type SearchJobQueueDeps = {
  /** Runs one validated search (defaults to runSearch) */
  search?: (spec: SearchSpec) => Promise<SearchRunResult>;
  /** Delivers the finished job (defaults to deliverWebhook) */
  deliver?: (url: string, payload: WebhookPayload) => Promise<WebhookDeliveryResult>;
  now?: () => Date;
  createId?: () => string;
  logger?: Logger;
};

export type SubmitOptions = {
  callbackUrl?: string;
};

/**
 * Read model of one background job
 */
export type SearchJobSnapshot = {
  id: string;
  status: SearchJobStatus;
  createdAt: string;
  startedAt?: string;
  finishedAt?: string;
  callbackUrl?: string;
  /** Parsed JSON result, as delivered to the webhook */
  result?: unknown;
  error?: string;
  callback?: {
    status: number | null;
    error: string | null;
    sentAt: string | null;
  };
};

export function truncateError(message: string, max = JOB_ERROR_MAX_LENGTH): string {
  return message.length > max ? message.slice(0, max - 3) + "..." : message;
}

function validateCallbackUrl(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new InvalidSpecError("callbackUrl", "must be an absolute URL");
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new InvalidSpecError("callbackUrl", "must use http or https");
  }
  return url.toString();
}

/**
 * Spec as stored on the row: proxy credentials replaced by host:port labels
 */
function redactSpec(spec: SearchSpec): SearchSpec {
  return { ...spec, proxies: spec.proxies.map((p) => parseProxy(p).label) };
}

function toSnapshot(row: SearchJobRow): SearchJobSnapshot {
  const snapshot: SearchJobSnapshot = {
    id: row.id,
    status: row.status,
    createdAt: row.created_at,
  };
  if (row.started_at) snapshot.startedAt = row.started_at;
  if (row.finished_at) snapshot.finishedAt = row.finished_at;
  if (row.callback_url) snapshot.callbackUrl = row.callback_url;
  if (row.result_json) {
    const parsed: unknown = JSON.parse(row.result_json);
    snapshot.result = parsed;
  }
  if (row.error) snapshot.error = row.error;
  if (row.callback_sent_at) {
    snapshot.callback = {
      status: row.callback_status,
      error: row.callback_error,
      sentAt: row.callback_sent_at,
    };
  }
  return snapshot;
}

export class SearchJobQueue {
  private readonly search: (spec: SearchSpec) => Promise<SearchRunResult>;
  private readonly deliver: (url: string, payload: WebhookPayload) => Promise<WebhookDeliveryResult>;
  private readonly now: () => Date;
  private readonly createId: () => string;
  private readonly log: Logger;
  private readonly inFlight = new Map<string, Promise<void>>();

  constructor(deps: SearchJobQueueDeps = {}) {
    this.search = deps.search ?? ((spec) => runSearch(spec));
    this.deliver = deps.deliver ?? ((url, payload) => deliverWebhook(url, payload));
    this.now = deps.now ?? (() => new Date());
    this.createId = deps.createId ?? randomUUID;
    this.log = deps.logger ?? withContext({ component: "searchJobs" });
  }

  /**
   * Validate and enqueue a search; returns the job id immediately
   *
   * @throws {InvalidSpecError} On invalid input or callback URL
   */
  submit(input: unknown, options: SubmitOptions = {}): string {
    const spec = validateSearchSpec(input);
    const callbackUrl =
      options.callbackUrl !== undefined ? validateCallbackUrl(options.callbackUrl) : null;

    const id = this.createId();
    insertSearchJob({
      id,
      request_json: JSON.stringify(redactSpec(spec)),
      callback_url: callbackUrl,
      created_at: this.now().toISOString(),
    });
    this.log.info("Search job submitted", { jobId: id, sites: spec.sites });

    const task = this.process(id, spec, callbackUrl)
      .catch((err: unknown) => {
        this.log.error("Search job bookkeeping failed", {
          jobId: id,
          error: err instanceof Error ? err.message : String(err),
        });
      })
      .finally(() => {
        this.inFlight.delete(id);
      });
    this.inFlight.set(id, task);

    return id;
  }

  get(id: string): SearchJobSnapshot | null {
    const row = getSearchJob(id);
    return row ? toSnapshot(row) : null;
  }

  list(status?: SearchJobStatus): SearchJobSnapshot[] {
    return listSearchJobs(status).map(toSnapshot);
  }

  /**
   * Resolve once the job (including its webhook) has finished
   */
  async waitFor(id: string): Promise<SearchJobSnapshot | null> {
    await this.inFlight.get(id);
    return this.get(id);
  }

  /**
   * Resolve once every in-flight job has finished
   */
  async drain(): Promise<void> {
    await Promise.all([...this.inFlight.values()]);
  }

  get pending(): number {
    return this.inFlight.size;
  }

  private async process(id: string, spec: SearchSpec, callbackUrl: string | null): Promise<void> {
    // Let submit() return before any work starts
    await Promise.resolve();

    if (!markSearchJobRunning(id, this.now().toISOString())) {
      this.log.warn("Search job was not pending", { jobId: id });
      return;
    }

    let payload: WebhookPayload;
    try {
      const run = await this.search(spec);
      const result: SerializedSearchResult = serializeSearchResult(run);
      const finishedAt = this.now().toISOString();
      markSearchJobCompleted(id, JSON.stringify(result), finishedAt);
      this.log.info("Search job completed", {
        jobId: id,
        status: run.status,
        totalJobs: run.result.stats.totalJobs,
      });
      payload = { jobId: id, status: "completed", result, timestamp: finishedAt };
    } catch (err) {
      const error = truncateError(err instanceof Error ? err.message : String(err));
      const finishedAt = this.now().toISOString();
      markSearchJobFailed(id, error, finishedAt);
      this.log.warn("Search job failed", { jobId: id, error });
      payload = { jobId: id, status: "failed", error, timestamp: finishedAt };
    }

    if (callbackUrl) {
      const outcome = await this.deliver(callbackUrl, payload);
      recordCallbackOutcome(id, {
        status: outcome.status,
        error: outcome.ok ? null : outcome.error,
        sentAt: this.now().toISOString(),
      });
    }
  }
}
