/**
 * Search jobs repository
 *
 * Data access layer for the search_jobs table.
 * Timestamps are ISO-8601 strings supplied by the caller.
 */

import type { SearchJobRow, SearchJobStatus } from "@/types";
import { getDb } from "../connection";

export type SearchJobInsert = {
  id: string;
  request_json: string;
  callback_url: string | null;
  created_at: string;
};

const SEARCH_JOB_STATUSES: readonly SearchJobStatus[] = [
  "pending",
  "running",
  "completed",
  "failed",
];

function stringOrNull(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function numberOrNull(value: unknown): number | null {
  return typeof value === "number" ? value : null;
}

/**
 * Validate a raw row from SQLite into a SearchJobRow
 */
function toSearchJobRow(row: unknown): SearchJobRow | null {
  if (typeof row !== "object" || row === null) return null;
  if (!("id" in row) || typeof row.id !== "string") return null;
  if (!("request_json" in row) || typeof row.request_json !== "string") return null;
  if (!("created_at" in row) || typeof row.created_at !== "string") return null;
  if (!("status" in row)) return null;

  const rawStatus = row.status;
  const status = SEARCH_JOB_STATUSES.find((s) => s === rawStatus);
  if (!status) return null;

  const get = (key: string): unknown => (key in row ? Reflect.get(row, key) : undefined);

  return {
    id: row.id,
    status,
    request_json: row.request_json,
    result_json: stringOrNull(get("result_json")),
    error: stringOrNull(get("error")),
    callback_url: stringOrNull(get("callback_url")),
    callback_status: numberOrNull(get("callback_status")),
    callback_error: stringOrNull(get("callback_error")),
    callback_sent_at: stringOrNull(get("callback_sent_at")),
    created_at: row.created_at,
    started_at: stringOrNull(get("started_at")),
    finished_at: stringOrNull(get("finished_at")),
  };
}

/**
 * Insert a new pending job
 */
export function insertSearchJob(input: SearchJobInsert): void {
  getDb()
    .prepare(
      `
    INSERT INTO search_jobs (id, status, request_json, callback_url, created_at)
    VALUES (?, 'pending', ?, ?, ?)
  `,
    )
    .run(input.id, input.request_json, input.callback_url, input.created_at);
}

/**
 * Get a job by id (null if unknown)
 */
export function getSearchJob(id: string): SearchJobRow | null {
  const row = getDb().prepare("SELECT * FROM search_jobs WHERE id = ?").get(id);
  return toSearchJobRow(row);
}

/**
 * List jobs, newest first, optionally filtered by status
 */
export function listSearchJobs(status?: SearchJobStatus): SearchJobRow[] {
  const db = getDb();
  const rows = status
    ? db.prepare("SELECT * FROM search_jobs WHERE status = ? ORDER BY created_at DESC").all(status)
    : db.prepare("SELECT * FROM search_jobs ORDER BY created_at DESC").all();

  return rows.map(toSearchJobRow).filter((row): row is SearchJobRow => row !== null);
}

/**
 * pending -> running
 *
 * @returns true if the job was pending and is now running
 */
export function markSearchJobRunning(id: string, startedAt: string): boolean {
  const result = getDb()
    .prepare(
      `
    UPDATE search_jobs
    SET status = 'running', started_at = ?
    WHERE id = ? AND status = 'pending'
  `,
    )
    .run(startedAt, id);
  return result.changes === 1;
}

/**
 * running -> completed, storing the serialized result
 */
export function markSearchJobCompleted(id: string, resultJson: string, finishedAt: string): void {
  getDb()
    .prepare(
      `
    UPDATE search_jobs
    SET status = 'completed', result_json = ?, error = NULL, finished_at = ?
    WHERE id = ?
  `,
    )
    .run(resultJson, finishedAt, id);
}

/**
 * any -> failed, storing the error message
 */
export function markSearchJobFailed(id: string, error: string, finishedAt: string): void {
  getDb()
    .prepare(
      `
    UPDATE search_jobs
    SET status = 'failed', error = ?, finished_at = ?
    WHERE id = ?
  `,
    )
    .run(error, finishedAt, id);
}

/**
 * Record the single webhook delivery attempt
 */
export function recordCallbackOutcome(
  id: string,
  outcome: { status: number | null; error: string | null; sentAt: string },
): void {
  getDb()
    .prepare(
      `
    UPDATE search_jobs
    SET callback_status = ?, callback_error = ?, callback_sent_at = ?
    WHERE id = ?
  `,
    )
    .run(outcome.status, outcome.error, outcome.sentAt, id);
}
