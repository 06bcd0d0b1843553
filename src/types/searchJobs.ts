/**
 * Background search job type definitions
 *
 * Aligned with schema in migrations/0001_search_jobs.sql
 */

/**
 * Background job lifecycle
 */
export type SearchJobStatus = "pending" | "running" | "completed" | "failed";

/**
 * search_jobs row
 */
export type SearchJobRow = {
  id: string;
  status: SearchJobStatus;
  request_json: string;
  result_json: string | null;
  error: string | null;
  callback_url: string | null;
  callback_status: number | null;
  callback_error: string | null;
  callback_sent_at: string | null;
  created_at: string;
  started_at: string | null;
  finished_at: string | null;
};

/**
 * Outcome of a webhook delivery attempt
 */
export type WebhookDeliveryResult =
  | { ok: true; status: number }
  | { ok: false; status: number | null; error: string };
