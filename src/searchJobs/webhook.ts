/**
 * Webhook delivery for finished background jobs
 *
 * One POST per job, bounded by WEBHOOK_TIMEOUT_MS, never retried.
 * Delivery failures are returned (and logged), not thrown.
 */

import { fetch } from "undici";
import type { WebhookDeliveryResult } from "@/types";
import type { SerializedSearchResult } from "@/export";
import { DEFAULT_JSON_HEADERS } from "@/constants/clients/http";
import { WEBHOOK_TIMEOUT_MS, WEBHOOK_USER_AGENT } from "@/constants";
import { linkedTimeoutSignal } from "@/utils/async/abort";
import * as logger from "@/logger";

export type WebhookPayload = {
  jobId: string;
  status: "completed" | "failed";
  result?: SerializedSearchResult;
  error?: string;
  timestamp: string;
};

/**
 * Sends a JSON body and resolves to the response status code
 */
export type WebhookSender = (
  url: string,
  body: WebhookPayload,
  timeoutMs: number,
) => Promise<number>;

const postJson: WebhookSender = async (url, body, timeoutMs) => {
  const { signal, dispose } = linkedTimeoutSignal(timeoutMs);
  try {
    const response = await fetch(url, {
      method: "POST",
      headers: { ...DEFAULT_JSON_HEADERS, "User-Agent": WEBHOOK_USER_AGENT },
      body: JSON.stringify(body),
      signal,
    });
    // Drain the body so the connection can be reused
    await response.arrayBuffer();
    return response.status;
  } finally {
    dispose();
  }
};

export type DeliverWebhookOptions = {
  send?: WebhookSender;
  timeoutMs?: number;
};

/**
 * POST the payload to the callback URL
 */
export async function deliverWebhook(
  url: string,
  payload: WebhookPayload,
  options: DeliverWebhookOptions = {},
): Promise<WebhookDeliveryResult> {
  const send = options.send ?? postJson;
  const timeoutMs = options.timeoutMs ?? WEBHOOK_TIMEOUT_MS;

  try {
    const status = await send(url, payload, timeoutMs);
    if (status >= 200 && status < 300) {
      logger.info("Webhook delivered", { jobId: payload.jobId, status });
      return { ok: true, status };
    }

    logger.warn("Webhook rejected", { jobId: payload.jobId, url, status });
    return { ok: false, status, error: `HTTP ${status}` };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn("Webhook delivery failed", { jobId: payload.jobId, url, error: message });
    return { ok: false, status: null, error: message };
  }
}
