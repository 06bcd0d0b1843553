/**
 * Source task: runs one adapter against its own session under the run signal
 */

import type { ManagedSession, SourceAdapter } from "@/interfaces";
import type {
  Logger,
  ProxyUsage,
  RawSourceResult,
  SearchSpec,
  SourceFailure,
  SourceTaskOutcome,
  SourceTaskStatus,
} from "@/types";
import { toSourceFailure } from "@/errors";
import { abortable } from "@/utils/async/abort";

export type SourceTaskContext = {
  spec: SearchSpec;
  adapter: SourceAdapter;
  createSession: () => ManagedSession;
  /** Run-wide signal armed with the deadline */
  signal: AbortSignal;
  clock: () => number;
  logger: Logger;
};

const EMPTY_USAGE: ProxyUsage = {
  enabled: false,
  poolSize: 0,
  requests: 0,
  rotations: 0,
  blockedResponses: 0,
  rateLimitedResponses: 0,
  identitiesUsed: 0,
};

function statusOf(raw: RawSourceResult): SourceTaskStatus {
  if (!raw.failure) return "ok";
  return raw.records.length > 0 ? "partial" : "failed";
}

function failedResult(raw: Pick<RawSourceResult, "site">, failure: SourceFailure): RawSourceResult {
  return { site: raw.site, records: [], pagesFetched: 0, stopReason: "error", failure };
}

/**
 * Run one source to a terminal outcome; never rejects
 *
 * A task still running when the signal fires is recorded as SourceTimeout
 * and its partial records are discarded.
 */
export async function runSourceTask(ctx: SourceTaskContext): Promise<SourceTaskOutcome> {
  const { spec, adapter, signal, clock, logger } = ctx;
  const site = adapter.site;
  const startedAt = clock();
  let session: ManagedSession | undefined;

  const outcome = (
    status: SourceTaskStatus,
    raw: RawSourceResult,
  ): SourceTaskOutcome => ({
    site,
    status,
    raw,
    elapsedMs: clock() - startedAt,
    proxyUsage: session?.usage() ?? EMPTY_USAGE,
  });

  try {
    session = ctx.createSession();
    const raw = await abortable(adapter.fetch(spec, session), signal);
    const status = statusOf(raw);

    if (raw.failure) {
      logger.warn("Source finished with failure", {
        site,
        status,
        kind: raw.failure.kind,
        error: raw.failure.message,
        records: raw.records.length,
      });
    } else {
      logger.info("Source finished", { site, records: raw.records.length });
    }
    return outcome(status, raw);
  } catch (error) {
    if (signal.aborted) {
      logger.warn("Source timed out", { site, deadlineMs: spec.deadlineMs });
      return outcome(
        "timeout",
        failedResult({ site }, {
          site,
          kind: "SourceTimeout",
          message: `did not finish within ${spec.deadlineMs}ms`,
        }),
      );
    }

    const failure = toSourceFailure(site, error);
    logger.error("Source task failed", { site, kind: failure.kind, error: failure.message });
    return outcome("failed", failedResult({ site }, failure));
  } finally {
    if (session) {
      await session.close().catch((err: unknown) => {
        logger.warn("Failed to close session", {
          site,
          error: err instanceof Error ? err.message : String(err),
        });
      });
    }
  }
}
