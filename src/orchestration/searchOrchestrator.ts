/**
 * Search orchestrator: concurrent fan-out to sources, deadline, aggregation
 *
 * Run lifecycle: pending -> running -> completed | partially_failed.
 * Every requested source runs as its own task with its own ProxySession;
 * one AbortController per invocation enforces the deadline. A source
 * failure never cancels its siblings; only InvalidSpecError (from input
 * validation) and AllSourcesFailedError abort the invocation.
 */

import type { ManagedSession } from "@/interfaces";
import type {
  RunStatus,
  SalaryExtractionPolicy,
  SearchRunResult,
  SearchSpec,
  SessionConfig,
  SiteId,
  SourceFailure,
  SourceTaskOutcome,
} from "@/types";
import { VERBOSITY_LOG_LEVELS } from "@/constants";
import { AllSourcesFailedError } from "@/errors";
import { ProxySession, type ProxySessionDeps } from "@/session";
import { DEFAULT_SOURCE_REGISTRY, createSourceAdapter, type SourceRegistry } from "@/sources";
import { aggregateResults } from "@/aggregation";
import { validateSearchSpec } from "@/search";
import { withContext } from "@/logger";
import { runSourceTask } from "./sourceTask";

export type SessionFactory = (config: SessionConfig, signal: AbortSignal) => ManagedSession;

export type SearchDeps = {
  registry?: SourceRegistry;
  /** Builds one session per task (defaults to ProxySession) */
  createSession?: SessionFactory;
  /** Collaborators for the default ProxySession */
  sessionDeps?: ProxySessionDeps;
  /** Session tunables applied to every task (pacing, cooldowns) */
  sessionOverrides?: Partial<Omit<SessionConfig, "site" | "proxies" | "caCertPath">>;
  /** Reference time for relative dates */
  now?: () => Date;
  /** Monotonic-ish millisecond clock for elapsed times */
  clock?: () => number;
  /** Observes run state transitions */
  onStatus?: (status: RunStatus) => void;
};

/**
 * Run state after all tasks joined
 */
export function deriveRunStatus(outcomes: readonly SourceTaskOutcome[]): RunStatus {
  const succeeded = outcomes.filter((o) => o.status === "ok" || o.status === "partial");
  if (succeeded.length === 0) return "failed";
  return succeeded.length === outcomes.length && outcomes.every((o) => o.status === "ok")
    ? "completed"
    : "partially_failed";
}

function deadlineError(deadlineMs: number): Error {
  const err = new Error(`Search deadline of ${deadlineMs}ms exceeded`);
  err.name = "AbortError";
  return err;
}

/**
 * Run a validated search across its sources
 *
 * @throws {AllSourcesFailedError} When no source produced a usable result
 */
export async function runSearch(spec: SearchSpec, deps: SearchDeps = {}): Promise<SearchRunResult> {
  const log = withContext({ component: "orchestrator" }, VERBOSITY_LOG_LEVELS[spec.verbose]);
  const registry = deps.registry ?? DEFAULT_SOURCE_REGISTRY;
  const clock = deps.clock ?? Date.now;
  const now = (deps.now ?? (() => new Date()))();
  const createSession: SessionFactory =
    deps.createSession ??
    ((config, signal) => new ProxySession(config, signal, deps.sessionDeps));

  let status: RunStatus = "pending";
  const transition = (next: RunStatus): void => {
    log.debug("Run status", { from: status, to: next });
    status = next;
    deps.onStatus?.(next);
  };

  const startedAt = clock();
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(deadlineError(spec.deadlineMs)), spec.deadlineMs);

  transition("running");
  log.info("Search started", {
    searchTerm: spec.searchTerm,
    location: spec.location,
    sites: spec.sites,
    resultsWanted: spec.resultsWanted,
    proxies: spec.proxies.length,
    deadlineMs: spec.deadlineMs,
  });

  const salaryPolicies: Partial<Record<SiteId, SalaryExtractionPolicy>> = {};
  let outcomes: SourceTaskOutcome[];
  try {
    outcomes = await Promise.all(
      spec.sites.map((site) => {
        const adapter = createSourceAdapter(site, registry);
        salaryPolicies[site] = adapter.salaryExtraction;
        return runSourceTask({
          spec,
          adapter,
          signal: controller.signal,
          clock,
          logger: log,
          createSession: () =>
            createSession(
              {
                ...deps.sessionOverrides,
                site,
                proxies: spec.proxies,
                ...(spec.caCertPath ? { caCertPath: spec.caCertPath } : {}),
              },
              controller.signal,
            ),
        });
      }),
    );
  } finally {
    clearTimeout(timer);
  }

  const failures: SourceFailure[] = outcomes
    .map((outcome) => outcome.raw.failure)
    .filter((failure): failure is SourceFailure => failure !== undefined);

  const finalStatus = deriveRunStatus(outcomes);
  if (finalStatus === "failed") {
    transition("failed");
    log.error("All sources failed", { failures });
    throw new AllSourcesFailedError(failures);
  }

  const result = aggregateResults({
    spec,
    outcomes,
    status: finalStatus,
    salaryPolicies,
    totalElapsedMs: clock() - startedAt,
    now,
  });
  transition(finalStatus);

  log.info("Search finished", {
    status: finalStatus,
    totalJobs: result.stats.totalJobs,
    duplicatesRemoved: result.stats.duplicatesRemoved,
    failures: failures.length,
    elapsedMs: result.stats.totalElapsedMs,
  });

  return { status: finalStatus, result, failures };
}

/**
 * Validate loose input, then run the search
 *
 * @throws {InvalidSpecError} On invalid input
 * @throws {AllSourcesFailedError} When no source produced a usable result
 */
export async function searchJobs(input: unknown, deps: SearchDeps = {}): Promise<SearchRunResult> {
  return runSearch(validateSearchSpec(input), deps);
}
