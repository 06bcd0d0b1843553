/**
 * ProxySession: per-task egress identity, pacing and retry policy
 *
 * Every source task owns exactly one session. The session:
 * - keeps a sticky current identity and rotates round-robin on blocks
 * - cools blocked identities down with exponential windows
 * - paces direct (proxy-less) traffic with a fixed delay
 * - retries transient failures with backoff
 * - carries the task's abort signal into every wait and request
 */

import type { Dispatcher } from "undici";
import type {
  AttemptOutcome,
  HttpRequestFn,
  Logger,
  ProxyIdentity,
  ProxyUsage,
  SessionConfig,
  SessionRequest,
  SessionState,
} from "@/types";
import {
  BROWSER_HEADERS,
  BLOCKED_STATUS_CODES,
  DEFAULT_BASE_COOLDOWN_MS,
  DEFAULT_BLOCK_THRESHOLD,
  DEFAULT_DIRECT_DELAY_MS,
  DEFAULT_MAX_COOLDOWN_MS,
  DEFAULT_MAX_RETRY_AFTER_MS,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_RETRY_MAX_DELAY_MS,
  DEFAULT_SESSION_MAX_ATTEMPTS,
  RATE_LIMIT_STATUS_CODES,
} from "@/constants";
import { httpRequest, HttpError, computeBackoffDelay, isStatusRetryable } from "@/clients/http";
import { SourceError } from "@/errors";
import { abortReason, isAbortError, sleep as abortableSleep } from "@/utils/async/abort";
import { withContext } from "@/logger";
import { parseProxyList } from "./proxyParsing";
import { createDispatcher, readCaCert, type DispatcherFactory } from "./dispatchers";

/**
 * Injectable collaborators (tests swap the clock, the sleeper and the transport)
 */
export type ProxySessionDeps = {
  transport?: HttpRequestFn;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
  dispatcherFactory?: DispatcherFactory;
  logger?: Logger;
};

const DIRECT_KEY = -1;

export class ProxySession {
  private readonly pool: ProxyIdentity[];
  private readonly state: SessionState;
  private readonly dispatchers = new Map<number, Dispatcher | undefined>();
  private readonly identitiesUsed = new Set<number>();
  private readonly counters = { rotations: 0, blocked: 0, rateLimited: 0 };
  private caCert: string | undefined;
  private closed = false;

  private readonly maxAttempts: number;
  private readonly blockThreshold: number;
  private readonly baseCooldownMs: number;
  private readonly maxCooldownMs: number;
  private readonly directDelayMs: number;
  private readonly retryBaseDelayMs: number;

  private readonly transport: HttpRequestFn;
  private readonly sleepFn: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => number;
  private readonly dispatcherFactory: DispatcherFactory;
  private readonly log: Logger;

  constructor(
    private readonly config: SessionConfig,
    public readonly signal: AbortSignal,
    deps: ProxySessionDeps = {},
  ) {
    this.pool = parseProxyList(config.proxies);
    this.state = {
      currentIndex: this.pool.length > 0 ? 0 : null,
      requestCount: 0,
      consecutiveBlocks: 0,
      cooldownUntil: new Map(),
      strikes: new Map(),
      lastRequestAt: null,
    };

    this.maxAttempts = Math.max(1, config.maxAttempts ?? DEFAULT_SESSION_MAX_ATTEMPTS);
    this.blockThreshold = Math.max(1, config.blockThreshold ?? DEFAULT_BLOCK_THRESHOLD);
    this.baseCooldownMs = config.baseCooldownMs ?? DEFAULT_BASE_COOLDOWN_MS;
    this.maxCooldownMs = config.maxCooldownMs ?? DEFAULT_MAX_COOLDOWN_MS;
    this.directDelayMs = config.directDelayMs ?? DEFAULT_DIRECT_DELAY_MS;
    this.retryBaseDelayMs = config.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;

    this.transport = deps.transport ?? httpRequest;
    this.sleepFn = deps.sleep ?? abortableSleep;
    this.now = deps.now ?? Date.now;
    this.dispatcherFactory = deps.dispatcherFactory ?? createDispatcher;
    this.log = deps.logger ?? withContext({ site: config.site, component: "session" });
  }

  get site(): SessionConfig["site"] {
    return this.config.site;
  }

  /**
   * Label of the identity the next request will use ("direct" without proxies)
   */
  get currentIdentity(): string {
    return this.state.currentIndex === null
      ? "direct"
      : this.pool[this.state.currentIndex].label;
  }

  /**
   * Issue one logical request, applying pacing, rotation and retries
   *
   * @throws {SourceError} SourceBlocked when every attempt was blocked,
   *   SourceNetworkError on exhausted transient failures or a non-retryable status
   * @throws {Error} The abort reason when the session signal fires
   */
  async request<T>(req: SessionRequest): Promise<T> {
    const { isBlockedBody, ...httpReq } = req;
    let lastOutcome: AttemptOutcome = "transient";
    let lastMessage = "no attempt made";

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      await this.beforeAttempt();

      const index = this.state.currentIndex;
      this.state.requestCount++;
      this.state.lastRequestAt = this.now();
      this.identitiesUsed.add(index ?? DIRECT_KEY);

      let body: T;
      try {
        body = await this.transport<T>({
          ...httpReq,
          headers: { ...BROWSER_HEADERS, ...httpReq.headers },
          signal: this.signal,
          dispatcher: this.dispatcherFor(index),
          retry: { maxAttempts: 1 },
        });
      } catch (error) {
        if (this.signal.aborted) {
          throw abortReason(this.signal);
        }

        const outcome = this.classify(error);
        lastOutcome = outcome;
        lastMessage = error instanceof Error ? error.message : String(error);

        if (outcome === "fatal") {
          throw new SourceError(this.site, "SourceNetworkError", lastMessage, { cause: error });
        }

        await this.afterFailure(outcome, attempt, error);
        continue;
      }

      if (isBlockedBody?.(body)) {
        lastOutcome = "blocked";
        lastMessage = `blocked response body from ${httpReq.url}`;
        await this.afterFailure("blocked", attempt);
        continue;
      }

      this.state.consecutiveBlocks = 0;
      return body;
    }

    const kind =
      lastOutcome === "blocked" || lastOutcome === "rate-limited"
        ? "SourceBlocked"
        : "SourceNetworkError";
    throw new SourceError(
      this.site,
      kind,
      `gave up after ${this.maxAttempts} attempts: ${lastMessage}`,
    );
  }

  /**
   * Snapshot of usage counters for run stats
   */
  usage(): ProxyUsage {
    return {
      enabled: this.pool.length > 0,
      poolSize: this.pool.length,
      requests: this.state.requestCount,
      rotations: this.counters.rotations,
      blockedResponses: this.counters.blocked,
      rateLimitedResponses: this.counters.rateLimited,
      identitiesUsed: this.pool.length > 0 ? this.identitiesUsed.size : 0,
    };
  }

  /**
   * Release pooled connections. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const open = [...this.dispatchers.values()].filter(
      (d): d is Dispatcher => d !== undefined,
    );
    this.dispatchers.clear();
    await Promise.all(open.map((d) => d.close()));
  }

  private classify(error: unknown): Exclude<AttemptOutcome, "ok"> {
    if (error instanceof HttpError) {
      if (BLOCKED_STATUS_CODES.includes(error.status)) return "blocked";
      if (RATE_LIMIT_STATUS_CODES.includes(error.status)) return "rate-limited";
      return isStatusRetryable(error.status) ? "transient" : "fatal";
    }
    if (error instanceof Error && (isAbortError(error) || error.name === "TypeError")) {
      return "transient";
    }
    return "fatal";
  }

  /**
   * Record a failed attempt and wait/rotate as the policy requires
   */
  private async afterFailure(
    outcome: Exclude<AttemptOutcome, "ok" | "fatal">,
    attempt: number,
    error?: unknown,
  ): Promise<void> {
    if (outcome === "transient") {
      if (attempt < this.maxAttempts) {
        const delayMs = computeBackoffDelay(attempt, this.retryBaseDelayMs, DEFAULT_RETRY_MAX_DELAY_MS);
        this.log.debug("Transient failure, backing off", {
          attempt,
          delayMs,
          identity: this.currentIdentity,
          error: error instanceof Error ? error.message : String(error),
        });
        await this.sleepFn(delayMs, this.signal);
      }
      return;
    }

    if (outcome === "blocked") this.counters.blocked++;
    else this.counters.rateLimited++;
    this.state.consecutiveBlocks++;

    const index = this.state.currentIndex;
    if (index !== null && this.state.consecutiveBlocks >= this.blockThreshold) {
      this.coolDown(index);
      // Rotation happens in beforeAttempt() of the next attempt
      return;
    }

    if (attempt < this.maxAttempts) {
      const backoffMs = computeBackoffDelay(attempt, this.retryBaseDelayMs, DEFAULT_RETRY_MAX_DELAY_MS);
      const retryAfterMs =
        outcome === "rate-limited" && error instanceof HttpError ? error.retryAfterMs(this.now()) : null;
      const delayMs =
        retryAfterMs !== null
          ? Math.max(backoffMs, Math.min(retryAfterMs, DEFAULT_MAX_RETRY_AFTER_MS))
          : backoffMs;
      this.log.debug("Blocked response, backing off", { outcome, attempt, delayMs });
      await this.sleepFn(delayMs, this.signal);
    }
  }

  private coolDown(index: number): void {
    const strikes = (this.state.strikes.get(index) ?? 0) + 1;
    const windowMs = Math.min(
      this.baseCooldownMs * Math.pow(2, strikes - 1),
      this.maxCooldownMs,
    );
    this.state.strikes.set(index, strikes);
    this.state.cooldownUntil.set(index, this.now() + windowMs);
    this.state.consecutiveBlocks = 0;

    this.log.warn("Proxy identity cooled down", {
      identity: this.pool[index].label,
      strikes,
      cooldownMs: windowMs,
    });
  }

  private isCooling(index: number, at: number): boolean {
    const until = this.state.cooldownUntil.get(index);
    return until !== undefined && until > at;
  }

  /**
   * Direct mode: enforce the fixed inter-request delay.
   * Proxy mode: move off a cooling identity, waiting when the whole pool cools.
   */
  private async beforeAttempt(): Promise<void> {
    if (this.signal.aborted) {
      throw abortReason(this.signal);
    }

    const index = this.state.currentIndex;
    if (index === null) {
      const last = this.state.lastRequestAt;
      if (last !== null) {
        const waitMs = last + this.directDelayMs - this.now();
        if (waitMs > 0) {
          await this.sleepFn(waitMs, this.signal);
        }
      }
      return;
    }

    if (!this.isCooling(index, this.now())) {
      return;
    }

    const next = this.nextAvailable(index, this.now());
    if (next !== null) {
      this.rotateTo(next);
      return;
    }

    // Every identity is cooling: wait for the earliest window to elapse
    let earliestIndex = index;
    let earliestUntil = Number.POSITIVE_INFINITY;
    for (const [i, until] of this.state.cooldownUntil) {
      if (until < earliestUntil) {
        earliestUntil = until;
        earliestIndex = i;
      }
    }
    const waitMs = Math.max(0, earliestUntil - this.now());
    this.log.info("All proxy identities cooling down, waiting", { waitMs });
    await this.sleepFn(waitMs, this.signal);
    if (earliestIndex !== index) {
      this.rotateTo(earliestIndex);
    }
  }

  /**
   * Round-robin search for the next identity not in cooldown, starting after `from`
   */
  private nextAvailable(from: number, at: number): number | null {
    for (let step = 1; step <= this.pool.length; step++) {
      const candidate = (from + step) % this.pool.length;
      if (!this.isCooling(candidate, at)) {
        return candidate;
      }
    }
    return null;
  }

  private rotateTo(index: number): void {
    const previous = this.currentIdentity;
    this.state.currentIndex = index;
    this.state.consecutiveBlocks = 0;
    this.counters.rotations++;
    this.log.debug("Rotated proxy identity", { from: previous, to: this.pool[index].label });
  }

  private dispatcherFor(index: number | null): Dispatcher | undefined {
    const key = index ?? DIRECT_KEY;
    if (this.dispatchers.has(key)) {
      return this.dispatchers.get(key);
    }

    if (this.config.caCertPath && this.caCert === undefined) {
      this.caCert = readCaCert(this.config.caCertPath);
    }

    const dispatcher = this.dispatcherFactory(
      index === null ? null : this.pool[index],
      this.caCert,
    );
    this.dispatchers.set(key, dispatcher);
    return dispatcher;
  }
}
