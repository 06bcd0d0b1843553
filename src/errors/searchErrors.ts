/**
 * Error classes of the search engine
 *
 * Only InvalidSpecError and AllSourcesFailedError abort an invocation;
 * SourceError is caught per task and folded into the run's failure list.
 */

import type { SiteId, SourceErrorKind, SourceFailure } from "@/types";

/**
 * Thrown when search input is malformed (empty term, unknown site, bad count...)
 */
export class InvalidSpecError extends Error {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid search spec: ${field} ${message}`);
    this.name = "InvalidSpecError";
    this.field = field;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidSpecError);
    }
  }
}

/**
 * Typed failure of one source; the kind tells blocked/timeout/network/parse apart
 */
export class SourceError extends Error {
  public readonly site: SiteId;
  public readonly kind: SourceErrorKind;

  constructor(site: SiteId, kind: SourceErrorKind, message: string, options?: { cause?: unknown }) {
    super(`${site}: ${message}`, options);
    this.name = "SourceError";
    this.site = site;
    this.kind = kind;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SourceError);
    }
  }

  toFailure(): SourceFailure {
    return { site: this.site, kind: this.kind, message: this.message };
  }
}

/**
 * Thrown when not a single requested source produced a usable result
 */
export class AllSourcesFailedError extends Error {
  public readonly failures: readonly SourceFailure[];

  constructor(failures: readonly SourceFailure[]) {
    super(
      `All sources failed: ${failures.map((f) => `${f.site} (${f.kind})`).join(", ")}`,
    );
    this.name = "AllSourcesFailedError";
    this.failures = failures;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AllSourcesFailedError);
    }
  }
}

/**
 * Convert anything thrown inside a source task into a SourceFailure
 */
export function toSourceFailure(site: SiteId, error: unknown): SourceFailure {
  if (error instanceof SourceError) {
    return error.toFailure();
  }
  return {
    site,
    kind: "SourceNetworkError",
    message: error instanceof Error ? error.message : String(error),
  };
}
