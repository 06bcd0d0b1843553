/**
 * Search spec validation
 *
 * Turns loose input (CLI env, job queue payloads, library callers) into a
 * frozen SearchSpec. Validation is fail-fast: the first violation throws
 * an InvalidSpecError naming the field.
 */

import type {
  DescriptionFormat,
  SearchSpec,
  SearchSpecInput,
  SiteId,
  Verbosity,
} from "@/types";
import {
  DEFAULT_DESCRIPTION_FORMAT,
  DEFAULT_RESULTS_WANTED,
  DEFAULT_SEARCH_DEADLINE_MS,
  DEFAULT_VERBOSITY,
  DESCRIPTION_FORMATS,
  MAX_RESULTS_WANTED,
  MAX_SEARCH_DEADLINE_MS,
  MIN_SEARCH_TERM_LENGTH,
  SITE_IDS,
} from "@/constants";
import { InvalidSpecError } from "@/errors";
import { InvalidProxyError, parseProxy } from "@/session/proxyParsing";

function validateSearchTerm(value: unknown): string {
  if (typeof value !== "string") {
    throw new InvalidSpecError("searchTerm", "must be a string");
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new InvalidSpecError("searchTerm", "cannot be empty or whitespace-only");
  }
  if (trimmed.length < MIN_SEARCH_TERM_LENGTH) {
    throw new InvalidSpecError(
      "searchTerm",
      `must be at least ${MIN_SEARCH_TERM_LENGTH} characters`,
    );
  }
  return trimmed;
}

/**
 * Optional trimmed string; blank counts as absent
 */
function validateOptionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new InvalidSpecError(field, "must be a string");
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function isSiteId(value: string, known: readonly SiteId[]): value is SiteId {
  return known.some((site) => site === value);
}

function validateSites(value: unknown, known: readonly SiteId[]): SiteId[] {
  if (value === undefined || value === null) {
    return [...known];
  }
  if (!Array.isArray(value)) {
    throw new InvalidSpecError("sites", "must be an array of site ids");
  }
  if (value.length === 0) {
    throw new InvalidSpecError("sites", "cannot be empty");
  }

  const sites: SiteId[] = [];
  value.forEach((raw: unknown, index) => {
    const id = typeof raw === "string" ? raw.trim().toLowerCase() : raw;
    if (typeof id !== "string" || !isSiteId(id, known)) {
      throw new InvalidSpecError(
        `sites[${index}]`,
        `is not a registered site (expected one of: ${known.join(", ")})`,
      );
    }
    if (sites.includes(id)) {
      throw new InvalidSpecError(`sites[${index}]`, `duplicates "${id}"`);
    }
    sites.push(id);
  });
  return sites;
}

/**
 * Integer in [min, max], or the default when absent
 */
function validateInteger(
  value: unknown,
  field: string,
  min: number,
  max: number,
  fallback: number,
): number {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new InvalidSpecError(field, `must be an integer, got ${String(value)}`);
  }
  if (value < min || value > max) {
    throw new InvalidSpecError(field, `must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

function validateHoursOld(value: unknown): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw new InvalidSpecError("hoursOld", `must be a positive integer, got ${String(value)}`);
  }
  return value;
}

function validateBoolean(value: unknown, field: string, fallback: boolean): boolean {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "boolean") {
    throw new InvalidSpecError(field, "must be a boolean");
  }
  return value;
}

function validateDescriptionFormat(value: unknown): DescriptionFormat {
  if (value === undefined || value === null) {
    return DEFAULT_DESCRIPTION_FORMAT;
  }
  const format = DESCRIPTION_FORMATS.find((f) => f === value);
  if (!format) {
    throw new InvalidSpecError(
      "descriptionFormat",
      `must be one of: ${DESCRIPTION_FORMATS.join(", ")}`,
    );
  }
  return format;
}

function validateVerbose(value: unknown): Verbosity {
  if (value === undefined || value === null) {
    return DEFAULT_VERBOSITY;
  }
  if (value === 0 || value === 1 || value === 2) {
    return value;
  }
  throw new InvalidSpecError("verbose", "must be 0, 1 or 2");
}

function validateProxies(value: unknown): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new InvalidSpecError("proxies", "must be an array of strings");
  }

  return value.map((raw: unknown, index) => {
    if (typeof raw !== "string") {
      throw new InvalidSpecError(`proxies[${index}]`, "must be a string");
    }
    try {
      parseProxy(raw);
    } catch (err) {
      if (err instanceof InvalidProxyError) {
        throw new InvalidSpecError(`proxies[${index}]`, err.message);
      }
      throw err;
    }
    return raw.trim();
  });
}

/**
 * Validate loose input and build a frozen SearchSpec
 *
 * @param input - Untrusted search input
 * @param knownSites - Registered site ids (defaults to all sources)
 * @throws {InvalidSpecError} On the first invalid field
 */
export function validateSearchSpec(
  input: unknown,
  knownSites: readonly SiteId[] = SITE_IDS,
): SearchSpec {
  if (typeof input !== "object" || input === null || Array.isArray(input)) {
    throw new InvalidSpecError("input", "must be an object");
  }
  const raw: SearchSpecInput = input;

  const location = validateOptionalString(raw.location, "location");
  if (location !== undefined && location.length < MIN_SEARCH_TERM_LENGTH) {
    throw new InvalidSpecError(
      "location",
      `must be at least ${MIN_SEARCH_TERM_LENGTH} characters`,
    );
  }
  const hoursOld = validateHoursOld(raw.hoursOld);
  const country = validateOptionalString(raw.country, "country");
  const caCertPath = validateOptionalString(raw.caCertPath, "caCertPath");

  const spec: SearchSpec = {
    searchTerm: validateSearchTerm(raw.searchTerm),
    ...(location !== undefined ? { location } : {}),
    sites: Object.freeze(validateSites(raw.sites, knownSites)),
    resultsWanted: validateInteger(
      raw.resultsWanted,
      "resultsWanted",
      1,
      MAX_RESULTS_WANTED,
      DEFAULT_RESULTS_WANTED,
    ),
    ...(hoursOld !== undefined ? { hoursOld } : {}),
    fetchDescription: validateBoolean(raw.fetchDescription, "fetchDescription", false),
    descriptionFormat: validateDescriptionFormat(raw.descriptionFormat),
    ...(country !== undefined ? { country } : {}),
    proxies: Object.freeze(validateProxies(raw.proxies)),
    ...(caCertPath !== undefined ? { caCertPath } : {}),
    verbose: validateVerbose(raw.verbose),
    deadlineMs: validateInteger(
      raw.deadlineMs,
      "deadlineMs",
      1,
      MAX_SEARCH_DEADLINE_MS,
      DEFAULT_SEARCH_DEADLINE_MS,
    ),
  };

  return Object.freeze(spec);
}
