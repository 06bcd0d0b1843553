/**
 * Search spec constants: bounds and defaults applied during validation
 */

import type { DescriptionFormat, SiteId, Verbosity } from "@/types";

/**
 * Upper bound for resultsWanted
 */
export const MAX_RESULTS_WANTED = 500;

export const DEFAULT_RESULTS_WANTED = 30;

export const MIN_SEARCH_TERM_LENGTH = 2;

export const DEFAULT_DESCRIPTION_FORMAT: DescriptionFormat = "markdown";

export const DESCRIPTION_FORMATS: readonly DescriptionFormat[] = [
  "markdown",
  "html",
  "plain",
];

export const DEFAULT_VERBOSITY: Verbosity = 1;

/**
 * Default per-invocation wall-clock budget (2 minutes)
 */
export const DEFAULT_SEARCH_DEADLINE_MS = 120_000;

/**
 * Upper bound for deadlineMs (15 minutes)
 */
export const MAX_SEARCH_DEADLINE_MS = 900_000;

export const MS_PER_HOUR = 3_600_000;

/**
 * Registered source ids, in default fan-out order
 */
export const SITE_IDS: readonly SiteId[] = ["gupy", "wellfound"];
