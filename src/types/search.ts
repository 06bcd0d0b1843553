/**
 * Search input and validated search type definitions
 *
 * A SearchSpec is built once per request by validateSearchSpec() and is
 * read-only afterwards. SearchSpecInput is the loose shape accepted from
 * callers (CLI, job queue, library users) before validation.
 */

/**
 * Registered source identifiers.
 * Adding a source means adding a variant here and a registry entry.
 */
export type SiteId = "gupy" | "wellfound";

/**
 * Output format for rendered job descriptions
 */
export type DescriptionFormat = "markdown" | "html" | "plain";

/**
 * Verbosity level: 0 = quiet, 1 = normal, 2 = detailed
 */
export type Verbosity = 0 | 1 | 2;

/**
 * Validated, immutable search parameters
 */
export type SearchSpec = {
  readonly searchTerm: string;
  readonly location?: string;
  readonly sites: readonly SiteId[];
  readonly resultsWanted: number;
  /** Maximum posting age in hours */
  readonly hoursOld?: number;
  /** Run the secondary per-posting description fetch (multiplies request volume) */
  readonly fetchDescription: boolean;
  readonly descriptionFormat: DescriptionFormat;
  /** Target country hint (e.g. "Brazil", "Portugal") */
  readonly country?: string;
  /** Proxy list; empty means direct connection */
  readonly proxies: readonly string[];
  /** Custom CA certificate path for TLS-intercepting proxies */
  readonly caCertPath?: string;
  readonly verbose: Verbosity;
  /** Per-invocation wall-clock budget */
  readonly deadlineMs: number;
};

/**
 * Loose search input prior to validation
 */
export type SearchSpecInput = {
  searchTerm?: unknown;
  location?: unknown;
  sites?: unknown;
  resultsWanted?: unknown;
  hoursOld?: unknown;
  fetchDescription?: unknown;
  descriptionFormat?: unknown;
  country?: unknown;
  proxies?: unknown;
  caCertPath?: unknown;
  verbose?: unknown;
  deadlineMs?: unknown;
};
