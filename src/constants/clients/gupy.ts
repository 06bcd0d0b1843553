/**
 * Gupy client constants: endpoints and pagination caps
 */

/**
 * Public job search endpoint (jobName, limit, offset)
 */
export const GUPY_API_SEARCH_URL = "https://portal.api.gupy.io/api/job";

/**
 * The API serves at most 50 postings per request
 */
export const GUPY_MAX_PAGE_SIZE = 50;

/**
 * Page cap per search
 */
export const GUPY_MAX_PAGES = 10;

export const GUPY_DEFAULT_COUNTRY = "Brasil";

export const GUPY_DEFAULT_CURRENCY = "BRL";

/**
 * Location searches that match every Gupy posting
 */
export const GUPY_COUNTRY_WIDE_LOCATIONS: readonly string[] = ["brasil", "brazil"];

/**
 * Workplace types that mean remote work
 */
export const GUPY_REMOTE_WORKPLACE_TYPES: readonly string[] = ["remote", "remoto"];

export const GUPY_HYBRID_WORKPLACE_TYPES: readonly string[] = ["hybrid", "hibrido", "híbrido"];

/**
 * Job type hint for hybrid postings, after the vacancy type code
 */
export const GUPY_HYBRID_JOB_TYPE_HINT = "full-time";

/**
 * Job page elements probed (in order) for the full description
 */
export const GUPY_DESCRIPTION_SELECTORS: readonly string[] = [
  "[data-testid='text-section']",
  "[class*='description']",
  "[class*='descricao']",
  "[id*='description']",
  "section[class*='content']",
];
