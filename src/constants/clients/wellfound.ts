/**
 * Wellfound client constants: URL slugs, page caps, block markers
 */

export const WELLFOUND_BASE_URL = "https://wellfound.com";

export const WELLFOUND_MAX_PAGES = 10;

export const WELLFOUND_DEFAULT_ROLE_SLUG = "software-engineer";

export const WELLFOUND_DEFAULT_LOCATION_SLUG = "europe";

export const WELLFOUND_REMOTE_SLUG = "remote";

/**
 * Listings per page, used to estimate pages from "N results total"
 */
export const WELLFOUND_RESULTS_PER_PAGE = 25;

/**
 * Markers of the DataDome / captcha interstitial
 */
export const WELLFOUND_BLOCK_MARKERS: readonly string[] = [
  "captcha-delivery.com",
  "geo.captcha-delivery",
  "datadome",
  "Please enable JS and disable any ad blocker",
];

/**
 * Paths inside __NEXT_DATA__ that may hold the listings array
 */
export const WELLFOUND_NEXT_DATA_JOB_PATHS: ReadonlyArray<readonly string[]> = [
  ["props", "pageProps", "jobs"],
  ["props", "pageProps", "jobListings"],
  ["props", "initialState", "jobs"],
  ["jobs"],
  ["data", "jobs"],
];

/**
 * Job page elements probed (in order) for the full description
 */
export const WELLFOUND_DESCRIPTION_SELECTORS: readonly string[] = [
  "[data-test='JobDescription']",
  "[class*='description']",
  "#job-description",
  "article",
];
