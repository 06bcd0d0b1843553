/**
 * Wellfound listing types: shapes extracted from search result pages
 */

/**
 * One listing extracted from a search page (HTML anchors or embedded JSON)
 */
export type WellfoundListing = {
  id?: string;
  title: string;
  company?: string;
  location?: string;
  jobType?: string;
  salaryText?: string;
  postedText?: string;
  jobUrl: string;
  description?: string;
  remote?: boolean;
};

/**
 * Pagination info read from the "Page X of Y" header
 */
export type WellfoundPageInfo = {
  currentPage: number;
  totalPages: number;
};

/**
 * Parsed search page
 */
export type WellfoundSearchPage = {
  listings: WellfoundListing[];
  pageInfo?: WellfoundPageInfo;
  /** "N results total" as printed on the page */
  totalResults?: number;
};
