/**
 * Gupy raw API response types: minimal shapes for mapping
 *
 * Only the fields we map from the public job search endpoint
 * (portal.api.gupy.io/api/job). Everything is optional: the payload is
 * not under our control.
 */

export type GupyJobListItem = {
  id?: number | string;
  name?: string;
  careerPageName?: string;
  careerPageUrl?: string;
  careerPageLogo?: string;
  description?: string;
  jobUrl?: string;
  publishedDate?: string;
  applicationDeadline?: string;
  isRemoteWork?: boolean;
  workplaceType?: string;
  city?: string;
  state?: string;
  country?: string;
  type?: string;
};

export type GupyPagination = {
  offset?: number;
  limit?: number;
  total?: number;
};

export type GupyListResponse = {
  data?: GupyJobListItem[];
  pagination?: GupyPagination;
};
