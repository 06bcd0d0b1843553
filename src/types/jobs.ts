/**
 * Canonical job record type definitions
 *
 * Every source converges to CanonicalRecord. RawJobPosting is the loose,
 * source-native intermediate shape that adapters emit and the normalizer
 * consumes.
 */

import type { DescriptionFormat, SiteId } from "./search";

/**
 * Canonical job type enumeration
 */
export type JobType =
  | "fulltime"
  | "parttime"
  | "contract"
  | "internship"
  | "temporary"
  | "unknown";

/**
 * Pay interval as reported by the source (never converted)
 */
export type CompensationInterval =
  | "hourly"
  | "daily"
  | "weekly"
  | "monthly"
  | "yearly";

/**
 * Where a compensation value came from
 */
export type CompensationSource = "structured" | "salary-text" | "description";

export type JobLocation = {
  readonly city?: string;
  readonly state?: string;
  readonly country?: string;
  /** Original free text, kept verbatim */
  readonly text?: string;
};

/**
 * Normalized compensation.
 * Invariant: min <= max and currency is always present.
 */
export type Compensation = {
  readonly min: number;
  readonly max: number;
  readonly currency: string;
  readonly interval?: CompensationInterval;
  readonly source: CompensationSource;
};

export type JobDescription = {
  readonly raw: string;
  readonly rendered: string;
  readonly format: DescriptionFormat;
};

/**
 * One normalized job posting (frozen once built)
 */
export type CanonicalRecord = {
  readonly id: string;
  readonly site: SiteId;
  readonly title: string;
  readonly company?: string;
  readonly location: JobLocation;
  readonly jobType: JobType;
  readonly postedAt?: Date;
  readonly jobUrl: string;
  readonly jobUrlDirect?: string;
  readonly description?: JobDescription;
  readonly compensation?: Compensation;
  readonly emails: readonly string[];
  readonly isRemote: boolean;
};

/**
 * Structured salary as reported by a source, before normalization
 */
export type RawSalary = {
  min?: number | string;
  max?: number | string;
  currency?: string;
  interval?: string;
};

/**
 * Source-native posting emitted by adapters
 */
export type RawJobPosting = {
  site: SiteId;
  /** Source-specific id (prefixed with the site during normalization) */
  sourceId?: string;
  title: string;
  company?: string;
  /** Free-text location, used when structured parts are missing */
  locationText?: string;
  city?: string;
  state?: string;
  country?: string;
  /** Raw job type strings or codes, in source order */
  jobTypes?: string[];
  /** ISO string, epoch millis, relative phrase or Date */
  postedAt?: string | number | Date;
  jobUrl: string;
  jobUrlDirect?: string;
  description?: {
    content: string;
    format: "html" | "plain";
  };
  salary?: RawSalary;
  /** Free-text compensation snippet shown in the listing */
  salaryText?: string;
  isRemote?: boolean;
};
