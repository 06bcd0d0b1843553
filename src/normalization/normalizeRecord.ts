/**
 * Record normalizer: RawJobPosting to CanonicalRecord
 *
 * Pure and total: malformed fields degrade to absent values, never to errors.
 */

import { createHash } from "crypto";
import type {
  CanonicalRecord,
  Compensation,
  DescriptionFormat,
  RawJobPosting,
  SalaryExtractionPolicy,
} from "@/types";
import { collapseWhitespace } from "@/utils/text/normalizeText";
import { resolveJobType } from "./jobType";
import { hasRemoteMarker, parseLocation } from "./location";
import { extractSalaryFromText, normalizeStructuredSalary } from "./salary";
import { htmlToPlainText, renderDescription } from "./description";
import { extractEmails } from "./emails";
import { parsePostedAt } from "./dates";

export type NormalizeContext = {
  salaryPolicy: SalaryExtractionPolicy;
  descriptionFormat: DescriptionFormat;
  countryHint?: string;
  /** Reference time for relative dates */
  now: Date;
};

const TITLE_PREFIX_PATTERN = /^(?:vaga|job|oportunidade|opening)\s*[:\-–]\s*/i;

/**
 * Clean a posting title ("Vaga: Dev Backend" -> "Dev Backend")
 */
export function cleanTitle(title: string): string {
  return collapseWhitespace(title).replace(TITLE_PREFIX_PATTERN, "");
}

/**
 * Stable record id: site + source id, or site + URL digest
 */
export function buildRecordId(raw: Pick<RawJobPosting, "site" | "sourceId" | "jobUrl">): string {
  if (raw.sourceId && raw.sourceId.trim()) {
    return `${raw.site}-${raw.sourceId.trim()}`;
  }
  const digest = createHash("sha1").update(raw.jobUrl).digest("hex").slice(0, 16);
  return `${raw.site}-${digest}`;
}

function resolveCompensation(
  raw: RawJobPosting,
  descriptionText: string | undefined,
  policy: SalaryExtractionPolicy,
): Compensation | undefined {
  if (raw.salary) {
    const structured = normalizeStructuredSalary(raw.salary);
    if (structured) return structured;
  }

  return (
    extractSalaryFromText(raw.salaryText, policy, "salary-text") ??
    extractSalaryFromText(descriptionText, policy, "description")
  );
}

/**
 * Normalize one raw posting
 */
export function normalizeRecord(raw: RawJobPosting, ctx: NormalizeContext): CanonicalRecord {
  const descriptionText = raw.description
    ? raw.description.format === "html"
      ? htmlToPlainText(raw.description.content)
      : raw.description.content
    : undefined;

  const description = raw.description
    ? renderDescription(raw.description.content, raw.description.format, ctx.descriptionFormat)
    : undefined;

  const company = raw.company ? collapseWhitespace(raw.company) : "";
  const postedAt = parsePostedAt(raw.postedAt, ctx.now);
  const compensation = resolveCompensation(raw, descriptionText, ctx.salaryPolicy);
  const title = cleanTitle(raw.title);

  const record: CanonicalRecord = {
    id: buildRecordId(raw),
    site: raw.site,
    title,
    ...(company ? { company } : {}),
    location: Object.freeze(parseLocation(raw, ctx.countryHint)),
    jobType: resolveJobType(raw.jobTypes),
    ...(postedAt ? { postedAt } : {}),
    jobUrl: raw.jobUrl,
    ...(raw.jobUrlDirect ? { jobUrlDirect: raw.jobUrlDirect } : {}),
    ...(description ? { description: Object.freeze(description) } : {}),
    ...(compensation ? { compensation: Object.freeze(compensation) } : {}),
    emails: Object.freeze(extractEmails(descriptionText)),
    isRemote: raw.isRemote ?? (hasRemoteMarker(raw.locationText) || hasRemoteMarker(title)),
  };

  return Object.freeze(record);
}
