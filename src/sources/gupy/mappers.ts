/**
 * Gupy mappers: API payload to RawJobPosting
 */

import type { RawJobPosting } from "@/types";
import type { GupyJobListItem, GupyListResponse } from "@/types/clients/gupy";
import {
  GUPY_COUNTRY_WIDE_LOCATIONS,
  GUPY_DEFAULT_COUNTRY,
  GUPY_HYBRID_JOB_TYPE_HINT,
  GUPY_HYBRID_WORKPLACE_TYPES,
  GUPY_REMOTE_WORKPLACE_TYPES,
} from "@/constants/clients/gupy";
import { normalizeForMatch } from "@/utils/text/normalizeText";

function nonEmpty(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

/**
 * Narrow an untrusted body to a list response with a `data` array
 *
 * Items stay unknown until isGupyJobItem accepts them.
 */
export function isGupyListResponse(body: unknown): body is Omit<GupyListResponse, "data"> & {
  data: unknown[];
} {
  return (
    typeof body === "object" &&
    body !== null &&
    "data" in body &&
    Array.isArray(body.data)
  );
}

export function isGupyJobItem(item: unknown): item is GupyJobListItem {
  return typeof item === "object" && item !== null && !Array.isArray(item);
}

/**
 * HTML or captcha page where JSON was expected
 */
export function isGupyBlockedBody(body: unknown): boolean {
  return typeof body === "string" && /<html|<!doctype|captcha/i.test(body);
}

/**
 * Map one API item; returns null when title or URL is missing
 */
export function mapGupyJobToRaw(item: GupyJobListItem): RawJobPosting | null {
  const title = nonEmpty(item.name);
  const jobUrl = nonEmpty(item.jobUrl);
  if (!title || !jobUrl) {
    return null;
  }

  const city = nonEmpty(item.city);
  const state = nonEmpty(item.state);
  const country = nonEmpty(item.country) ?? GUPY_DEFAULT_COUNTRY;
  const workplaceType = nonEmpty(item.workplaceType)?.toLowerCase();
  const description = nonEmpty(item.description);
  const type = nonEmpty(item.type);
  // Hybrid postings are full-time unless the vacancy type says otherwise
  const jobTypes = [
    ...(type ? [type] : []),
    ...(workplaceType && GUPY_HYBRID_WORKPLACE_TYPES.includes(workplaceType)
      ? [GUPY_HYBRID_JOB_TYPE_HINT]
      : []),
  ];
  const careerPageUrl = nonEmpty(item.careerPageUrl);
  const company = nonEmpty(item.careerPageName);
  const publishedDate = nonEmpty(item.publishedDate);

  return {
    site: "gupy",
    ...(item.id !== undefined ? { sourceId: String(item.id) } : {}),
    title,
    ...(company ? { company } : {}),
    ...(city ? { city } : {}),
    ...(state ? { state } : {}),
    country,
    locationText: [city, state, country].filter(Boolean).join(", "),
    ...(jobTypes.length > 0 ? { jobTypes } : {}),
    ...(publishedDate ? { postedAt: publishedDate } : {}),
    jobUrl,
    ...(careerPageUrl ? { jobUrlDirect: careerPageUrl } : {}),
    ...(description ? { description: { content: description, format: "html" as const } } : {}),
    isRemote:
      item.isRemoteWork === true ||
      (workplaceType !== undefined && GUPY_REMOTE_WORKPLACE_TYPES.includes(workplaceType)),
  };
}

/**
 * Client-side location filter (the API has no location parameter)
 *
 * Country-wide searches ("Brasil") accept every posting; otherwise the
 * search location must appear in the city, the state or "city state".
 */
export function matchesGupyLocation(posting: RawJobPosting, location: string | undefined): boolean {
  if (!location) return true;

  const wanted = normalizeForMatch(location);
  if (GUPY_COUNTRY_WIDE_LOCATIONS.includes(wanted)) {
    return true;
  }

  const city = normalizeForMatch(posting.city ?? "");
  const state = normalizeForMatch(posting.state ?? "");
  const combined = `${city} ${state}`.trim();

  return (
    (city.length > 0 && city.includes(wanted)) ||
    (state.length > 0 && state.includes(wanted)) ||
    (combined.length > 0 && combined.includes(wanted)) ||
    (city.length > 0 && wanted.includes(city))
  );
}
