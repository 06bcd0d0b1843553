/**
 * Wellfound page parsing: search results HTML to listings
 *
 * Listings come from the embedded __NEXT_DATA__ JSON when it carries them,
 * otherwise from job anchors (/jobs/{id}-{slug}) and the card around them.
 */

import { load, type CheerioAPI } from "cheerio";
import type {
  WellfoundListing,
  WellfoundPageInfo,
  WellfoundSearchPage,
} from "@/types/clients/wellfound";
import {
  WELLFOUND_BLOCK_MARKERS,
  WELLFOUND_NEXT_DATA_JOB_PATHS,
} from "@/constants/clients/wellfound";
import { collapseWhitespace } from "@/utils/text/normalizeText";

const JOB_HREF_PATTERN = /\/jobs\/(\d+)-/;
const PAGE_INFO_PATTERN = /Page\s+(\d+)\s+of\s+(\d+)/i;
const TOTAL_RESULTS_PATTERN = /([\d,]+)\s+results?\s+total/i;
const JOB_TYPE_LABELS = ["full-time", "part-time", "contract", "internship", "cofounder"];
const SALARY_TEXT_PATTERN = /[$€£]\s?[\d,.]+\s?k?(?:\s*[-–]\s*[$€£]?\s?[\d,.]+\s?k?)?/i;
const POSTED_TEXT_PATTERN =
  /\b(?:\d+\+?\s+(?:minute|hour|day|week|month|year)s?\s+ago|today|yesterday|just now)\b/i;
const LOCATION_HINT_PATTERN = /remote|europe|worldwide|anywhere|,|•/i;

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function getPath(root: unknown, path: readonly string[]): unknown {
  let current: unknown = root;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

/**
 * Absolute URL for an href, undefined when it cannot be resolved
 */
function resolveUrl(href: string, baseUrl: string): string | undefined {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return undefined;
  }
}

/**
 * String from a JSON value: strings, numbers, {name}, or arrays of those
 */
function textOf(value: unknown): string | undefined {
  if (typeof value === "string") {
    const cleaned = collapseWhitespace(value);
    return cleaned || undefined;
  }
  if (typeof value === "number") return String(value);
  if (Array.isArray(value)) {
    const parts = value.map(textOf).filter((part): part is string => part !== undefined);
    return parts.length > 0 ? parts.join(", ") : undefined;
  }
  if (isRecord(value)) {
    return textOf(value.name ?? value.displayName ?? value.label);
  }
  return undefined;
}

function pick(item: JsonRecord, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const text = textOf(item[key]);
    if (text) return text;
  }
  return undefined;
}

/**
 * Strip "Job:" / "Role:" / "Position:" prefixes and collapse whitespace
 */
export function cleanListingText(text: string): string {
  return collapseWhitespace(text).replace(/^(?:job|position|role):\s*/i, "");
}

/**
 * Whether the page is an anti-bot interstitial
 */
export function isBlockedPage(html: string): boolean {
  const lower = html.toLowerCase();
  return WELLFOUND_BLOCK_MARKERS.some((marker) => lower.includes(marker.toLowerCase()));
}

/**
 * Results announced but nothing parseable: markup served to bots
 */
export function hidesListings(page: WellfoundSearchPage): boolean {
  return page.listings.length === 0 && (page.totalResults ?? 0) > 0;
}

/**
 * Read "Page X of Y" and "N results total" from the page text
 */
export function parsePaginationText(text: string): {
  pageInfo?: WellfoundPageInfo;
  totalResults?: number;
} {
  const page = text.match(PAGE_INFO_PATTERN);
  const total = text.match(TOTAL_RESULTS_PATTERN);
  return {
    ...(page
      ? { pageInfo: { currentPage: Number(page[1]), totalPages: Number(page[2]) } }
      : {}),
    ...(total ? { totalResults: Number(total[1].replace(/,/g, "")) } : {}),
  };
}

function mapNextDataItem(item: unknown, baseUrl: string): WellfoundListing | null {
  if (!isRecord(item)) return null;

  const title = pick(item, ["title", "jobTitle", "name", "position"]);
  const id = pick(item, ["id", "jobId"]);
  const href = pick(item, ["url", "link", "jobUrl", "permalink", "slug"]);
  const jobUrl =
    (href ? resolveUrl(href, baseUrl) : undefined) ??
    (id ? resolveUrl(`/jobs/${id}`, baseUrl) : undefined);

  if (!title || !jobUrl) return null;

  const company = pick(item, ["company", "companyName", "startup", "organization"]);
  const location = pick(item, ["location", "locationNames", "city", "region", "area"]);
  const jobType = pick(item, ["jobType", "type", "employmentType"]);
  const salaryText = pick(item, ["salary", "compensation", "pay", "wage"]);
  const postedText = pick(item, ["postedAt", "liveStartAt", "createdAt", "publishedAt"]);
  const description = pick(item, ["description", "summary", "details"]);
  const remote = typeof item.remote === "boolean" ? item.remote : undefined;

  return {
    ...(id ? { id } : {}),
    title: cleanListingText(title),
    ...(company ? { company } : {}),
    ...(location ? { location } : {}),
    ...(jobType ? { jobType } : {}),
    ...(salaryText ? { salaryText } : {}),
    ...(postedText ? { postedText } : {}),
    jobUrl,
    ...(description ? { description } : {}),
    ...(remote !== undefined ? { remote } : {}),
  };
}

/**
 * Listings from the embedded __NEXT_DATA__ payload (empty when absent or unusable)
 */
export function parseNextData($: CheerioAPI, baseUrl: string): WellfoundListing[] {
  const raw = $("script#__NEXT_DATA__").first().text();
  if (!raw.trim()) return [];

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    // Malformed payload: callers fall back to anchors
    return [];
  }

  for (const path of WELLFOUND_NEXT_DATA_JOB_PATHS) {
    const list = getPath(data, path);
    if (Array.isArray(list) && list.length > 0) {
      return list
        .map((item) => mapNextDataItem(item, baseUrl))
        .filter((listing): listing is WellfoundListing => listing !== null);
    }
  }
  return [];
}

/**
 * Listings from job anchors and the card markup around them
 */
export function parseAnchors($: CheerioAPI, baseUrl: string): WellfoundListing[] {
  const listings: WellfoundListing[] = [];
  const seen = new Set<string>();

  $("a[href*='/jobs/']").each((_, el) => {
    const anchor = $(el);
    const href = anchor.attr("href") ?? "";
    const id = href.match(JOB_HREF_PATTERN)?.[1];
    const title = cleanListingText(anchor.text());
    const jobUrl = resolveUrl(href, baseUrl);
    if (!id || !title || !jobUrl || seen.has(id)) return;
    seen.add(id);

    // Card: the largest ancestor (up to 5 levels) holding no other job
    let card = anchor.parent();
    for (const ancestor of anchor.parents().slice(0, 5).toArray()) {
      const ids = new Set(
        $(ancestor)
          .find("a[href*='/jobs/']")
          .toArray()
          .map((a) => ($(a).attr("href") ?? "").match(JOB_HREF_PATTERN)?.[1])
          .filter((value): value is string => value !== undefined),
      );
      if (ids.size > 1) break;
      card = $(ancestor);
    }

    // Company: nearest /company/ link with text, then a company heading
    let company: string | undefined;
    for (const ancestor of anchor.parents().slice(0, 10).toArray()) {
      const scope = $(ancestor);
      const link = scope
        .find("a[href*='/company/']")
        .toArray()
        .map((a) => collapseWhitespace($(a).text()))
        .find((text) => text.length > 0);
      const heading = scope
        .find("h2")
        .filter((_, h) => /font-semibold|company/i.test($(h).attr("class") ?? ""))
        .toArray()
        .map((h) => collapseWhitespace($(h).text()))
        .find((text) => text.length > 0 && text.length < 100);
      company = link ?? heading;
      if (company) break;
    }

    const spans = card
      .find("span")
      .toArray()
      .map((span) => ({
        text: collapseWhitespace($(span).text()),
        className: $(span).attr("class") ?? "",
      }))
      .filter((span) => span.text.length > 0);

    const jobType = spans.find(
      (span) =>
        /accent-yellow|bg-accent/i.test(span.className) &&
        JOB_TYPE_LABELS.includes(span.text.toLowerCase()),
    )?.text;
    const location =
      spans.find((span) => /\bpl-1\b/.test(span.className))?.text ??
      spans.find(
        (span) =>
          LOCATION_HINT_PATTERN.test(span.text) &&
          !SALARY_TEXT_PATTERN.test(span.text) &&
          span.text.length < 80,
      )?.text;

    const cardText = collapseWhitespace(card.text());
    const salaryText = cardText.match(SALARY_TEXT_PATTERN)?.[0];
    const postedText = cardText.match(POSTED_TEXT_PATTERN)?.[0];

    listings.push({
      id,
      title,
      ...(company ? { company } : {}),
      ...(location ? { location } : {}),
      ...(jobType ? { jobType } : {}),
      ...(salaryText ? { salaryText: salaryText.trim() } : {}),
      ...(postedText ? { postedText } : {}),
      jobUrl,
    });
  });

  return listings;
}

/**
 * Parse one search results page
 */
export function parseSearchPage(html: string, baseUrl: string): WellfoundSearchPage {
  const $ = load(html);
  const fromJson = parseNextData($, baseUrl);
  const listings = fromJson.length > 0 ? fromJson : parseAnchors($, baseUrl);

  return {
    listings,
    ...parsePaginationText(collapseWhitespace($.root().text())),
  };
}
