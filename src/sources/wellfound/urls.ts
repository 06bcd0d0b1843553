/**
 * Wellfound search URL construction from title/location slug tables
 */

import {
  WELLFOUND_BASE_URL,
  WELLFOUND_DEFAULT_LOCATION_SLUG,
  WELLFOUND_DEFAULT_ROLE_SLUG,
  WELLFOUND_REMOTE_SLUG,
} from "@/constants/clients/wellfound";
import { normalizeForMatch } from "@/utils/text/normalizeText";
import slugTables from "./data/slugs.json";

const ROLE_SLUGS: ReadonlyMap<string, string> = new Map(Object.entries(slugTables.roles));
const LOCATION_SLUGS: ReadonlyMap<string, string> = new Map(Object.entries(slugTables.locations));
const CATEGORIES: readonly string[] = slugTables.categories;

/**
 * Lowercase, strip punctuation, dash-separate ("Senior Dev (Go)" -> "senior-dev-go")
 */
export function slugify(text: string): string {
  return normalizeForMatch(text)
    .replace(/[^\w\s-]/g, "")
    .trim()
    .replace(/\s+/g, "-")
    .replace(/-+/g, "-");
}

/**
 * Role slug: table entry, exact category, first category sharing a word, default
 */
export function resolveRoleSlug(searchTerm: string): string {
  const key = normalizeForMatch(searchTerm);
  if (!key) return WELLFOUND_DEFAULT_ROLE_SLUG;

  const mapped = ROLE_SLUGS.get(key);
  if (mapped) return mapped;

  const slug = slugify(searchTerm);
  if (CATEGORIES.includes(slug)) return slug;

  const words = new Set(slug.split("-"));
  const related = CATEGORIES.find((category) =>
    category.split("-").some((word) => words.has(word)),
  );
  return related ?? WELLFOUND_DEFAULT_ROLE_SLUG;
}

/**
 * Location slug: table entry, "remote" for any remote phrasing, generic slug
 */
export function resolveLocationSlug(location: string | undefined): string {
  if (!location) return WELLFOUND_DEFAULT_LOCATION_SLUG;

  const key = normalizeForMatch(location);
  const mapped = LOCATION_SLUGS.get(key);
  if (mapped) return mapped;

  if (key.includes("remote")) return WELLFOUND_REMOTE_SLUG;

  return slugify(location) || WELLFOUND_DEFAULT_LOCATION_SLUG;
}

/**
 * Search URL for a (1-based) page
 *
 * @example
 * buildSearchUrl("Software Engineer", "Porto, Portugal", 1)
 * // "https://wellfound.com/role/l/software-engineer/porto"
 * buildSearchUrl("Data Scientist", "Remote", 2)
 * // "https://wellfound.com/remote/data-scientist-jobs?page=2"
 */
export function buildSearchUrl(
  searchTerm: string,
  location: string | undefined,
  page: number,
): string {
  const role = resolveRoleSlug(searchTerm);
  const place = resolveLocationSlug(location);

  const path =
    place === WELLFOUND_REMOTE_SLUG
      ? `/remote/${role}-jobs`
      : `/role/l/${role}/${place}`;

  return page > 1 ? `${WELLFOUND_BASE_URL}${path}?page=${page}` : `${WELLFOUND_BASE_URL}${path}`;
}
