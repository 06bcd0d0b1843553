/**
 * Location parsing: structured parts or free text to JobLocation
 */

import type { JobLocation, RawJobPosting } from "@/types";
import { REMOTE_KEYWORDS } from "@/constants";
import { collapseWhitespace, containsTerm, normalizeForMatch } from "@/utils/text/normalizeText";
import countryAliases from "./data/countries.json";

const COUNTRY_ALIASES: ReadonlyMap<string, string> = new Map(Object.entries(countryAliases));

const LOCATION_SEPARATOR = /\s*[,•|]\s*|\s+-\s+/;

/**
 * Canonical country name for a known alias, or undefined
 *
 * @example
 * canonicalCountry("Brasil") // "Brazil"
 */
export function canonicalCountry(value: string): string | undefined {
  return COUNTRY_ALIASES.get(normalizeForMatch(value));
}

/**
 * Whether the text carries a remote-work marker
 */
export function hasRemoteMarker(text: string | undefined): boolean {
  if (!text) return false;
  const normalized = normalizeForMatch(text);
  return REMOTE_KEYWORDS.some((keyword) => containsTerm(normalized, normalizeForMatch(keyword)));
}

/**
 * Split free text into location parts
 *
 * - 3+ parts: city, state, country (last)
 * - 2 parts: city + country when the second is a known country, else city + state
 * - 1 part: country when known, else city
 * - remote markers: no parts, text only
 */
export function parseLocationText(text: string): Omit<JobLocation, "text"> {
  if (hasRemoteMarker(text)) {
    return {};
  }

  const parts = text
    .split(LOCATION_SEPARATOR)
    .map(collapseWhitespace)
    .filter((part) => part.length > 0);

  if (parts.length >= 3) {
    const last = parts[parts.length - 1];
    return {
      city: parts[0],
      state: parts[1],
      country: canonicalCountry(last) ?? last,
    };
  }

  if (parts.length === 2) {
    const country = canonicalCountry(parts[1]);
    return country ? { city: parts[0], country } : { city: parts[0], state: parts[1] };
  }

  if (parts.length === 1) {
    const country = canonicalCountry(parts[0]);
    return country ? { country } : { city: parts[0] };
  }

  return {};
}

function clean(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const collapsed = collapseWhitespace(value);
  return collapsed.length > 0 ? collapsed : undefined;
}

/**
 * Build a JobLocation from a raw posting
 *
 * Structured parts win over parsed text; the free text is always kept;
 * the country hint fills a missing country.
 */
export function parseLocation(
  raw: Pick<RawJobPosting, "city" | "state" | "country" | "locationText">,
  countryHint?: string,
): JobLocation {
  const text = clean(raw.locationText);
  const city = clean(raw.city);
  const state = clean(raw.state);
  const rawCountry = clean(raw.country);

  const hasStructured = city !== undefined || state !== undefined || rawCountry !== undefined;
  const parsed = !hasStructured && text ? parseLocationText(text) : {};

  const resolvedCity = city ?? parsed.city;
  const resolvedState = state ?? parsed.state;
  const country =
    (rawCountry ? canonicalCountry(rawCountry) ?? rawCountry : undefined) ??
    parsed.country ??
    (countryHint ? canonicalCountry(countryHint) ?? countryHint : undefined);

  const fallbackText =
    text ?? ([resolvedCity, resolvedState, country].filter(Boolean).join(", ") || undefined);

  return {
    ...(resolvedCity ? { city: resolvedCity } : {}),
    ...(resolvedState ? { state: resolvedState } : {}),
    ...(country ? { country } : {}),
    ...(fallbackText ? { text: fallbackText } : {}),
  };
}
