/**
 * Company name normalization for duplicate detection
 */

import { normalizeForMatch } from "@/utils/text/normalizeText";

/**
 * Trailing legal-form noise across the markets we scrape
 * (Ltda, S.A., Inc, Corp, LLC, GmbH, ME/EIRELI...)
 */
const LEGAL_SUFFIX_PATTERN =
  /[,\s]+(?:ltda\.?|s\.?\s?a\.?|s\.?\s?l\.?u?\.?|inc\.?|corp\.?|corporation|co\.?|llc|ltd\.?|limited|gmbh|plc|eireli|me|epp)$/;

/**
 * Normalize a company name into a comparison key
 *
 * Rules:
 * - lowercase, strip diacritics, collapse whitespace
 * - drop trailing legal suffixes (repeatedly, "Acme Brasil Ltda. ME" -> "acme brasil")
 * - drop trailing punctuation
 *
 * @example
 * normalizeCompanyName("Acme, Inc.") // "acme"
 * normalizeCompanyName("Padaria São João LTDA") // "padaria sao joao"
 */
export function normalizeCompanyName(raw: string): string {
  if (!raw) return "";

  let normalized = normalizeForMatch(raw);
  let previous: string;
  do {
    previous = normalized;
    normalized = normalized.replace(LEGAL_SUFFIX_PATTERN, "").replace(/[.,\s]+$/, "");
  } while (normalized !== previous && normalized.length > 0);

  return normalized;
}
