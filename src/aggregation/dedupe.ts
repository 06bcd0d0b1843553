/**
 * Duplicate detection on normalized (title, company, location)
 */

import type { CanonicalRecord } from "@/types";
import { normalizeCompanyName } from "@/utils/identity/companyIdentity";
import { normalizeForMatch } from "@/utils/text/normalizeText";

/**
 * Dedupe key of a record
 *
 * @example
 * dedupeKey({ title: "Backend Dev ", company: "Acme Ltda", location: { text: "São Paulo" }, ... })
 * // "backend dev|acme|sao paulo"
 */
export function dedupeKey(record: Pick<CanonicalRecord, "title" | "company" | "location">): string {
  const { city, state, country, text } = record.location;
  const location = text ?? [city, state, country].filter(Boolean).join(", ");

  return [
    normalizeForMatch(record.title),
    normalizeCompanyName(record.company ?? ""),
    normalizeForMatch(location),
  ].join("|");
}

/**
 * Keep the first occurrence of each key, preserving order
 */
export function dedupeRecords(records: readonly CanonicalRecord[]): {
  records: CanonicalRecord[];
  duplicatesRemoved: number;
} {
  const seen = new Set<string>();
  const unique: CanonicalRecord[] = [];

  for (const record of records) {
    const key = dedupeKey(record);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(record);
  }

  return { records: unique, duplicatesRemoved: records.length - unique.length };
}
