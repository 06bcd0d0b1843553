/**
 * CSV export of aggregated records
 *
 * Text fields are always quoted; numbers and booleans are written bare.
 * Missing values become an empty quoted field.
 */

import type { AggregateResult, CanonicalRecord } from "@/types";

type CsvValue = string | number | boolean | undefined;

type CsvColumn = {
  header: string;
  value: (record: CanonicalRecord) => CsvValue;
};

const CSV_COLUMNS: readonly CsvColumn[] = [
  { header: "id", value: (r) => r.id },
  { header: "site", value: (r) => r.site },
  { header: "title", value: (r) => r.title },
  { header: "company", value: (r) => r.company },
  { header: "city", value: (r) => r.location.city },
  { header: "state", value: (r) => r.location.state },
  { header: "country", value: (r) => r.location.country },
  { header: "location", value: (r) => r.location.text },
  { header: "job_type", value: (r) => r.jobType },
  { header: "date_posted", value: (r) => r.postedAt?.toISOString() },
  { header: "job_url", value: (r) => r.jobUrl },
  { header: "job_url_direct", value: (r) => r.jobUrlDirect },
  { header: "is_remote", value: (r) => r.isRemote },
  { header: "min_amount", value: (r) => r.compensation?.min },
  { header: "max_amount", value: (r) => r.compensation?.max },
  { header: "currency", value: (r) => r.compensation?.currency },
  { header: "interval", value: (r) => r.compensation?.interval },
  { header: "emails", value: (r) => (r.emails.length > 0 ? r.emails.join(", ") : undefined) },
  { header: "description", value: (r) => r.description?.rendered },
];

export function escapeCsvField(value: CsvValue): string {
  if (typeof value === "number") {
    return Number.isFinite(value) ? String(value) : '""';
  }
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  return `"${(value ?? "").replace(/"/g, '""')}"`;
}

/**
 * Render records as CSV (header row first, newline-terminated)
 */
export function toCsv(result: Pick<AggregateResult, "records">): string {
  const lines = [CSV_COLUMNS.map((c) => escapeCsvField(c.header)).join(",")];
  for (const record of result.records) {
    lines.push(CSV_COLUMNS.map((c) => escapeCsvField(c.value(record))).join(","));
  }
  return lines.join("\n") + "\n";
}
