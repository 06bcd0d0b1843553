/**
 * Job type mapping: multilingual synonyms and source codes to JobType
 */

import type { JobType } from "@/types";
import { containsTerm, normalizeForMatch } from "@/utils/text/normalizeText";
import synonymsData from "./data/jobTypeSynonyms.json";

type MappedJobType = Exclude<JobType, "unknown">;

// Checked in this order when a string mentions several types
const JOB_TYPE_ORDER: readonly MappedJobType[] = [
  "internship",
  "temporary",
  "contract",
  "parttime",
  "fulltime",
];

const SYNONYMS: ReadonlyMap<MappedJobType, readonly string[]> = new Map(
  JOB_TYPE_ORDER.map((type) => [type, synonymsData[type].map(normalizeForMatch)]),
);

/**
 * Map one raw job type string (label, code or phrase) to a JobType
 *
 * Exact synonym matches win; otherwise the first type whose synonym appears
 * as a whole word in the text. Unmapped values give "unknown".
 *
 * @example
 * mapJobType("Tempo Integral") // "fulltime"
 * mapJobType("vacancy_type_internship") // "internship"
 * mapJobType("Full-time or Contract") // "contract"
 */
export function mapJobType(raw: string): JobType {
  const text = normalizeForMatch(raw);
  if (!text) return "unknown";

  for (const type of JOB_TYPE_ORDER) {
    if (SYNONYMS.get(type)?.includes(text)) {
      return type;
    }
  }

  for (const type of JOB_TYPE_ORDER) {
    if (SYNONYMS.get(type)?.some((synonym) => containsTerm(text, synonym))) {
      return type;
    }
  }

  return "unknown";
}

/**
 * Resolve a posting's job type from its raw hints, first mapped hint wins
 */
export function resolveJobType(hints: readonly string[] | undefined): JobType {
  for (const hint of hints ?? []) {
    const mapped = mapJobType(hint);
    if (mapped !== "unknown") {
      return mapped;
    }
  }
  return "unknown";
}
