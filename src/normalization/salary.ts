/**
 * Compensation normalization and free-text salary extraction
 *
 * Pure functions; nothing here throws. Amounts are never converted between
 * intervals: "$25/hour" stays hourly.
 */

import type {
  Compensation,
  CompensationInterval,
  CompensationSource,
  RawSalary,
  SalaryExtractionPolicy,
} from "@/types";
import {
  AMOUNT_PATTERN,
  CURRENCY_MARKERS,
  INTERVAL_KEYWORD_PATTERNS,
  INTERVAL_SYNONYMS,
  INTERVAL_WINDOW_CHARS,
  RANGE_SEPARATOR_PATTERN,
  THOUSANDS_SUFFIX_PATTERN,
  TRAILING_INTERVAL_PATTERN,
} from "@/constants";
import { escapeRegExp, normalizeForMatch } from "@/utils/text/normalizeText";

const CURRENCY_BY_MARKER: ReadonlyMap<string, string> = new Map(
  CURRENCY_MARKERS.map(([marker, code]) => [marker.toUpperCase(), code]),
);

const ISO_CODES: ReadonlySet<string> = new Set(CURRENCY_MARKERS.map(([, code]) => code));

// Alphabetic codes need word boundaries ("USD" but not "USDT"), symbols do not
const CURRENCY_ALTERNATION = CURRENCY_MARKERS.map(([marker]) =>
  /^[A-Z]+$/.test(marker) ? `\\b${marker}\\b` : escapeRegExp(marker),
).join("|");

const AMT = `(${AMOUNT_PATTERN})(${THOUSANDS_SUFFIX_PATTERN})?`;
const CUR = `(${CURRENCY_ALTERNATION})`;

/** Tier 1a: $120,000 - $180,000 / R$ 3.000 a 5.000 */
const PREFIX_RANGE = new RegExp(
  `${CUR}\\s?${AMT}${RANGE_SEPARATOR_PATTERN}(?:${CUR}\\s?)?${AMT}`,
);
/** Tier 1b: 50.000 - 70.000 EUR */
const SUFFIX_RANGE = new RegExp(`${AMT}${RANGE_SEPARATOR_PATTERN}${AMT}\\s?${CUR}`);
/** Tier 2a: €45k */
const PREFIX_SINGLE = new RegExp(`${CUR}\\s?${AMT}`);
/** Tier 2b: 4500 BRL */
const SUFFIX_SINGLE = new RegExp(`${AMT}\\s?${CUR}`);
/** Tier 3: 25-30 per hour (source default currency) */
const KEYWORD_AMOUNT = new RegExp(
  `${AMT}(?:${RANGE_SEPARATOR_PATTERN}${AMT})?(?=${TRAILING_INTERVAL_PATTERN})`,
  "i",
);

/**
 * Parse a localized amount string
 *
 * - "120,000" and "120.000" are thousands-grouped
 * - "5.000,00" and "5,000.00" use the last separator as decimal point
 * - "12,5" and "12.5" are decimals
 * - a "k" suffix multiplies by 1000
 *
 * @returns The amount, or undefined for non-numeric input
 */
export function parseAmount(text: string): number | undefined {
  const match = text.trim().match(/^([\d.,]+)\s?([kK])?$/);
  if (!match) return undefined;

  let digits = match[1];
  const lastDot = digits.lastIndexOf(".");
  const lastComma = digits.lastIndexOf(",");

  if (lastDot >= 0 && lastComma >= 0) {
    const decimalSep = lastDot > lastComma ? "." : ",";
    const groupSep = decimalSep === "." ? "," : ".";
    digits = digits.split(groupSep).join("").replace(decimalSep, ".");
  } else if (lastDot >= 0 || lastComma >= 0) {
    const sep = lastDot >= 0 ? "." : ",";
    const groups = digits.split(sep);
    const isGrouping = groups.length > 2 || groups[groups.length - 1].length === 3;
    digits = isGrouping ? groups.join("") : groups.join(".");
  }

  const value = Number(digits);
  if (!Number.isFinite(value) || digits.length === 0) return undefined;

  return match[2] ? value * 1000 : value;
}

/**
 * Map a currency symbol or code to its ISO code
 */
export function resolveCurrency(marker: string | undefined): string | undefined {
  if (!marker) return undefined;
  const key = marker.trim().toUpperCase();
  return CURRENCY_BY_MARKER.get(key) ?? (ISO_CODES.has(key) ? key : undefined);
}

/**
 * Map a structured interval label ("per_month", "Yearly", "hora") to an interval
 */
export function resolveInterval(label: string | undefined): CompensationInterval | undefined {
  if (!label) return undefined;
  const key = normalizeForMatch(label.replace(/[_-]+/g, " "));
  return INTERVAL_SYNONYMS[key];
}

/**
 * Find an interval keyword in a window of text
 */
export function detectInterval(text: string): CompensationInterval | undefined {
  for (const [interval, pattern] of INTERVAL_KEYWORD_PATTERNS) {
    if (pattern.test(text)) {
      return interval;
    }
  }
  return undefined;
}

function toNumber(value: number | string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  return parseAmount(value);
}

/**
 * Build a Compensation enforcing min <= max, positive amounts and a currency
 */
function buildCompensation(
  low: number | undefined,
  high: number | undefined,
  currency: string | undefined,
  interval: CompensationInterval | undefined,
  source: CompensationSource,
): Compensation | undefined {
  if (!currency) return undefined;

  const bounds = [low, high].filter(
    (v): v is number => v !== undefined && Number.isFinite(v) && v > 0,
  );
  if (bounds.length === 0) return undefined;

  const min = Math.min(...bounds);
  const max = Math.max(...bounds);

  return {
    min,
    max,
    currency,
    ...(interval ? { interval } : {}),
    source,
  };
}

/**
 * Normalize a source's structured salary
 *
 * A single bound fills both, swapped bounds are reordered, and a salary
 * without a recognizable currency is dropped.
 */
export function normalizeStructuredSalary(raw: RawSalary): Compensation | undefined {
  return buildCompensation(
    toNumber(raw.min),
    toNumber(raw.max),
    resolveCurrency(raw.currency),
    resolveInterval(raw.interval),
    "structured",
  );
}

function intervalAfter(text: string, end: number): CompensationInterval | undefined {
  return detectInterval(text.slice(end, end + INTERVAL_WINDOW_CHARS));
}

function amount(match: RegExpMatchArray, numberIndex: number): number | undefined {
  const raw = match[numberIndex];
  if (raw === undefined) return undefined;
  return parseAmount(`${raw}${match[numberIndex + 1] ? "k" : ""}`);
}

/**
 * Extract compensation from free text
 *
 * Precedence: currency + range, then currency + single amount, then an amount
 * followed by an interval keyword (only when the policy names a default
 * currency). The interval is read from the text just after the match.
 *
 * @example
 * extractSalaryFromText("$120,000 - $180,000 per year", { enabled: true }, "description")
 * // { min: 120000, max: 180000, currency: "USD", interval: "yearly", source: "description" }
 */
export function extractSalaryFromText(
  text: string | undefined,
  policy: SalaryExtractionPolicy,
  source: Exclude<CompensationSource, "structured">,
): Compensation | undefined {
  if (!text || !policy.enabled) return undefined;

  const prefixRange = text.match(PREFIX_RANGE);
  if (prefixRange?.index !== undefined) {
    // groups: 1 cur, 2 amt, 3 k, 4 cur?, 5 amt, 6 k
    return buildCompensation(
      amount(prefixRange, 2),
      amount(prefixRange, 5),
      resolveCurrency(prefixRange[1]),
      intervalAfter(text, prefixRange.index + prefixRange[0].length),
      source,
    );
  }

  const suffixRange = text.match(SUFFIX_RANGE);
  if (suffixRange?.index !== undefined) {
    // groups: 1 amt, 2 k, 3 amt, 4 k, 5 cur
    return buildCompensation(
      amount(suffixRange, 1),
      amount(suffixRange, 3),
      resolveCurrency(suffixRange[5]),
      intervalAfter(text, suffixRange.index + suffixRange[0].length),
      source,
    );
  }

  const prefixSingle = text.match(PREFIX_SINGLE);
  if (prefixSingle?.index !== undefined) {
    const value = amount(prefixSingle, 2);
    return buildCompensation(
      value,
      value,
      resolveCurrency(prefixSingle[1]),
      intervalAfter(text, prefixSingle.index + prefixSingle[0].length),
      source,
    );
  }

  const suffixSingle = text.match(SUFFIX_SINGLE);
  if (suffixSingle?.index !== undefined) {
    const value = amount(suffixSingle, 1);
    return buildCompensation(
      value,
      value,
      resolveCurrency(suffixSingle[3]),
      intervalAfter(text, suffixSingle.index + suffixSingle[0].length),
      source,
    );
  }

  if (!policy.defaultCurrency) return undefined;

  const keyword = text.match(KEYWORD_AMOUNT);
  if (keyword?.index !== undefined) {
    return buildCompensation(
      amount(keyword, 1),
      amount(keyword, 3),
      policy.defaultCurrency,
      intervalAfter(text, keyword.index + keyword[0].length),
      source,
    );
  }

  return undefined;
}
