/**
 * Normalization constants: currency, interval and keyword tables
 *
 * Salary extraction precedence (first hit wins):
 *   1. currency + numeric range   ("$120,000 - $180,000", "R$ 3.000 a R$ 5.000")
 *   2. currency + single number   ("€45k")
 *   3. number(s) + interval word  ("25-30 per hour"), only with a source default currency
 * The interval is read from the text right after the matched amount.
 */

import type { CompensationInterval } from "@/types";

/**
 * Currency markers (longest first) and their ISO codes
 */
export const CURRENCY_MARKERS: ReadonlyArray<readonly [string, string]> = [
  ["US$", "USD"],
  ["CA$", "CAD"],
  ["A$", "AUD"],
  ["R$", "BRL"],
  ["USD", "USD"],
  ["EUR", "EUR"],
  ["GBP", "GBP"],
  ["BRL", "BRL"],
  ["CAD", "CAD"],
  ["AUD", "AUD"],
  ["INR", "INR"],
  ["CHF", "CHF"],
  ["$", "USD"],
  ["€", "EUR"],
  ["£", "GBP"],
  ["₹", "INR"],
];

/**
 * Amount: grouped thousands with optional decimals, or a plain number
 */
export const AMOUNT_PATTERN = String.raw`\d{1,3}(?:[.,]\d{3})+(?:[.,]\d{1,2})?|\d+(?:[.,]\d+)?`;

/**
 * Thousands suffix ("120k")
 */
export const THOUSANDS_SUFFIX_PATTERN = String.raw`\s?[kK]\b`;

/**
 * Separators between the bounds of a range
 */
export const RANGE_SEPARATOR_PATTERN = String.raw`\s*(?:-|–|—|to|até|a)\s*`;

/**
 * Characters of text inspected after an amount for an interval keyword
 */
export const INTERVAL_WINDOW_CHARS = 40;

/**
 * Interval keywords checked in order against the text after the amount
 */
export const INTERVAL_KEYWORD_PATTERNS: ReadonlyArray<
  readonly [CompensationInterval, RegExp]
> = [
  ["hourly", /(?:\b(?:per|an?|por)\s+(?:hour|hr|hora)\b|\/\s?(?:hour|hr|h)\b|\bhourly\b)/i],
  ["yearly", /(?:\b(?:per|an?|por|al)\s+(?:year|yr|annum|ano|año)\b|\/\s?(?:year|yr|ano)\b|\b(?:yearly|annually|annual|anual)\b)/i],
  ["monthly", /(?:\b(?:per|an?|por|al)\s+(?:month|mo|m[eê]s)\b|\/\s?(?:month|mo|m[eê]s)\b|\b(?:monthly|mensal|mensual)\b)/i],
  ["weekly", /(?:\b(?:per|an?|por)\s+(?:week|wk|semana)\b|\/\s?(?:week|wk)\b|\b(?:weekly|semanal)\b)/i],
  ["daily", /(?:\b(?:per|an?|por)\s+(?:day|dia|día)\b|\/\s?(?:day|dia)\b|\b(?:daily|di[aá]ria|diario)\b)/i],
];

/**
 * Interval keyword directly following an amount (tier 3)
 */
export const TRAILING_INTERVAL_PATTERN = String.raw`\s*(?:per|an?|por|\/)\s*(?:hour|hr|hora|day|dia|week|semana|month|m[eê]s|year|yr|ano)\b`;

/**
 * Structured interval synonyms (lowercased, separators collapsed to spaces)
 */
export const INTERVAL_SYNONYMS: Record<string, CompensationInterval> = {
  hour: "hourly",
  hourly: "hourly",
  "per hour": "hourly",
  hora: "hourly",
  day: "daily",
  daily: "daily",
  "per day": "daily",
  dia: "daily",
  week: "weekly",
  weekly: "weekly",
  "per week": "weekly",
  semana: "weekly",
  month: "monthly",
  monthly: "monthly",
  "per month": "monthly",
  mes: "monthly",
  mensal: "monthly",
  mensual: "monthly",
  year: "yearly",
  yearly: "yearly",
  annual: "yearly",
  annually: "yearly",
  "per year": "yearly",
  ano: "yearly",
  anual: "yearly",
};

/**
 * Markers in location/title/work-type text meaning remote work
 */
export const REMOTE_KEYWORDS: readonly string[] = [
  "remote",
  "remoto",
  "remota",
  "home office",
  "trabalho remoto",
  "teletrabajo",
  "anywhere",
  "worldwide",
  "distributed",
  "qualquer lugar",
];

export const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;
