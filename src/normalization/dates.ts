/**
 * Posting timestamp parsing: ISO strings, epochs and relative phrases
 */

import { normalizeForMatch } from "@/utils/text/normalizeText";

const MS_PER_MINUTE = 60_000;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;
const MS_PER_DAY = 24 * MS_PER_HOUR;

const UNIT_MS: ReadonlyArray<readonly [RegExp, number]> = [
  [/^(?:m|min|mins|minute|minutes|minuto|minutos)$/, MS_PER_MINUTE],
  [/^(?:h|hr|hrs|hour|hours|hora|horas)$/, MS_PER_HOUR],
  [/^(?:d|day|days|dia|dias)$/, MS_PER_DAY],
  [/^(?:w|wk|week|weeks|semana|semanas)$/, 7 * MS_PER_DAY],
  [/^(?:mo|month|months|mes|meses)$/, 30 * MS_PER_DAY],
  [/^(?:y|yr|year|years|ano|anos)$/, 365 * MS_PER_DAY],
];

// "3 days ago", "30+ days ago", "há 2 semanas", "2 dias atrás", "5d"
const RELATIVE_PATTERN =
  /(?:^|\s)(?:ha\s+)?(\d+)\+?\s*([a-z]+)(?:\s+(?:ago|atras))?(?:\s|$)/;

function unitToMs(unit: string): number | undefined {
  return UNIT_MS.find(([pattern]) => pattern.test(unit))?.[1];
}

function isValidDate(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

/**
 * Parse a relative phrase against `now`
 *
 * @example
 * parseRelativeDate("2 days ago", now) // now - 2 days
 * parseRelativeDate("ontem", now) // now - 1 day
 */
export function parseRelativeDate(text: string, now: Date): Date | undefined {
  const phrase = normalizeForMatch(text);

  if (/\b(?:today|just now|hoje|agora|new|novo|nueva|hoy)\b/.test(phrase)) {
    return new Date(now.getTime());
  }
  if (/\b(?:yesterday|ontem|ayer)\b/.test(phrase)) {
    return new Date(now.getTime() - MS_PER_DAY);
  }
  if (/\b(?:last|a|uma?)\s+(?:week|semana)\b/.test(phrase)) {
    return new Date(now.getTime() - 7 * MS_PER_DAY);
  }
  if (/\b(?:last|a|um)\s+(?:month|mes)\b/.test(phrase)) {
    return new Date(now.getTime() - 30 * MS_PER_DAY);
  }

  const match = phrase.match(RELATIVE_PATTERN);
  if (!match) return undefined;

  const unitMs = unitToMs(match[2]);
  if (unitMs === undefined) return undefined;

  return new Date(now.getTime() - Number(match[1]) * unitMs);
}

/**
 * Parse a posting timestamp
 *
 * Accepts Date, epoch (seconds or milliseconds), ISO-like strings and
 * relative English/Portuguese phrases. Unparseable input gives undefined.
 */
export function parsePostedAt(
  value: string | number | Date | undefined,
  now: Date = new Date(),
): Date | undefined {
  if (value === undefined) return undefined;

  if (value instanceof Date) {
    return isValidDate(value) ? new Date(value.getTime()) : undefined;
  }

  if (typeof value === "number") {
    if (!Number.isFinite(value) || value <= 0) return undefined;
    // Seconds until year ~33658, milliseconds afterwards
    const date = new Date(value < 1e12 ? value * 1000 : value);
    return isValidDate(date) ? date : undefined;
  }

  const text = value.trim();
  if (!text) return undefined;

  if (/^\d{4}-\d{2}-\d{2}/.test(text)) {
    const date = new Date(text);
    return isValidDate(date) ? date : undefined;
  }

  if (/^\d{10,13}$/.test(text)) {
    return parsePostedAt(Number(text), now);
  }

  return parseRelativeDate(text, now);
}
