/**
 * Text helpers for matching and cleanup
 */

const DIACRITIC_MARKS_PATTERN = /[\u0300-\u036f]/g;

/**
 * Strip combining marks after NFD decomposition ("José" -> "Jose")
 */
export function removeDiacritics(text: string): string {
  return text.normalize("NFD").replace(DIACRITIC_MARKS_PATTERN, "");
}

/**
 * Collapse runs of whitespace to single spaces and trim
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Lowercase, strip diacritics and collapse whitespace.
 * Used for dictionary lookups and dedupe keys.
 *
 * @example
 * normalizeForMatch("  São   Paulo ") // "sao paulo"
 */
export function normalizeForMatch(text: string): string {
  return collapseWhitespace(removeDiacritics(text.toLowerCase()));
}

/**
 * Escape a literal for use inside a RegExp
 */
export function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Whole-word (alphanumeric boundary) containment test on normalized text
 */
export function containsTerm(haystack: string, term: string): boolean {
  return new RegExp(`(^|[^a-z0-9])${escapeRegExp(term)}($|[^a-z0-9])`).test(haystack);
}
