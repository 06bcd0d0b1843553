/**
 * Contact email extraction from description text
 */

import { EMAIL_PATTERN } from "@/constants";

/**
 * Unique emails in order of appearance, lowercased
 */
export function extractEmails(text: string | undefined): string[] {
  if (!text) return [];

  const found = text.match(new RegExp(EMAIL_PATTERN.source, "g")) ?? [];
  const unique: string[] = [];
  for (const email of found) {
    const normalized = email.toLowerCase().replace(/\.+$/, "");
    if (!unique.includes(normalized)) {
      unique.push(normalized);
    }
  }
  return unique;
}
