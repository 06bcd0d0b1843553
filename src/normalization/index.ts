export { normalizeRecord, cleanTitle, buildRecordId, type NormalizeContext } from "./normalizeRecord";
export { mapJobType, resolveJobType } from "./jobType";
export { parseLocation, parseLocationText, canonicalCountry, hasRemoteMarker } from "./location";
export {
  extractSalaryFromText,
  normalizeStructuredSalary,
  parseAmount,
  resolveCurrency,
  resolveInterval,
  detectInterval,
} from "./salary";
export { renderDescription, htmlToMarkdown, htmlToPlainText, sanitizeMarkdown } from "./description";
export { extractEmails } from "./emails";
export { parsePostedAt, parseRelativeDate } from "./dates";
