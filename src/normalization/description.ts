/**
 * Description rendering: HTML/plain source text to the requested format
 */

import { load } from "cheerio";
import TurndownService from "turndown";
import type { DescriptionFormat, JobDescription } from "@/types";

const turndown = new TurndownService({
  headingStyle: "atx",
  codeBlockStyle: "fenced",
  bulletListMarker: "-",
  emDelimiter: "*",
});

const BLOCK_SELECTOR = "p, div, li, ul, ol, h1, h2, h3, h4, h5, h6, tr, section, article, blockquote";

/**
 * Repair bold runs broken by scraped markup and collapse blank-line runs
 *
 * @example
 * sanitizeMarkdown("**Role:**Engineer\n\n\n\nDone") // "**Role:** Engineer\n\nDone"
 */
export function sanitizeMarkdown(markdown: string): string {
  return (
    markdown
      // "word\n  **text**" -> "word **text**"
      .replace(/(\w+)\n\s+\*\*([^*]+)\*\*/g, "$1 **$2**")
      // "**text**Word" -> "**text** Word"
      .replace(/\*\*([^*\n]+)\*\*([A-Za-z])/g, "**$1** $2")
      // "**a****b**" -> "**a**\n\n**b**"
      .replace(/\*\*([^*]+)\*\*\*\*([^*]+)\*\*/g, "**$1**\n\n**$2**")
      // spaces just inside the markers
      .replace(/(^|\s)\*\* ([^*]+)\*\*/gm, "$1**$2**")
      .replace(/\*\*([^*]+) \*\*(\s|$)/gm, "**$1**$2")
      // "**a.**   **b**" -> "**a.**\n\n**b**"
      .replace(/\*\*([^*]+)\*\*[ \t]{2,}\*\*([^*]+)\*\*/g, "**$1**\n\n**$2**")
      .replace(/\n{3,}/g, "\n\n")
      .trim()
  );
}

/**
 * Convert HTML to markdown (ATX headings, fenced code, "-" bullets)
 */
export function htmlToMarkdown(html: string): string {
  return sanitizeMarkdown(turndown.turndown(html));
}

/**
 * Convert HTML to plain text, keeping line structure of block elements
 */
export function htmlToPlainText(html: string): string {
  const $ = load(html);
  $("script, style").remove();
  $("br").replaceWith("\n");
  $(BLOCK_SELECTOR).each((_, el) => {
    $(el).append("\n");
  });

  return $.root()
    .text()
    .replace(/[ \t ]+/g, " ")
    .replace(/ *\n */g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/**
 * Render a description for output
 *
 * @param content - Description as delivered by the source
 * @param sourceFormat - Whether the source delivered HTML or plain text
 * @param format - Requested output format
 */
export function renderDescription(
  content: string,
  sourceFormat: "html" | "plain",
  format: DescriptionFormat,
): JobDescription | undefined {
  const raw = content.trim();
  if (!raw) return undefined;

  let rendered: string;
  if (sourceFormat === "plain") {
    rendered = format === "markdown" ? sanitizeMarkdown(raw) : raw;
  } else if (format === "html") {
    rendered = raw;
  } else if (format === "markdown") {
    rendered = htmlToMarkdown(raw);
  } else {
    rendered = htmlToPlainText(raw);
  }

  return { raw, rendered, format };
}
