/**
 * Wellfound mappers: parsed listing to RawJobPosting
 */

import type { RawJobPosting } from "@/types";
import type { WellfoundListing } from "@/types/clients/wellfound";

const HTML_TAG_PATTERN = /<[a-z][\s\S]*>/i;

function toDescription(text: string | undefined): RawJobPosting["description"] {
  if (!text) return undefined;
  return { content: text, format: HTML_TAG_PATTERN.test(text) ? "html" : "plain" };
}

export function mapWellfoundListingToRaw(listing: WellfoundListing): RawJobPosting {
  const description = toDescription(listing.description);

  return {
    site: "wellfound",
    ...(listing.id ? { sourceId: listing.id } : {}),
    title: listing.title,
    ...(listing.company ? { company: listing.company } : {}),
    ...(listing.location ? { locationText: listing.location } : {}),
    ...(listing.jobType ? { jobTypes: [listing.jobType] } : {}),
    ...(listing.postedText ? { postedAt: listing.postedText } : {}),
    jobUrl: listing.jobUrl,
    ...(description ? { description } : {}),
    ...(listing.salaryText ? { salaryText: listing.salaryText } : {}),
    ...(listing.remote !== undefined ? { isRemote: listing.remote } : {}),
  };
}
