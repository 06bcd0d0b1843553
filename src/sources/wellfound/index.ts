export { WellfoundSource, type WellfoundSourceConfig } from "./wellfoundSource";
export { buildSearchUrl, resolveRoleSlug, resolveLocationSlug, slugify } from "./urls";
export { parseSearchPage, isBlockedPage, hidesListings } from "./parsing";
export { mapWellfoundListingToRaw } from "./mappers";
