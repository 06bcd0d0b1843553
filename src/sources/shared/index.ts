export { paginate, type PaginateOptions, type PaginateResult } from "./paginate";
export { extractDescriptionHtml, fetchJobDescription } from "./descriptions";
