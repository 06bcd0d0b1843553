/**
 * HTTP client public API
 */

export { httpRequest, computeBackoffDelay, isStatusRetryable } from "./httpClient";
export { HttpError, parseRetryAfter } from "./httpError";
export type {
  HttpRequest,
  HttpMethod,
  HttpErrorDetails,
  HttpRetryConfig,
  HttpRequestFn,
  HttpResponseType,
} from "@/types";
