/**
 * Custom error types for traversal, extraction and export
 */

import { Schema } from "@effect/schema"

/** Failure to load a listing or trip page through the browser session */
export class FetchError extends Schema.TaggedError<FetchError>()("FetchError", {
  reason: Schema.Literal("Throttled", "NotFound", "Transient"),
  url: Schema.String,
  message: Schema.String
}) {}

/** Failure of one structured-extraction call */
export class ExtractionError extends Schema.TaggedError<ExtractionError>()("ExtractionError", {
  reason: Schema.Literal("ProviderThrottled", "MalformedResponse", "TransportFailure", "ProviderError"),
  message: Schema.String
}) {}

/**
 * Pagination stopped before the listing was exhausted.
 * `resumePage` is the page the operator restarts from.
 */
export class PaginationHalted extends Schema.TaggedError<PaginationHalted>()("PaginationHalted", {
  reason: Schema.Literal("Throttled", "ListingUnavailable"),
  resumePage: Schema.Number,
  message: Schema.String
}) {}

export class SessionError extends Schema.TaggedError<SessionError>()("SessionError", {
  reason: Schema.Literal("LaunchFailed", "LoginAborted"),
  message: Schema.String
}) {}

export class ExportError extends Schema.TaggedError<ExportError>()("ExportError", {
  path: Schema.String,
  message: Schema.String
}) {}

/**
 * Helper functions for creating well-formatted error messages
 */
export const FetchErrors = {
  throttled: (url: string, details: string) =>
    new FetchError({
      reason: "Throttled",
      url,
      message: `Host throttled the session at ${url}: ${details}`
    }),

  notFound: (url: string, details: string) =>
    new FetchError({
      reason: "NotFound",
      url,
      message: `Nothing to read at ${url}: ${details}`
    }),

  transient: (url: string, details: string) =>
    new FetchError({
      reason: "Transient",
      url,
      message: `Failed to load ${url}: ${details}`
    })
}

export const ExtractionErrors = {
  providerThrottled: (details: string) =>
    new ExtractionError({
      reason: "ProviderThrottled",
      message: `Inference provider rejected the request (rate limit or quota): ${details}`
    }),

  malformedResponse: (details: string) =>
    new ExtractionError({
      reason: "MalformedResponse",
      message: `Inference response did not match the flight schema: ${details}`
    }),

  transportFailure: (details: string) =>
    new ExtractionError({
      reason: "TransportFailure",
      message: `Could not reach the inference provider: ${details}`
    }),

  providerError: (details: string) =>
    new ExtractionError({
      reason: "ProviderError",
      message: `Inference provider returned an error: ${details}`
    })
}

export const PaginationErrors = {
  throttled: (page: number, attempts: number, details: string) =>
    new PaginationHalted({
      reason: "Throttled",
      resumePage: page,
      message: `Still throttled on page ${page} after ${attempts} attempt(s): ${details}\n\nWait a few minutes, then restart with --start-page ${page}`
    }),

  listingUnavailable: (page: number, details: string) =>
    new PaginationHalted({
      reason: "ListingUnavailable",
      resumePage: page,
      message: `Could not load trip list page ${page}: ${details}\n\nRestart with --start-page ${page} once the site responds again`
    })
}
