/**
 * In-process stand-ins for the browser session and the inference provider
 */

import { Schema } from "@effect/schema"
import { Effect, Layer, Logger, LogLevel } from "effect"
import {
  type CompletionRequest,
  InferenceClient,
  PageFetcher,
  PaginationWalkerLive,
  PipelineConfig,
  PipelineCoordinatorLive,
  type PipelineSettings,
  RecordExtractorLive,
  defaultPipelineSettings,
  targetUrl
} from "../../src/services"
import { ExtractionError, type FetchError, FetchErrors, FlightRecord, type PageTarget, type RawPageContent } from "../../src/domain"

export const testSettings: PipelineSettings = {
  ...defaultPipelineSettings,
  baseUrl: "https://trips.example.test",
  settleMs: 0,
  throttle: { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 2, backoffFactor: 2 },
  pacing: { minDelayMs: 0, maxRequests: 1000, windowMs: 60_000 }
}

export const TestConfig = (settings: PipelineSettings = testSettings) => Layer.succeed(PipelineConfig, settings)

/** Runs an effect with logging switched off */
export const runQuiet = <A, E>(effect: Effect.Effect<A, E>): Promise<A> =>
  effect.pipe(Logger.withMinimumLogLevel(LogLevel.None), Effect.runPromise)

export const flight = (date: string, origin: string, destination: string, flight_number: string): FlightRecord =>
  Schema.decodeUnknownSync(FlightRecord)({ date, origin, destination, flight_number })

export const listingHtml = (ids: ReadonlyArray<string>): string =>
  [
    "<html><body><main>",
    ...ids.map((id) => `<div class="trip-card"><a data-cy="trip-list-item-name" href="/app/trips/${id}">Trip ${id}</a></div>`),
    "</main></body></html>"
  ].join("\n")

export const tripHtml = (id: string, body: string): string =>
  [
    "<html><body><main>",
    `<h1>Trip ${id}</h1>`,
    '<span data-cy="trip-date-span">Nov 2024</span>',
    `<section>${body}</section>`,
    "</main></body></html>"
  ].join("\n")

/** Key of a fetch target in a script: "listing:<page>" or "trip:<id>" */
export const targetKey = (target: PageTarget): string =>
  target._tag === "Listing" ? `listing:${target.page}` : `trip:${target.handle.id}`

export type ScriptedResponse = string | FetchError

/**
 * Fetcher that answers from a script. Responses for a key are used in order and the
 * last one repeats; keys missing from the script answer NotFound.
 */
export const makeScriptedFetcher = (
  script: Readonly<Record<string, ReadonlyArray<ScriptedResponse>>>,
  settings: PipelineSettings = testSettings
) => {
  const calls: string[] = []
  const layer = Layer.succeed(
    PageFetcher,
    PageFetcher.of({
      fetch: (target) =>
        Effect.suspend((): Effect.Effect<RawPageContent, FetchError> => {
          const key = targetKey(target)
          const url = targetUrl(settings, target)
          const seen = calls.filter((call) => call === key).length
          calls.push(key)

          const responses = script[key] ?? []
          if (responses.length === 0) return Effect.fail(FetchErrors.notFound(url, "not scripted"))

          const response = responses[Math.min(seen, responses.length - 1)]
          return typeof response === "string" ? Effect.succeed({ url, html: response }) : Effect.fail(response)
        })
    })
  )
  return { calls, layer }
}

export const throttled = (key: string) => FetchErrors.throttled(key, "HTTP 429")

/**
 * Inference client keyed by the trip title in the prompt. A value is the parsed response, or the
 * ExtractionError to fail with; unknown titles get an empty flight list.
 */
export const makeScriptedInference = (
  byTitle: Readonly<Record<string, unknown>>,
  onRequest: (title: string) => void = () => {}
) => {
  const requests: CompletionRequest[] = []
  const layer = Layer.succeed(
    InferenceClient,
    InferenceClient.of({
      complete: (request) =>
        Effect.suspend((): Effect.Effect<unknown, ExtractionError> => {
          requests.push(request)
          const title = /Trip title: (.*)/.exec(request.prompt)?.[1] ?? ""
          onRequest(title)
          const response = title in byTitle ? byTitle[title] : { flights: [] }
          return response instanceof ExtractionError ? Effect.fail(response) : Effect.succeed(response)
        })
    })
  )
  return { requests, layer }
}

/** Coordinator wired to the real walker and extractor over the given stand-ins */
export const pipelineLayer = (
  fetcher: Layer.Layer<PageFetcher>,
  inference: Layer.Layer<InferenceClient>,
  settings: PipelineSettings = testSettings
) =>
  PipelineCoordinatorLive.pipe(
    Layer.provide(PaginationWalkerLive),
    Layer.provide(RecordExtractorLive),
    Layer.provide(Layer.mergeAll(fetcher, inference)),
    Layer.provide(TestConfig(settings))
  )
