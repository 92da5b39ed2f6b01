/**
 * PipelineCoordinator: walks the trip list, extracts each trip and accumulates the run result
 */

import { Context, Data, Deferred, Effect, Layer, Ref, Stream } from "effect"
import {
  type ExtractionError,
  type FetchError,
  type FlightRecord,
  PageTarget,
  PaginationErrors,
  type PaginationHalted,
  type RunResult,
  RunStatus,
  type TripExtraction,
  type TripFailure,
  type TripHandle
} from "../domain"
import { withThrottleBackoff } from "../utils/retry"
import { PipelineConfig } from "./config"
import { RecordExtractor } from "./extractor"
import { PageFetcher } from "./fetcher"
import { PaginationWalker } from "./walker"

export interface RunOptions {
  /** 1-based list page to start from */
  readonly startPage: number
  /** Completing this ends the run before the next trip starts */
  readonly stop?: Deferred.Deferred<void>
}

type TripOutcome = Data.TaggedEnum<{
  Extracted: { readonly records: ReadonlyArray<FlightRecord> }
  Skipped: { readonly failure: TripFailure }
}>
const TripOutcome = Data.taggedEnum<TripOutcome>()

/**
 * Service Definition for a whole export run.
 * `run` never fails: trip failures go to the failure log, and early ends are reported in `status`.
 */
export class PipelineCoordinator extends Context.Tag("PipelineCoordinator")<
  PipelineCoordinator,
  {
    readonly run: (options: RunOptions) => Effect.Effect<RunResult>
  }
>() {}

const describeTrip = (handle: TripHandle): string => (handle.name ? `${handle.id} (${handle.name})` : handle.id)

const skipped = (handle: TripHandle, stage: TripFailure["stage"], error: FetchError | ExtractionError) =>
  TripOutcome.Skipped({ failure: { handle, stage, reason: error.reason, message: error.message } })

export const PipelineCoordinatorLive = Layer.effect(
  PipelineCoordinator,
  Effect.gen(function* () {
    const walker = yield* PaginationWalker
    const fetcher = yield* PageFetcher
    const extractor = yield* RecordExtractor
    const settings = yield* PipelineConfig

    /**
     * Fetches and extracts one trip. Only host throttling that outlasts the backoff escapes,
     * as a PaginationHalted pointing at the trip's page.
     */
    const processTrip = (handle: TripHandle): Effect.Effect<TripOutcome, PaginationHalted> =>
      withThrottleBackoff(fetcher.fetch(PageTarget.Trip({ handle })), `Trip ${handle.id}`, settings.throttle).pipe(
        Effect.flatMap((content) => extractor.extract(content)),
        Effect.map((records) => TripOutcome.Extracted({ records })),
        Effect.catchTags({
          FetchError: (error) =>
            error.reason === "Throttled"
              ? Effect.fail(PaginationErrors.throttled(handle.page, settings.throttle.maxAttempts, error.message))
              : Effect.succeed(skipped(handle, "fetch", error)),
          ExtractionError: (error) => Effect.succeed(skipped(handle, "extract", error))
        })
      )

    return PipelineCoordinator.of({
      run: ({ startPage, stop }) =>
        Effect.gen(function* () {
          const records = yield* Ref.make<ReadonlyArray<FlightRecord>>([])
          const extractions = yield* Ref.make<ReadonlyArray<TripExtraction>>([])
          const failures = yield* Ref.make<ReadonlyArray<TripFailure>>([])
          const cursor = yield* Ref.make(startPage)
          const processed = yield* Ref.make(0)
          const aborted = yield* Ref.make(false)

          const stopRequested = stop ? Deferred.isDone(stop) : Effect.succeed(false)

          const handleTrip = (handle: TripHandle) =>
            Effect.gen(function* () {
              yield* Ref.set(cursor, handle.page)
              const outcome = yield* processTrip(handle)
              yield* Ref.update(processed, (n) => n + 1)

              switch (outcome._tag) {
                case "Extracted":
                  yield* Ref.update(records, (previous) => [...previous, ...outcome.records])
                  yield* Ref.update(extractions, (previous) => [...previous, { handle, records: outcome.records }])
                  yield* Effect.logInfo(`Trip ${describeTrip(handle)}: ${outcome.records.length} flight(s)`)
                  break
                case "Skipped":
                  yield* Ref.update(failures, (previous) => [...previous, outcome.failure])
                  yield* Effect.logWarning(
                    `Skipped trip ${describeTrip(handle)}: ${outcome.failure.reason} - ${outcome.failure.message}`
                  ).pipe(Effect.annotateLogs({ stage: outcome.failure.stage, reason: outcome.failure.reason }))
                  break
              }
            }).pipe(Effect.annotateLogs({ trip: handle.id, page: handle.page }))

          const status = yield* walker.trips(startPage).pipe(
            // Stop is checked only once another trip is waiting
            Stream.runForEachWhile((handle) =>
              Effect.gen(function* () {
                if (yield* stopRequested) {
                  yield* Ref.set(cursor, handle.page)
                  yield* Ref.set(aborted, true)
                  return false
                }
                yield* handleTrip(handle)
                return true
              })
            ),
            Effect.zipRight(
              Effect.gen(function* () {
                const page = yield* Ref.get(cursor)
                return (yield* Ref.get(aborted))
                  ? RunStatus.Aborted({ resumePage: page })
                  : RunStatus.Completed({ lastPage: page })
              })
            ),
            Effect.catchTag("PaginationHalted", (halt) =>
              Effect.logError(halt.message).pipe(
                Effect.as(RunStatus.Checkpointed({ resumePage: halt.resumePage, reason: halt.reason, message: halt.message }))
              )
            )
          )

          return {
            records: yield* Ref.get(records),
            extractions: yield* Ref.get(extractions),
            failures: yield* Ref.get(failures),
            tripsProcessed: yield* Ref.get(processed),
            status
          }
        }).pipe(Effect.withLogSpan("pipeline"))
    })
  })
)
