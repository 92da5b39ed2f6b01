/**
 * PaginationWalker: turns the paginated trip list into an ordered stream of trip handles
 */

import { Chunk, Context, Data, Effect, Layer, Option, Stream } from "effect"
import { type FetchError, PageTarget, PaginationErrors, type PaginationHalted, type TripHandle } from "../domain"
import { withThrottleBackoff } from "../utils/retry"
import { PipelineConfig } from "./config"
import { PageFetcher } from "./fetcher"
import { parseTripListing } from "./parsing"

/**
 * Walker states.
 *
 * Fetching -> Yielding    page loaded with at least one new trip
 * Fetching -> Exhausted   page not found, or no new trips on it
 * Fetching -> Throttled   host still throttling after the last backoff attempt
 * Yielding -> Fetching    every handle of the page emitted, move to page + 1
 */
export type WalkerState = Data.TaggedEnum<{
  Fetching: { readonly page: number }
  Yielding: { readonly page: number; readonly handles: ReadonlyArray<TripHandle> }
  Throttled: { readonly page: number; readonly message: string }
  Exhausted: { readonly page: number }
}>
export const WalkerState = Data.taggedEnum<WalkerState>()

type Step = Option.Option<readonly [Chunk.Chunk<TripHandle>, WalkerState]>

/**
 * Service Definition for pagination.
 * The stream fails with PaginationHalted when the walk has to stop early;
 * `resumePage` on the error is the checkpoint for the next run.
 */
export class PaginationWalker extends Context.Tag("PaginationWalker")<
  PaginationWalker,
  {
    readonly trips: (startPage: number) => Stream.Stream<TripHandle, PaginationHalted>
  }
>() {}

export const PaginationWalkerLive = Layer.effect(
  PaginationWalker,
  Effect.gen(function* () {
    const fetcher = yield* PageFetcher
    const settings = yield* PipelineConfig

    const fetchPage = (page: number, seen: ReadonlySet<string>): Effect.Effect<WalkerState, PaginationHalted> =>
      withThrottleBackoff(fetcher.fetch(PageTarget.Listing({ page })), `Trip list page ${page}`, settings.throttle).pipe(
        Effect.map((content): WalkerState => {
          const handles = parseTripListing(content.html, settings.baseUrl, page).filter((handle) => !seen.has(handle.id))
          return handles.length > 0 ? WalkerState.Yielding({ page, handles }) : WalkerState.Exhausted({ page })
        }),
        Effect.catchAll((error: FetchError): Effect.Effect<WalkerState, PaginationHalted> => {
          switch (error.reason) {
            case "Throttled":
              return Effect.succeed(WalkerState.Throttled({ page, message: error.message }))
            case "NotFound":
              return Effect.succeed(WalkerState.Exhausted({ page }))
            case "Transient":
              return Effect.fail(PaginationErrors.listingUnavailable(page, error.message))
          }
        })
      )

    const step =
      (seen: Set<string>) =>
      (state: WalkerState): Effect.Effect<Step, PaginationHalted> => {
        switch (state._tag) {
          case "Fetching":
            return Effect.logDebug(`Fetching trip list page ${state.page}`).pipe(
              Effect.zipRight(fetchPage(state.page, seen)),
              Effect.map((next): Step => Option.some([Chunk.empty<TripHandle>(), next] as const))
            )
          case "Yielding":
            for (const handle of state.handles) seen.add(handle.id)
            return Effect.logInfo(`Found ${state.handles.length} trip(s) on page ${state.page}`).pipe(
              Effect.as<Step>(
                Option.some([Chunk.fromIterable(state.handles), WalkerState.Fetching({ page: state.page + 1 })] as const)
              )
            )
          case "Throttled":
            return Effect.fail(PaginationErrors.throttled(state.page, settings.throttle.maxAttempts, state.message))
          case "Exhausted":
            return Effect.logInfo(`Trip list exhausted at page ${state.page}`).pipe(Effect.as<Step>(Option.none()))
        }
      }

    return PaginationWalker.of({
      trips: (startPage) =>
        Stream.suspend(() => {
          const initial: WalkerState = WalkerState.Fetching({ page: startPage })
          return Stream.unfoldChunkEffect(initial, step(new Set<string>()))
        })
    })
  })
)
