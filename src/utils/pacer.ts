/**
 * Request pacing to keep the browser session polite towards the itinerary site
 */

import { Clock, Context, Duration, Effect, Layer, Ref } from "effect"

/**
 * Pacer configuration
 */
export interface PacerConfig {
  /** Minimum delay between two navigations in milliseconds */
  readonly minDelayMs: number
  /** Maximum number of navigations per window */
  readonly maxRequests: number
  /** Sliding window in milliseconds */
  readonly windowMs: number
}

/**
 * Request pacer service definition using idiomatic Effect v3 class-based Tag.
 * Unlike a rate limiter, `acquire` never rejects: it waits until the request is allowed.
 */
export class RequestPacer extends Context.Tag("RequestPacer")<
  RequestPacer,
  {
    readonly acquire: () => Effect.Effect<void>
    readonly reset: () => Effect.Effect<void>
    readonly getStats: () => Effect.Effect<{ requests: number; windowMs: number }>
  }
>() {}

/**
 * In-memory pacer implementation using a sliding window of request timestamps
 */
export const RequestPacerLive = (config: PacerConfig) =>
  Layer.effect(
    RequestPacer,
    Effect.gen(function* () {
      const { minDelayMs, maxRequests, windowMs } = config

      const requestsRef = yield* Ref.make<ReadonlyArray<number>>([])
      const lastRequestRef = yield* Ref.make<number | undefined>(undefined)

      // Records the request and returns 0 when allowed, otherwise how long to wait
      const tryRecord = (now: number) =>
        Ref.modify(requestsRef, (requests): readonly [number, ReadonlyArray<number>] => {
          const recent = requests.filter((timestamp) => timestamp > now - windowMs)
          if (recent.length >= maxRequests) {
            return [recent[0] + windowMs - now, recent] as const
          }
          return [0, [...recent, now]] as const
        })

      return RequestPacer.of({
        acquire: () =>
          Effect.gen(function* () {
            const lastRequest = yield* Ref.get(lastRequestRef)
            if (lastRequest !== undefined) {
              const sinceLast = (yield* Clock.currentTimeMillis) - lastRequest
              if (sinceLast < minDelayMs) {
                yield* Effect.sleep(Duration.millis(minDelayMs - sinceLast))
              }
            }

            while (true) {
              const now = yield* Clock.currentTimeMillis
              const waitMs = yield* tryRecord(now)
              if (waitMs <= 0) {
                yield* Ref.set(lastRequestRef, now)
                return
              }
              yield* Effect.logDebug(`Request window full, waiting ${waitMs}ms`)
              yield* Effect.sleep(Duration.millis(waitMs))
            }
          }),

        reset: () =>
          Effect.gen(function* () {
            yield* Ref.set(requestsRef, [])
            yield* Ref.set(lastRequestRef, undefined)
          }),

        getStats: () =>
          Effect.gen(function* () {
            const requests = yield* Ref.get(requestsRef)
            const now = yield* Clock.currentTimeMillis
            return {
              requests: requests.filter((timestamp) => timestamp > now - windowMs).length,
              windowMs
            }
          })
      })
    })
  )

/**
 * No-op pacer (for tests and for sites that need no pacing)
 */
export const RequestPacerDisabled = Layer.succeed(RequestPacer, {
  acquire: () => Effect.void,
  reset: () => Effect.void,
  getStats: () => Effect.succeed({ requests: 0, windowMs: 0 })
})
