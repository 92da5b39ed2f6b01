/**
 * Exponential backoff for host throttling
 */

import { Effect, Schedule, Duration } from "effect"
import { FetchError } from "../domain"

/**
 * Backoff configuration
 */
export interface BackoffConfig {
  /** Total attempts, the first one included */
  readonly maxAttempts: number
  /** Delay before the first retry, in milliseconds */
  readonly initialDelayMs: number
  /** Maximum delay in milliseconds (caps individual delays) */
  readonly maxDelayMs: number
  /** Multiplier applied to the delay after each retry */
  readonly backoffFactor: number
}

/**
 * Creates a retry schedule with exponential backoff, jitter, and a cap.
 *
 * - Exponential delays: initialDelay, initialDelay * factor, initialDelay * factor^2, ...
 * - Individual delays capped at maxDelay via union (takes the shorter of the two schedules)
 * - Jitter applied so resumed runs do not hit the host in lockstep
 * - Total attempts capped at maxAttempts (intersect with recurs)
 */
export const createBackoffSchedule = (config: BackoffConfig) =>
  Schedule.exponential(Duration.millis(config.initialDelayMs), config.backoffFactor).pipe(
    Schedule.union(Schedule.spaced(Duration.millis(config.maxDelayMs))),
    Schedule.jittered,
    Schedule.intersect(Schedule.recurs(Math.max(0, config.maxAttempts - 1)))
  )

/**
 * Only host throttling is retried; everything else is handled by the caller
 */
export const isThrottled = (error: unknown): error is FetchError =>
  error instanceof FetchError && error.reason === "Throttled"

/**
 * Retries a fetch while the host keeps throttling, logging every throttled attempt.
 * After the last attempt the Throttled error is passed on unchanged.
 */
export const withThrottleBackoff = <A, R>(
  effect: Effect.Effect<A, FetchError, R>,
  operationName: string,
  config: BackoffConfig
): Effect.Effect<A, FetchError, R> =>
  effect.pipe(
    Effect.tapError((error) =>
      isThrottled(error)
        ? Effect.logWarning(`${operationName} throttled, backing off`).pipe(
            Effect.annotateLogs({ operation: operationName, url: error.url })
          )
        : Effect.void
    ),
    Effect.retry({ schedule: createBackoffSchedule(config), while: isThrottled }),
    Effect.tapError((error) =>
      isThrottled(error)
        ? Effect.logError(`${operationName} still throttled after ${config.maxAttempts} attempt(s)`).pipe(
            Effect.annotateLogs({ operation: operationName, url: error.url })
          )
        : Effect.void
    )
  )
