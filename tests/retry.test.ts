/**
 * Tests for the throttle backoff.
 */

import { describe, expect, test } from "vitest"
import { Effect } from "effect"
import { FetchErrors, type FetchError } from "../src/domain"
import { isThrottled, withThrottleBackoff } from "../src/utils/retry"
import { runQuiet } from "./support/fakes"

const fastBackoff = { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 2, backoffFactor: 2 }

/** Fails with the given errors in order, then succeeds with the attempt number */
const scripted = (failures: ReadonlyArray<FetchError>) => {
  let attempts = 0
  const effect = Effect.suspend((): Effect.Effect<number, FetchError> => {
    attempts++
    const failure = failures[attempts - 1]
    return failure ? Effect.fail(failure) : Effect.succeed(attempts)
  })
  return { effect, attempts: () => attempts }
}

describe("isThrottled", () => {
  test("matches only throttled fetch failures", () => {
    expect(isThrottled(FetchErrors.throttled("u", "HTTP 429"))).toBe(true)
    expect(isThrottled(FetchErrors.notFound("u", "HTTP 404"))).toBe(false)
    expect(isThrottled(new Error("Throttled"))).toBe(false)
  })
})

describe("withThrottleBackoff", () => {
  test("retries while the host throttles and returns the first success", async () => {
    const probe = scripted([FetchErrors.throttled("u", "HTTP 429"), FetchErrors.throttled("u", "HTTP 429")])

    const result = await runQuiet(withThrottleBackoff(probe.effect, "listing", fastBackoff))

    expect(result).toBe(3)
    expect(probe.attempts()).toBe(3)
  })

  test("gives up after maxAttempts with the throttled error", async () => {
    const throttled = FetchErrors.throttled("u", "HTTP 429")
    const probe = scripted([throttled, throttled, throttled, throttled])

    const error = await runQuiet(Effect.flip(withThrottleBackoff(probe.effect, "listing", fastBackoff)))

    expect(error).toBe(throttled)
    expect(probe.attempts()).toBe(3)
  })

  test("does not retry other failures", async () => {
    const probe = scripted([FetchErrors.transient("u", "boom")])

    const error = await runQuiet(Effect.flip(withThrottleBackoff(probe.effect, "listing", fastBackoff)))

    expect(error.reason).toBe("Transient")
    expect(probe.attempts()).toBe(1)
  })

  test("makes a single attempt when maxAttempts is 1", async () => {
    const probe = scripted([FetchErrors.throttled("u", "HTTP 429")])

    const error = await runQuiet(Effect.flip(withThrottleBackoff(probe.effect, "listing", { ...fastBackoff, maxAttempts: 1 })))

    expect(error.reason).toBe("Throttled")
    expect(probe.attempts()).toBe(1)
  })
})
