/**
 * Trip Flight Export - Main exports
 *
 * Walks a paginated trip list in a logged-in browser, extracts the flight segments of every trip
 * with a language model and writes them as an OpenFlights-compatible CSV file.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect"
 * import { PipelineCoordinator, createCliLayer } from "trip-flight-export"
 *
 * const program = Effect.gen(function* () {
 *   const coordinator = yield* PipelineCoordinator
 *   const result = yield* coordinator.run({ startPage: 1 })
 *   console.log(`Found ${result.records.length} flights`)
 * })
 *
 * Effect.runPromise(program.pipe(Effect.provide(createCliLayer({ headless: true }))))
 * ```
 */

// Domain exports
export * from "./domain"

// Service exports
export * from "./services"

// Utility exports
export * from "./utils"

// CLI composition
export { createCliLayer, parseArgs, type CliArgs } from "./cli/index"
