/**
 * CLI interface for the trip flight exporter
 * Opens the trip list in a browser, waits for the operator to log in, then exports every flight
 */

import { Terminal } from "@effect/platform"
import { NodeFileSystem, NodeTerminal } from "@effect/platform-node"
import { Console, Deferred, Effect, Exit, Layer, Logger, LogLevel } from "effect"
import { SessionError, TripsFilterSchema, resumePageOf, type RunResult, type TripHandle, type TripsFilter } from "../domain"
import {
  BrowserSession,
  BrowserSessionLive,
  CsvExporterLive,
  type ExportSummary,
  Exporter,
  OpenAIInferenceLive,
  PageFetcherLive,
  PaginationWalkerLive,
  PipelineConfig,
  PipelineConfigLive,
  PipelineCoordinator,
  PipelineCoordinatorLive,
  RecordExtractorLive,
  type SettingsOverrides,
  listingUrl
} from "../services"
import { RequestPacerLive } from "../utils"

/**
 * CLI Arguments interface
 */
export interface CliArgs {
  startPage?: number
  filter?: TripsFilter
  output?: string
  headless?: boolean
  channel?: string
  model?: string
  maxAttempts?: number
  skipLogin: boolean
  json: boolean
  verbose: boolean
  help: boolean
  /** Flags that were unknown or had an unusable value */
  invalid: string[]
}

const isTripsFilter = (value: string): value is TripsFilter => TripsFilterSchema.literals.some((literal) => literal === value)

const parsePositiveInteger = (value: string | undefined): number | undefined => {
  if (value === undefined || !/^\d+$/.test(value)) return undefined
  const parsed = parseInt(value, 10)
  return parsed >= 1 ? parsed : undefined
}

/**
 * Parses command-line arguments
 */
export function parseArgs(args: ReadonlyArray<string>): CliArgs {
  const parsed: CliArgs = { skipLogin: false, json: false, verbose: false, help: false, invalid: [] }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    const nextArg = args[i + 1]

    switch (arg) {
      case "--start-page":
      case "-s": {
        const page = parsePositiveInteger(nextArg)
        if (page === undefined) parsed.invalid.push(`${arg} ${nextArg ?? ""}`.trim())
        else parsed.startPage = page
        i++
        break
      }
      case "--filter":
        if (nextArg && isTripsFilter(nextArg)) parsed.filter = nextArg
        else parsed.invalid.push(`${arg} ${nextArg ?? ""}`.trim())
        i++
        break
      case "--output":
      case "-o":
        if (nextArg) parsed.output = nextArg
        else parsed.invalid.push(arg)
        i++
        break
      case "--headless":
        parsed.headless = true
        break
      case "--channel":
        if (nextArg) parsed.channel = nextArg
        else parsed.invalid.push(arg)
        i++
        break
      case "--model":
      case "-m":
        if (nextArg) parsed.model = nextArg
        else parsed.invalid.push(arg)
        i++
        break
      case "--max-attempts": {
        const attempts = parsePositiveInteger(nextArg)
        if (attempts === undefined) parsed.invalid.push(`${arg} ${nextArg ?? ""}`.trim())
        else parsed.maxAttempts = attempts
        i++
        break
      }
      case "--skip-login":
        parsed.skipLogin = true
        break
      case "--json":
      case "-j":
        parsed.json = true
        break
      case "--verbose":
      case "-v":
        parsed.verbose = true
        break
      case "--help":
      case "-h":
        parsed.help = true
        break
      default:
        parsed.invalid.push(arg)
    }
  }

  return parsed
}

export const toOverrides = (args: CliArgs): SettingsOverrides => ({
  startPage: args.startPage,
  tripsFilter: args.filter,
  outputFile: args.output,
  headless: args.headless,
  browserChannel: args.channel,
  model: args.model,
  throttleMaxAttempts: args.maxAttempts
})

/**
 * Prints help message
 */
function printHelp(): void {
  console.log(`
Trip Flight Export - CLI

Usage:
  trip-flight-export [options]

Options:
  --start-page, -s <n>        List page to start from, to resume after throttling (default: 1)
  --filter <past|upcoming>    Which trips to export (default: past)
  --output, -o <file>         CSV file to write, replaced on every run (default: flights_export.csv)
  --headless                  Run the browser without a window (needs --skip-login and a saved session)
  --channel <name>            Drive an installed browser, e.g. chrome or msedge
  --model, -m <name>          Model used for extraction (default: gpt-4o-mini)
  --max-attempts <n>          Attempts per page while the site is throttling (default: 5)
  --skip-login                Do not wait for a manual login before starting
  --json, -j                  Print the run result as JSON
  --verbose, -v               Debug logging
  --help, -h                  Show this help message

Environment:
  OPENAI_API_KEY              Required. Key used for extraction calls
  TRIPS_BASE_URL, TRIPS_FILTER, TRIPS_START_PAGE, EXPORT_OUTPUT_FILE,
  BROWSER_HEADLESS, BROWSER_CHANNEL, THROTTLE_MAX_ATTEMPTS, PACE_MIN_DELAY_MS, ...

Examples:
  # Export all past trips
  trip-flight-export

  # Resume after the site started throttling on page 7
  trip-flight-export --start-page 7 --output flights_from_page_7.csv
`)
}

const describeTrip = (handle: TripHandle): string => handle.name ?? handle.id

/**
 * Operator-facing summary of a run, one entry per line
 */
export function reportLines(result: RunResult, summary: ExportSummary): string[] {
  const lines: string[] = []

  if (result.tripsProcessed === 0 && result.status._tag === "Completed") {
    lines.push("❌ No trips found! Make sure you're logged in and the trips list shows your trips.")
  } else if (result.records.length === 0) {
    lines.push("❌ No flights extracted")
  } else {
    lines.push(`\n✅ Extracted ${result.records.length} flight(s) from ${result.tripsProcessed} trip(s):`)
    let row = 0
    for (const { handle, records } of result.extractions) {
      for (const record of records) {
        row++
        lines.push(
          `${String(row).padStart(3)}. ${record.date}  ${record.origin} → ${record.destination}  ${record.flight_number.padEnd(7)}  ${describeTrip(handle)}`
        )
      }
    }
  }

  if (result.failures.length > 0) {
    lines.push(`\n⚠️  Skipped ${result.failures.length} trip(s):`)
    for (const failure of result.failures) {
      lines.push(`   ${failure.handle.id}${failure.handle.name ? ` (${failure.handle.name})` : ""}: ${failure.reason}`)
    }
  }

  lines.push(`\n📄 ${summary.rows} row(s) written to ${summary.path}`)

  const resumePage = resumePageOf(result.status)
  if (resumePage !== undefined) {
    lines.push(`\n⏸  Run ended early (${result.status._tag}). Resume with: --start-page ${resumePage}`)
    lines.push("   Trips on that page already in this export will be exported again.")
  }

  return lines
}

/**
 * Opens the first list page and blocks until the operator confirms the login
 */
const awaitOperatorLogin = (url: string) =>
  Effect.gen(function* () {
    const session = yield* BrowserSession
    const terminal = yield* Terminal.Terminal

    yield* session.open(url)
    yield* Console.log("\n🔐 Log in to the itinerary site in the browser window, until your trips list is visible.")
    yield* terminal.display("   Then press ENTER here to continue... ")
    yield* terminal.readLine
    yield* Console.log("✓ Continuing with export\n")
  }).pipe(
    Effect.catchTags({
      QuitException: () => Effect.fail(new SessionError({ reason: "LoginAborted", message: "Login prompt was cancelled" })),
      BadArgument: (error) => Effect.fail(new SessionError({ reason: "LoginAborted", message: error.message })),
      SystemError: (error) => Effect.fail(new SessionError({ reason: "LoginAborted", message: error.message }))
    })
  )

/**
 * Completes `stop` on the first Ctrl+C; the handler is removed when the scope closes
 */
const stopOnInterrupt = (stop: Deferred.Deferred<void>) =>
  Effect.acquireRelease(
    Effect.sync(() => {
      const onSigint = () => {
        console.log("\n⏹  Stopping after the current trip (press Ctrl+C again to quit immediately)")
        Deferred.unsafeDone(stop, Exit.void)
      }
      process.once("SIGINT", onSigint)
      return onSigint
    }),
    (onSigint) => Effect.sync(() => process.off("SIGINT", onSigint))
  )

const report = (result: RunResult, summary: ExportSummary, json: boolean) =>
  json
    ? Console.log(JSON.stringify({ ...result, export: summary }, null, 2))
    : Effect.forEach(reportLines(result, summary), (line) => Console.log(line), { discard: true })

/**
 * Main CLI program
 */
export const cliProgram = (args: CliArgs) =>
  Effect.gen(function* () {
    const settings = yield* PipelineConfig
    const coordinator = yield* PipelineCoordinator
    const exporter = yield* Exporter

    if (!args.json) {
      yield* Console.log(`✈️  Exporting ${settings.tripsFilter} trips starting at page ${settings.startPage}`)
    }

    if (!args.skipLogin) {
      yield* awaitOperatorLogin(listingUrl(settings, settings.startPage))
    }

    const stop = yield* Deferred.make<void>()
    yield* stopOnInterrupt(stop)

    const result = yield* coordinator.run({ startPage: settings.startPage, stop })
    const summary = yield* exporter.write(result)
    yield* report(result, summary, args.json)

    return result
  }).pipe(Effect.scoped)

/**
 * Creates the Layer for CLI execution
 */
export const createCliLayer = (overrides: SettingsOverrides) => {
  const pacer = Layer.unwrapEffect(Effect.map(PipelineConfig, (settings) => RequestPacerLive(settings.pacing)))
  const fetching = PageFetcherLive.pipe(Layer.provideMerge(Layer.mergeAll(BrowserSessionLive, pacer)))
  const extraction = RecordExtractorLive.pipe(Layer.provide(OpenAIInferenceLive))
  const pipeline = PipelineCoordinatorLive.pipe(
    Layer.provide(PaginationWalkerLive),
    Layer.provide(extraction),
    Layer.provideMerge(fetching)
  )

  return Layer.mergeAll(pipeline, CsvExporterLive).pipe(
    Layer.provideMerge(PipelineConfigLive(overrides)),
    Layer.provideMerge(Layer.mergeAll(NodeFileSystem.layer, NodeTerminal.layer))
  )
}

/**
 * Runs the CLI program
 */
export const runCli = (argv: ReadonlyArray<string> = process.argv.slice(2)) => {
  const args = parseArgs(argv)

  if (args.help) {
    printHelp()
    return Promise.resolve()
  }

  if (args.invalid.length > 0) {
    console.error(`Unrecognized or invalid option(s): ${args.invalid.join(", ")}`)
    printHelp()
    process.exit(1)
  }

  const program = cliProgram(args).pipe(
    Effect.provide(createCliLayer(toOverrides(args))),
    Logger.withMinimumLogLevel(args.verbose ? LogLevel.Debug : LogLevel.Info),
    Effect.provide(Logger.pretty),
    Effect.match({
      onFailure: (error) => {
        console.error("\n--- ERROR ---")
        console.error(error)
        process.exit(1)
      },
      onSuccess: (result) => {
        process.exit(result.status._tag === "Completed" ? 0 : 2)
      }
    })
  )

  return Effect.runPromise(program)
}
