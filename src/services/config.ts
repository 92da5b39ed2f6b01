/**
 * Pipeline settings, read from the environment and overridden by CLI flags
 */

import { Config, Context, Effect, Layer, Option } from "effect"
import type { ConfigError } from "effect/ConfigError"
import type { TripsFilter } from "../domain"
import type { BackoffConfig } from "../utils/retry"
import type { PacerConfig } from "../utils/pacer"

export interface PipelineSettings {
  /** Origin of the itinerary site, without trailing slash */
  readonly baseUrl: string
  readonly tripsFilter: TripsFilter
  /** 1-based listing page to start from (the resume checkpoint) */
  readonly startPage: number
  readonly outputFile: string
  readonly headless: boolean
  /** Installed browser to drive instead of a downloaded Chromium, e.g. "chrome" */
  readonly browserChannel: string | undefined
  readonly navigationTimeoutMs: number
  readonly readyTimeoutMs: number
  /** Extra wait after the ready selector shows up, for late dynamic content */
  readonly settleMs: number
  readonly model: string
  readonly maxContentChars: number
  readonly throttle: BackoffConfig
  readonly pacing: PacerConfig
}

export const defaultPipelineSettings: PipelineSettings = {
  baseUrl: "https://www.tripit.com",
  tripsFilter: "past",
  startPage: 1,
  outputFile: "flights_export.csv",
  headless: false,
  browserChannel: undefined,
  navigationTimeoutMs: 15_000,
  readyTimeoutMs: 10_000,
  settleMs: 2_000,
  model: "gpt-4o-mini",
  maxContentChars: 10_000,
  throttle: {
    maxAttempts: 5,
    initialDelayMs: 5_000,
    maxDelayMs: 60_000,
    backoffFactor: 2
  },
  pacing: {
    minDelayMs: 1_000,
    maxRequests: 30,
    windowMs: 60_000
  }
}

/** Values given on the command line; anything left out keeps the environment's value */
export interface SettingsOverrides {
  readonly startPage?: number
  readonly tripsFilter?: TripsFilter
  readonly outputFile?: string
  readonly headless?: boolean
  readonly browserChannel?: string
  readonly model?: string
  readonly throttleMaxAttempts?: number
}

export class PipelineConfig extends Context.Tag("PipelineConfig")<PipelineConfig, PipelineSettings>() {}

const positiveInteger = (name: string, fallback: number) =>
  Config.integer(name).pipe(
    Config.validate({ message: `${name} must be a positive integer`, validation: (n) => n >= 1 }),
    Config.withDefault(fallback)
  )

const nonNegativeInteger = (name: string, fallback: number) =>
  Config.integer(name).pipe(
    Config.validate({ message: `${name} must not be negative`, validation: (n) => n >= 0 }),
    Config.withDefault(fallback)
  )

const defaults = defaultPipelineSettings

export const PipelineSettingsConfig: Config.Config<PipelineSettings> = Config.all({
  baseUrl: Config.string("TRIPS_BASE_URL").pipe(
    Config.map((url) => url.replace(/\/+$/, "")),
    Config.withDefault(defaults.baseUrl)
  ),
  tripsFilter: Config.literal("past", "upcoming")("TRIPS_FILTER").pipe(Config.withDefault(defaults.tripsFilter)),
  startPage: positiveInteger("TRIPS_START_PAGE", defaults.startPage),
  outputFile: Config.string("EXPORT_OUTPUT_FILE").pipe(Config.withDefault(defaults.outputFile)),
  headless: Config.boolean("BROWSER_HEADLESS").pipe(Config.withDefault(defaults.headless)),
  browserChannel: Config.option(Config.string("BROWSER_CHANNEL")).pipe(Config.map((channel) => Option.getOrUndefined(channel))),
  navigationTimeoutMs: positiveInteger("BROWSER_NAVIGATION_TIMEOUT_MS", defaults.navigationTimeoutMs),
  readyTimeoutMs: positiveInteger("BROWSER_READY_TIMEOUT_MS", defaults.readyTimeoutMs),
  settleMs: nonNegativeInteger("BROWSER_SETTLE_MS", defaults.settleMs),
  model: Config.string("OPENAI_MODEL").pipe(Config.withDefault(defaults.model)),
  maxContentChars: positiveInteger("EXTRACTION_MAX_CONTENT_CHARS", defaults.maxContentChars),
  throttle: Config.all({
    maxAttempts: positiveInteger("THROTTLE_MAX_ATTEMPTS", defaults.throttle.maxAttempts),
    initialDelayMs: nonNegativeInteger("THROTTLE_INITIAL_DELAY_MS", defaults.throttle.initialDelayMs),
    maxDelayMs: nonNegativeInteger("THROTTLE_MAX_DELAY_MS", defaults.throttle.maxDelayMs),
    backoffFactor: Config.number("THROTTLE_BACKOFF_FACTOR").pipe(
      Config.validate({ message: "THROTTLE_BACKOFF_FACTOR must be at least 1", validation: (n) => n >= 1 }),
      Config.withDefault(defaults.throttle.backoffFactor)
    )
  }),
  pacing: Config.all({
    minDelayMs: nonNegativeInteger("PACE_MIN_DELAY_MS", defaults.pacing.minDelayMs),
    maxRequests: positiveInteger("PACE_MAX_REQUESTS", defaults.pacing.maxRequests),
    windowMs: positiveInteger("PACE_WINDOW_MS", defaults.pacing.windowMs)
  })
})

export const applyOverrides = (settings: PipelineSettings, overrides: SettingsOverrides): PipelineSettings => ({
  ...settings,
  startPage: overrides.startPage ?? settings.startPage,
  tripsFilter: overrides.tripsFilter ?? settings.tripsFilter,
  outputFile: overrides.outputFile ?? settings.outputFile,
  headless: overrides.headless ?? settings.headless,
  browserChannel: overrides.browserChannel ?? settings.browserChannel,
  model: overrides.model ?? settings.model,
  throttle: {
    ...settings.throttle,
    maxAttempts: overrides.throttleMaxAttempts ?? settings.throttle.maxAttempts
  }
})

export const loadPipelineSettings = (overrides: SettingsOverrides = {}): Effect.Effect<PipelineSettings, ConfigError> =>
  PipelineSettingsConfig.pipe(Effect.map((settings) => applyOverrides(settings, overrides)))

export const PipelineConfigLive = (overrides: SettingsOverrides = {}): Layer.Layer<PipelineConfig, ConfigError> =>
  Layer.effect(PipelineConfig, loadPipelineSettings(overrides))

/** URL of one page of the trip list */
export const listingUrl = (settings: Pick<PipelineSettings, "baseUrl" | "tripsFilter">, page: number): string =>
  `${settings.baseUrl}/app/trips?trips_filter=${settings.tripsFilter}&page=${page}`
