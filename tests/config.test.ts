/**
 * Tests for settings loading and command-line parsing.
 */

import { describe, expect, test } from "vitest"
import { ConfigProvider, Effect } from "effect"
import { defaultPipelineSettings, listingUrl, loadPipelineSettings, type SettingsOverrides } from "../src/services/config"
import { parseArgs, toOverrides } from "../src/cli/index"

const loadWith = (env: Record<string, string>, overrides: SettingsOverrides = {}) =>
  loadPipelineSettings(overrides).pipe(
    Effect.withConfigProvider(ConfigProvider.fromMap(new Map(Object.entries(env)))),
    Effect.either,
    Effect.runPromise
  )

describe("loadPipelineSettings", () => {
  test("uses the defaults when nothing is set", async () => {
    const settings = await loadWith({})

    expect(settings._tag).toBe("Right")
    if (settings._tag === "Right") {
      expect(settings.right).toEqual(defaultPipelineSettings)
    }
  })

  test("reads the environment", async () => {
    const settings = await loadWith({
      TRIPS_BASE_URL: "https://trips.example.test/",
      TRIPS_FILTER: "upcoming",
      TRIPS_START_PAGE: "4",
      BROWSER_HEADLESS: "true",
      BROWSER_CHANNEL: "chrome",
      THROTTLE_MAX_ATTEMPTS: "2",
      PACE_MIN_DELAY_MS: "0"
    })

    expect(settings._tag).toBe("Right")
    if (settings._tag === "Right") {
      expect(settings.right.baseUrl).toBe("https://trips.example.test")
      expect(settings.right.tripsFilter).toBe("upcoming")
      expect(settings.right.startPage).toBe(4)
      expect(settings.right.headless).toBe(true)
      expect(settings.right.browserChannel).toBe("chrome")
      expect(settings.right.throttle).toEqual({ ...defaultPipelineSettings.throttle, maxAttempts: 2 })
      expect(settings.right.pacing.minDelayMs).toBe(0)
    }
  })

  test("lets command-line values win over the environment", async () => {
    const settings = await loadWith(
      { TRIPS_START_PAGE: "4", EXPORT_OUTPUT_FILE: "env.csv" },
      { startPage: 7, outputFile: "cli.csv", throttleMaxAttempts: 9 }
    )

    expect(settings._tag).toBe("Right")
    if (settings._tag === "Right") {
      expect(settings.right.startPage).toBe(7)
      expect(settings.right.outputFile).toBe("cli.csv")
      expect(settings.right.throttle.maxAttempts).toBe(9)
    }
  })

  test("rejects a start page below 1", async () => {
    expect((await loadWith({ TRIPS_START_PAGE: "0" }))._tag).toBe("Left")
  })

  test("rejects an unknown trips filter", async () => {
    expect((await loadWith({ TRIPS_FILTER: "all" }))._tag).toBe("Left")
  })
})

describe("listingUrl", () => {
  test("builds the paginated trip list URL", () => {
    expect(listingUrl({ baseUrl: "https://trips.example.test", tripsFilter: "past" }, 3)).toBe(
      "https://trips.example.test/app/trips?trips_filter=past&page=3"
    )
  })
})

describe("parseArgs", () => {
  test("has quiet defaults", () => {
    expect(parseArgs([])).toEqual({ skipLogin: false, json: false, verbose: false, help: false, invalid: [] })
  })

  test("reads every flag", () => {
    const args = parseArgs([
      "--start-page",
      "7",
      "--filter",
      "upcoming",
      "-o",
      "page7.csv",
      "--headless",
      "--channel",
      "chrome",
      "-m",
      "gpt-4o",
      "--max-attempts",
      "8",
      "--skip-login",
      "--json",
      "-v"
    ])

    expect(args.invalid).toEqual([])
    expect(toOverrides(args)).toEqual({
      startPage: 7,
      tripsFilter: "upcoming",
      outputFile: "page7.csv",
      headless: true,
      browserChannel: "chrome",
      model: "gpt-4o",
      throttleMaxAttempts: 8
    })
    expect([args.skipLogin, args.json, args.verbose]).toEqual([true, true, true])
  })

  test("collects unknown flags and unusable values", () => {
    expect(parseArgs(["--start-page", "0", "--filter", "all", "--tui"]).invalid).toEqual([
      "--start-page 0",
      "--filter all",
      "--tui"
    ])
    expect(parseArgs(["-s"]).invalid).toEqual(["-s"])
  })

  test("recognizes help", () => {
    expect(parseArgs(["-h"]).help).toBe(true)
  })
})
