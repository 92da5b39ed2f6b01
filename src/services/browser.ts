/**
 * Browsing session: the single authenticated browser page every fetch goes through
 */

import { Context, Duration, Effect, Layer } from "effect"
import { chromium, errors, type LaunchOptions } from "playwright-core"
import { FetchError, FetchErrors, SessionError } from "../domain"
import { PipelineConfig, type PipelineSettings } from "./config"

/**
 * Service Definition for the browsing session.
 * Navigations are serialized: the session holds one page, and two callers
 * navigating it at once would read each other's content.
 */
export class BrowserSession extends Context.Tag("BrowserSession")<
  BrowserSession,
  {
    /** Loads `url`, waits for `readySelector` and the settle delay, and returns the page markup */
    readonly navigate: (url: string, readySelector: string) => Effect.Effect<string, FetchError>
    /** Loads `url` without waiting for anything, e.g. to show the login form */
    readonly open: (url: string) => Effect.Effect<void, FetchError>
  }
>() {}

// Chromium reports host-side rate limiting as broken connections rather than HTTP 429
const THROTTLE_SIGNATURES = [
  "ERR_HTTP2_PROTOCOL_ERROR",
  "ERR_QUIC_PROTOCOL_ERROR",
  "ERR_CONNECTION_RESET",
  "ERR_CONNECTION_CLOSED",
  "ERR_EMPTY_RESPONSE"
]

/**
 * Maps a failed navigation to a fetch failure
 */
export const classifyNavigationError = (url: string, error: unknown): FetchError => {
  const details = error instanceof Error ? error.message : String(error)
  return THROTTLE_SIGNATURES.some((signature) => details.includes(signature))
    ? FetchErrors.throttled(url, details)
    : FetchErrors.transient(url, details)
}

/**
 * Maps the HTTP status of the main document; `undefined` means the page loaded
 */
export const classifyStatus = (url: string, status: number): FetchError | undefined => {
  if (status === 429 || status === 503) return FetchErrors.throttled(url, `HTTP ${status}`)
  if (status === 404 || status === 410) return FetchErrors.notFound(url, `HTTP ${status}`)
  if (status >= 400) return FetchErrors.transient(url, `HTTP ${status}`)
  return undefined
}

/**
 * Chromium launch options. Playwright's own SIGINT handler exits the process,
 * so Ctrl+C is left to the CLI, which stops the run and still exports.
 */
export const browserLaunchOptions = (settings: Pick<PipelineSettings, "headless" | "browserChannel">): LaunchOptions => ({
  headless: settings.headless,
  channel: settings.browserChannel,
  handleSIGINT: false
})

/**
 * Playwright-backed session. The browser is launched when the layer is built
 * and closed when its scope ends.
 */
export const BrowserSessionLive: Layer.Layer<BrowserSession, SessionError, PipelineConfig> = Layer.scoped(
  BrowserSession,
  Effect.gen(function* () {
    const settings = yield* PipelineConfig

    const browser = yield* Effect.acquireRelease(
      Effect.tryPromise({
        try: () => chromium.launch(browserLaunchOptions(settings)),
        catch: (error) =>
          new SessionError({
            reason: "LaunchFailed",
            message: `Could not launch the browser: ${String(error)}\n\nInstall Chromium with "npx playwright install chromium" or set BROWSER_CHANNEL=chrome`
          })
      }),
      (browser) =>
        Effect.tryPromise(() => browser.close()).pipe(
          Effect.catchAll((error) => Effect.logWarning("Browser did not close cleanly", error))
        )
    )

    const page = yield* Effect.tryPromise({
      try: () => browser.newPage(),
      catch: (error) => new SessionError({ reason: "LaunchFailed", message: `Could not open a browser tab: ${String(error)}` })
    })

    const lock = yield* Effect.makeSemaphore(1)

    const goto = (url: string) =>
      Effect.tryPromise({
        try: () => page.goto(url, { waitUntil: "domcontentloaded", timeout: settings.navigationTimeoutMs }),
        catch: (error) => classifyNavigationError(url, error)
      })

    return BrowserSession.of({
      navigate: (url, readySelector) =>
        Effect.gen(function* () {
          const response = yield* goto(url)
          const statusFailure = response ? classifyStatus(url, response.status()) : undefined
          if (statusFailure) {
            return yield* Effect.fail(statusFailure)
          }

          yield* Effect.tryPromise({
            try: () => page.waitForSelector(readySelector, { timeout: settings.readyTimeoutMs }),
            catch: (error) =>
              error instanceof errors.TimeoutError
                ? FetchErrors.notFound(url, `"${readySelector}" did not appear within ${settings.readyTimeoutMs}ms`)
                : classifyNavigationError(url, error)
          })
          yield* Effect.sleep(Duration.millis(settings.settleMs))

          return yield* Effect.tryPromise({
            try: () => page.content(),
            catch: (error) => classifyNavigationError(url, error)
          })
        }).pipe(
          lock.withPermits(1),
          Effect.annotateLogs({ url })
        ),

      open: (url) => goto(url).pipe(Effect.asVoid, lock.withPermits(1))
    })
  })
)
