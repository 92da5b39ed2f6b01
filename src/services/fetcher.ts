/**
 * PageFetcher: loads one list page or one trip detail page through the browsing session
 */

import { Context, Effect, Layer } from "effect"
import type { FetchError, PageTarget, RawPageContent } from "../domain"
import { RequestPacer } from "../utils/pacer"
import { BrowserSession } from "./browser"
import { PipelineConfig, listingUrl, type PipelineSettings } from "./config"
import { TRIP_DETAIL_READY_SELECTOR, TRIP_LINK_SELECTOR } from "./parsing"

/**
 * Service Definition for page fetching.
 * Not safe to call concurrently: every call moves the shared browser page.
 */
export class PageFetcher extends Context.Tag("PageFetcher")<
  PageFetcher,
  {
    readonly fetch: (target: PageTarget) => Effect.Effect<RawPageContent, FetchError>
  }
>() {}

export const targetUrl = (settings: PipelineSettings, target: PageTarget): string =>
  target._tag === "Listing" ? listingUrl(settings, target.page) : target.handle.url

const readySelectorFor = (target: PageTarget): string =>
  target._tag === "Listing" ? TRIP_LINK_SELECTOR : TRIP_DETAIL_READY_SELECTOR

/**
 * Fetcher backed by the browsing session, paced by the RequestPacer
 */
export const PageFetcherLive = Layer.effect(
  PageFetcher,
  Effect.gen(function* () {
    const session = yield* BrowserSession
    const pacer = yield* RequestPacer
    const settings = yield* PipelineConfig

    return PageFetcher.of({
      fetch: (target) => {
        const url = targetUrl(settings, target)
        return pacer.acquire().pipe(
          Effect.zipRight(session.navigate(url, readySelectorFor(target))),
          Effect.map((html): RawPageContent => ({ url, html })),
          Effect.tap((content) => Effect.logDebug(`Loaded ${content.html.length} bytes`)),
          Effect.annotateLogs({ target: target._tag, url })
        )
      }
    })
  })
)
