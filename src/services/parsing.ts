/**
 * HTML parsing for trip list pages and trip detail pages.
 * Pure functions over page markup; the browser session only hands over `page.content()`.
 */

import * as cheerio from "cheerio"
import { TripHandle } from "../domain"

/** Each trip card on a list page links to its detail page through this anchor */
export const TRIP_LINK_SELECTOR = 'a[data-cy="trip-list-item-name"]'

/** Present on a trip detail page once its itinerary has rendered */
export const TRIP_DETAIL_READY_SELECTOR = '[data-cy="trip-date-span"]'

const TRIP_PATH = /\/app\/trips\/([^/?#]+)/

/**
 * Extracts trip handles from one list page, in document order.
 * Links that do not point at a trip detail page are ignored; repeated trips keep their first position.
 */
export const parseTripListing = (html: string, baseUrl: string, page: number): TripHandle[] => {
  const $ = cheerio.load(html)
  const seen = new Set<string>()
  const handles: TripHandle[] = []

  $(TRIP_LINK_SELECTOR).each((_, element) => {
    const link = $(element)
    const href = link.attr("href")
    if (!href || !URL.canParse(href, baseUrl)) return

    const url = new URL(href, baseUrl)
    const match = url.pathname.match(TRIP_PATH)
    if (!match) return

    const id = decodeURIComponent(match[1])
    if (seen.has(id)) return
    seen.add(id)

    const name = link.text().replace(/\s+/g, " ").trim()
    handles.push(
      new TripHandle({
        id,
        url: url.toString(),
        page,
        position: handles.length,
        name: name || undefined
      })
    )
  })

  return handles
}

export interface TripPageSummary {
  readonly title: string
  readonly text: string
}

/**
 * Collapses runs of whitespace inside each line and drops blank lines
 */
export const normalizeText = (text: string): string =>
  text
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n")

/** Elements that start a new line of rendered text */
const BLOCK_ELEMENTS = [
  "address", "article", "aside", "blockquote", "dd", "div", "dl", "dt", "fieldset", "figcaption", "figure",
  "footer", "form", "h1", "h2", "h3", "h4", "h5", "h6", "header", "hr", "li", "main", "nav", "ol", "p",
  "pre", "section", "table", "td", "th", "tr", "ul"
].join(", ")

/**
 * Reduces a trip detail page to its title and visible itinerary text.
 * The text is capped at `maxChars` to bound the size of the extraction prompt.
 */
export const summarizeTripPage = (html: string, maxChars: number): TripPageSummary => {
  const $ = cheerio.load(html)
  $("script, style, noscript, template").remove()

  const title =
    $("h1").first().text().trim() ||
    $(TRIP_LINK_SELECTOR).first().text().trim() ||
    $('a[class*="tripName"]').first().text().trim() ||
    "Unknown Trip"

  // cheerio's text() joins sibling elements without a separator
  $("br").replaceWith("\n")
  $(BLOCK_ELEMENTS).before("\n").after("\n")

  const main = $('main, [role="main"], .container').first()
  const root = main.length > 0 ? main : $("body")

  return {
    title: title.replace(/\s+/g, " "),
    text: normalizeText(root.text()).slice(0, maxChars)
  }
}
