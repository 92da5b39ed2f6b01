/**
 * Domain types and schemas for the trip flight exporter
 */

import { Schema } from "@effect/schema"
import { Data } from "effect"
import type { ExtractionError, FetchError, PaginationHalted } from "./errors"

const isCalendarDate = (value: string): boolean => {
  const [year, month, day] = value.split("-").map(Number)
  // setUTCFullYear keeps years 0-99 as given; Date.UTC would map them to 1900-1999
  const date = new Date(0)
  date.setUTCFullYear(year, month - 1, day)
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
}

/** Date schema (YYYY-MM-DD naming a real calendar day) */
export const DateStringSchema = Schema.String.pipe(
  Schema.pattern(/^\d{4}-\d{2}-\d{2}$/),
  Schema.filter(isCalendarDate, { message: () => "Expected a real calendar date" }),
  Schema.brand("DateString")
)
export type DateString = Schema.Schema.Type<typeof DateStringSchema>

/** Airport code schema (3-letter IATA codes) */
export const AirportCodeSchema = Schema.String.pipe(
  Schema.pattern(/^[A-Z]{3}$/),
  Schema.brand("AirportCode")
)
export type AirportCode = Schema.Schema.Type<typeof AirportCodeSchema>

/** Carrier code followed by the numeric suffix, e.g. UA794 or 9W12 */
export const FlightNumberSchema = Schema.String.pipe(
  Schema.pattern(/^[A-Z0-9]{2,3}\d{1,4}$/),
  Schema.brand("FlightNumber")
)
export type FlightNumber = Schema.Schema.Type<typeof FlightNumberSchema>

/** One validated flight segment, the unit of output */
export class FlightRecord extends Schema.Class<FlightRecord>("FlightRecord")({
  date: DateStringSchema,
  origin: AirportCodeSchema,
  destination: AirportCodeSchema,
  flight_number: FlightNumberSchema
}) {}

/** Reference to one trip's detail page, as found on a listing page */
export class TripHandle extends Schema.Class<TripHandle>("TripHandle")({
  id: Schema.String.pipe(Schema.nonEmptyString()),
  url: Schema.String,
  page: Schema.Number.pipe(Schema.int(), Schema.positive()),
  position: Schema.Number.pipe(Schema.int(), Schema.nonNegative()),
  name: Schema.optional(Schema.String)
}) {}

export const TripsFilterSchema = Schema.Literal("past", "upcoming")
export type TripsFilter = Schema.Schema.Type<typeof TripsFilterSchema>

/** Something the page fetcher can navigate to */
export type PageTarget = Data.TaggedEnum<{
  Listing: { readonly page: number }
  Trip: { readonly handle: TripHandle }
}>
export const PageTarget = Data.taggedEnum<PageTarget>()

/** Fully loaded page markup, scoped to one extraction attempt */
export interface RawPageContent {
  readonly url: string
  readonly html: string
}

/** A trip that contributed nothing to the output, and why */
export interface TripFailure {
  readonly handle: TripHandle
  readonly stage: "fetch" | "extract"
  readonly reason: FetchError["reason"] | ExtractionError["reason"]
  readonly message: string
}

/** A trip that was read and extracted, with the flights it contributed (possibly none) */
export interface TripExtraction {
  readonly handle: TripHandle
  readonly records: ReadonlyArray<FlightRecord>
}

export type RunStatus = Data.TaggedEnum<{
  Completed: { readonly lastPage: number }
  Checkpointed: {
    readonly resumePage: number
    readonly reason: PaginationHalted["reason"]
    readonly message: string
  }
  Aborted: { readonly resumePage: number }
}>
export const RunStatus = Data.taggedEnum<RunStatus>()

/** Accumulated output and failure log of one pipeline run */
export interface RunResult {
  readonly records: ReadonlyArray<FlightRecord>
  readonly extractions: ReadonlyArray<TripExtraction>
  readonly failures: ReadonlyArray<TripFailure>
  readonly tripsProcessed: number
  readonly status: RunStatus
}

/** The page a follow-up run should start from, if this one ended early */
export const resumePageOf = (status: RunStatus): number | undefined =>
  status._tag === "Completed" ? undefined : status.resumePage
