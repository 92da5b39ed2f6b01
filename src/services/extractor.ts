/**
 * RecordExtractor: turns one trip detail page into validated flight records
 */

import { Schema } from "@effect/schema"
import { Context, Effect, Layer } from "effect"
import { ExtractionErrors, type ExtractionError, type FlightRecord, type RawPageContent, validateCandidates } from "../domain"
import { PipelineConfig } from "./config"
import { InferenceClient } from "./inference"
import { summarizeTripPage, type TripPageSummary } from "./parsing"

/**
 * Service Definition for record extraction.
 * Segments that fail validation are dropped; only a failed or unreadable call fails the trip.
 */
export class RecordExtractor extends Context.Tag("RecordExtractor")<
  RecordExtractor,
  {
    readonly extract: (content: RawPageContent) => Effect.Effect<ReadonlyArray<FlightRecord>, ExtractionError>
  }
>() {}

const segmentProperties = {
  date: { type: "string", description: "Departure date in YYYY-MM-DD format" },
  origin: { type: "string", description: "Origin airport IATA code, e.g. SFO" },
  destination: { type: "string", description: "Destination airport IATA code, e.g. PIT" },
  flight_number: { type: "string", description: "Airline code followed by the flight number, e.g. UA794" }
} as const

/** Response schema sent with every extraction request */
export const FLIGHT_SEGMENTS_SCHEMA = {
  type: "object",
  additionalProperties: false,
  required: ["flights"],
  properties: {
    flights: {
      type: "array",
      items: {
        type: "object",
        additionalProperties: false,
        required: ["date", "origin", "destination", "flight_number"],
        properties: segmentProperties
      }
    }
  }
} as const

const ExtractionEnvelope = Schema.Struct({
  flights: Schema.Array(Schema.Unknown)
})

export const EXTRACTION_SYSTEM_PROMPT =
  "You extract flight segments from the text of a travel itinerary page. " +
  "Report only what the page states. When a segment is missing its date, airports or flight number, leave it out instead of guessing."

export const buildExtractionPrompt = (summary: TripPageSummary): string =>
  [
    `Trip title: ${summary.title}`,
    "",
    "Visible text of the trip page:",
    summary.text,
    "",
    "List every flight segment on this page. Ignore hotels, cars, activities and layover entries.",
    "Each connecting flight is its own segment.",
    "- date: departure date as YYYY-MM-DD (a heading like \"Thu, Nov 6\" belongs to the trip's year)",
    "- origin and destination: IATA airport codes (\"SFO - PIT\" means origin SFO, destination PIT)",
    "- flight_number: airline code and number without spaces (\"Flight Number UA 794\" becomes UA794)",
    "If the page has no flights, return an empty list."
  ].join("\n")

export const RecordExtractorLive = Layer.effect(
  RecordExtractor,
  Effect.gen(function* () {
    const inference = yield* InferenceClient
    const { maxContentChars } = yield* PipelineConfig

    return RecordExtractor.of({
      extract: (content) =>
        Effect.gen(function* () {
          const summary = summarizeTripPage(content.html, maxContentChars)

          const response = yield* inference.complete({
            system: EXTRACTION_SYSTEM_PROMPT,
            prompt: buildExtractionPrompt(summary),
            schemaName: "flight_segments",
            schema: FLIGHT_SEGMENTS_SCHEMA
          })

          const envelope = yield* Schema.decodeUnknown(ExtractionEnvelope)(response).pipe(
            Effect.mapError((error) => ExtractionErrors.malformedResponse(error.message))
          )

          const { records, rejected } = validateCandidates(envelope.flights)
          yield* Effect.forEach(
            rejected,
            (segment) =>
              Effect.logWarning(`Dropped invalid flight segment from "${summary.title}"`).pipe(
                Effect.annotateLogs({ segment: JSON.stringify(segment.candidate), issue: segment.issue })
              ),
            { discard: true }
          )

          return records
        }).pipe(Effect.annotateLogs({ url: content.url }))
    })
  })
)
