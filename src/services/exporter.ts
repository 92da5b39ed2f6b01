/**
 * Exporter: writes the run's flight records as an OpenFlights-compatible CSV file
 */

import { FileSystem } from "@effect/platform"
import { Context, Effect, Layer } from "effect"
import { ExportError, type FlightRecord, type RunResult } from "../domain"
import { PipelineConfig } from "./config"

/** OpenFlights import columns; only the first four are filled in */
export const EXPORT_COLUMNS = [
  "Date",
  "From",
  "To",
  "Flight_Number",
  "Airline",
  "Distance",
  "Duration",
  "Seat",
  "Seat_Type",
  "Class",
  "Reason",
  "Plane",
  "Registration",
  "Trip",
  "Note",
  "From_OID",
  "To_OID",
  "Airline_OID",
  "Plane_OID"
] as const

export type ExportColumn = (typeof EXPORT_COLUMNS)[number]

export interface ExportSummary {
  readonly path: string
  readonly rows: number
}

const cellValue = (record: FlightRecord, column: ExportColumn): string => {
  switch (column) {
    case "Date":
      return record.date
    case "From":
      return record.origin
    case "To":
      return record.destination
    case "Flight_Number":
      return record.flight_number
    default:
      return ""
  }
}

const escapeCell = (value: string): string => (/[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value)

/**
 * Renders the header and one row per record, CRLF-terminated, in record order
 */
export const renderCsv = (records: ReadonlyArray<FlightRecord>): string =>
  [EXPORT_COLUMNS.join(","), ...records.map((record) => EXPORT_COLUMNS.map((column) => escapeCell(cellValue(record, column))).join(","))]
    .map((line) => `${line}\r\n`)
    .join("")

/**
 * Service Definition for export. Every call replaces the whole output file.
 */
export class Exporter extends Context.Tag("Exporter")<
  Exporter,
  {
    readonly write: (result: RunResult) => Effect.Effect<ExportSummary, ExportError>
  }
>() {}

export const CsvExporterLive = Layer.effect(
  Exporter,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const { outputFile } = yield* PipelineConfig

    return Exporter.of({
      write: (result) =>
        fs.writeFileString(outputFile, renderCsv(result.records)).pipe(
          Effect.mapError((error) => new ExportError({ path: outputFile, message: error.message })),
          Effect.as({ path: outputFile, rows: result.records.length }),
          Effect.tap((summary) => Effect.logInfo(`Wrote ${summary.rows} flight(s) to ${summary.path}`))
        )
    })
  })
)
