/**
 * Tests for CSV rendering and the file-backed exporter.
 */

import { describe, expect, test } from "vitest"
import { FileSystem } from "@effect/platform"
import { SystemError } from "@effect/platform/Error"
import { Effect, Layer } from "effect"
import { RunStatus, type RunResult } from "../src/domain"
import { CsvExporterLive, EXPORT_COLUMNS, Exporter, renderCsv } from "../src/services/exporter"
import { TestConfig, flight, runQuiet, testSettings } from "./support/fakes"

const HEADER =
  "Date,From,To,Flight_Number,Airline,Distance,Duration,Seat,Seat_Type,Class,Reason,Plane,Registration,Trip,Note,From_OID,To_OID,Airline_OID,Plane_OID"
const EMPTY_TAIL = ",".repeat(15)

const resultWith = (records: RunResult["records"]): RunResult => ({
  records,
  extractions: [],
  failures: [],
  tripsProcessed: records.length,
  status: RunStatus.Completed({ lastPage: 1 })
})

describe("renderCsv", () => {
  test("has the OpenFlights header", () => {
    expect(EXPORT_COLUMNS).toHaveLength(19)
    expect(renderCsv([])).toBe(`${HEADER}\r\n`)
  })

  test("writes one row per record in record order with the extra columns empty", () => {
    const csv = renderCsv([flight("2024-11-10", "PIT", "SFO", "UA795"), flight("2024-11-06", "SFO", "PIT", "UA794")])

    expect(csv.split("\r\n")).toEqual([
      HEADER,
      `2024-11-10,PIT,SFO,UA795${EMPTY_TAIL}`,
      `2024-11-06,SFO,PIT,UA794${EMPTY_TAIL}`,
      ""
    ])
  })

  test("keeps repeated flights", () => {
    const record = flight("2024-11-06", "SFO", "PIT", "UA794")
    expect(renderCsv([record, record]).split("\r\n")).toHaveLength(4)
  })
})

describe("CsvExporterLive", () => {
  const withFileSystem = (fileSystem: Partial<FileSystem.FileSystem>) =>
    CsvExporterLive.pipe(
      Layer.provide(FileSystem.layerNoop(fileSystem)),
      Layer.provide(TestConfig({ ...testSettings, outputFile: "out/flights.csv" }))
    )

  test("replaces the output file with the rendered CSV", async () => {
    const writes: Array<{ path: string; content: string }> = []
    const capture = (path: string, content: string) =>
      Effect.sync(() => {
        writes.push({ path, content })
      })

    const records = [flight("2024-11-06", "SFO", "PIT", "UA794")]
    const summary = await runQuiet(
      Effect.gen(function* () {
        const exporter = yield* Exporter
        return yield* exporter.write(resultWith(records))
      }).pipe(
        Effect.provide(
          withFileSystem({
            writeFileString: (path, content) => capture(path, content),
            writeFile: (path, data) => capture(path, new TextDecoder().decode(data))
          })
        )
      )
    )

    expect(summary).toEqual({ path: "out/flights.csv", rows: 1 })
    expect(writes).toEqual([{ path: "out/flights.csv", content: renderCsv(records) }])
  })

  test("reports a failed write as an ExportError", async () => {
    const denied = (path: string) =>
      Effect.fail(
        new SystemError({ reason: "PermissionDenied", module: "FileSystem", method: "writeFile", pathOrDescriptor: path })
      )

    const error = await runQuiet(
      Effect.gen(function* () {
        const exporter = yield* Exporter
        return yield* exporter.write(resultWith([]))
      }).pipe(
        Effect.flip,
        Effect.provide(withFileSystem({ writeFileString: (path) => denied(path), writeFile: (path) => denied(path) }))
      )
    )

    expect(error._tag).toBe("ExportError")
    expect(error.path).toBe("out/flights.csv")
  })
})
