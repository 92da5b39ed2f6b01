/**
 * Normalization and validation of extracted flight segments
 *
 * Model output is untrusted: every candidate is cleaned up the same way and then
 * decoded against the FlightRecord schema on its own, so one bad segment never
 * costs the rest of the trip.
 */

import { Schema } from "@effect/schema"
import { Either } from "effect"
import { FlightRecord } from "./types"

export interface RejectedSegment {
  readonly candidate: unknown
  readonly issue: string
}

export interface CandidateValidation {
  readonly records: ReadonlyArray<FlightRecord>
  readonly rejected: ReadonlyArray<RejectedSegment>
}

const decodeFlightRecord = Schema.decodeUnknownEither(FlightRecord)

const trimmed = (value: unknown): unknown => (typeof value === "string" ? value.trim() : value)

const upperCased = (value: unknown): unknown => (typeof value === "string" ? value.trim().toUpperCase() : value)

/**
 * Trims fields, upper-cases codes and strips separators from flight numbers ("ua 794" -> "UA794").
 * Non-object candidates are returned untouched and fail validation later.
 */
export const normalizeCandidate = (candidate: unknown): unknown => {
  if (typeof candidate !== "object" || candidate === null) return candidate
  const fields: Record<string, unknown> = { ...candidate }
  return {
    date: trimmed(fields.date),
    origin: upperCased(fields.origin),
    destination: upperCased(fields.destination),
    flight_number:
      typeof fields.flight_number === "string"
        ? fields.flight_number.replace(/[\s-]/g, "").toUpperCase()
        : fields.flight_number
  }
}

/**
 * Splits candidates into accepted records (in input order) and rejected ones
 */
export const validateCandidates = (candidates: ReadonlyArray<unknown>): CandidateValidation => {
  const records: FlightRecord[] = []
  const rejected: RejectedSegment[] = []

  for (const candidate of candidates) {
    const decoded = decodeFlightRecord(normalizeCandidate(candidate))
    if (Either.isRight(decoded)) {
      records.push(decoded.right)
    } else {
      rejected.push({ candidate, issue: decoded.left.message })
    }
  }

  return { records, rejected }
}
