/**
 * Domain models for tracked flight searches.
 *
 * These are the only shapes that leave the db package. Raw rows are converted
 * in rows.ts and never reach callers.
 */

export type TripType = 'ONE_WAY' | 'ROUND_TRIP'

/** 0 = any number of stops, 1 = nonstop, 2 = at most one stop, 3 = at most two stops */
export type StopsPreference = 0 | 1 | 2 | 3

export interface TrackingSubject {
  id: string
  userId: string
  origin: string
  destination: string
  /** YYYY-MM-DD */
  departureDate: string
  /** YYYY-MM-DD, null for one-way trips */
  returnDate: string | null
  tripType: TripType
  /** Airline names, IATA codes or alliance keywords. Empty means any carrier. */
  preferredCarriers: string[]
  stops: StopsPreference
  passengers: number
}

export interface FlightSegment {
  departureAirport: string
  departureTime: string | null
  arrivalAirport: string
  arrivalTime: string | null
  airline: string
  flightNumber: string | null
  durationMinutes: number | null
}

/** Structured details of the offer behind a price snapshot */
export interface FlightDetails {
  outboundSegments: FlightSegment[]
  returnSegments: FlightSegment[]
  totalDurationMinutes: number | null
  stops: number | null
  bookingToken: string | null
}

/** Most recent successful query result for a subject */
export interface PriceSnapshot {
  price: number
  currency: string
  carriers: string[]
  details: FlightDetails
  link: string | null
}

export interface PriceRecord {
  subjectId: string
  minimumPrice: number | null
  lastCheckedAt: Date | null
  lastNotifiedPrice: number | null
  latest: PriceSnapshot | null
}

/**
 * Fields written after a successful check. lastNotifiedPrice is owned by the
 * alerter and never written through this shape.
 */
export interface PriceRecordUpdate {
  minimumPrice: number
  lastCheckedAt: Date
  latest: PriceSnapshot
}

/** A search_requests row that could not be converted into a TrackingSubject */
export interface RejectedSubject {
  id: string
  /** Best-effort ORIGIN-DESTINATION departureDate from the raw row */
  route: string
  reason: string
}

export interface ActiveSubjects {
  subjects: TrackingSubject[]
  rejected: RejectedSubject[]
}

export interface User {
  id: string
  email: string | null
}
