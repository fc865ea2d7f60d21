/**
 * Row conversion at the store boundary.
 *
 * pg hands back numeric columns as strings, timestamps as Date and jsonb as
 * parsed values. Everything is checked here so callers only ever see the
 * models in types.ts.
 */

import { z } from 'zod'
import { RowConversionError } from './errors'
import type {
  FlightDetails,
  RejectedSubject,
  PriceRecord,
  PriceSnapshot,
  StopsPreference,
  TrackingSubject,
  TripType,
  User,
} from './types'

const id = z.union([z.string().min(1), z.number().int()]).transform(String)

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')

const numeric = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const parsed = typeof value === 'number' ? value : Number(value.trim() === '' ? NaN : value)
  if (!Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: ${String(value)}` })
    return z.NEVER
  }
  return parsed
})

const stops = z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)])

const TRIP_TYPES: Record<'one_way' | 'round_trip', TripType> = {
  one_way: 'ONE_WAY',
  round_trip: 'ROUND_TRIP',
}

const searchRequestRow = z.object({
  id,
  user_id: id,
  depart_from: z.string().trim().min(1),
  arrive_at: z.string().trim().min(1),
  departure_date: isoDate,
  return_date: isoDate.nullable(),
  trip_type: z.enum(['one_way', 'round_trip']),
  preferred_airlines: z.array(z.string()).nullable(),
  stops: stops.nullable(),
  passengers: z.number().int().min(1).nullable().optional(),
})

const flightSegment = z.object({
  departureAirport: z.string().default(''),
  departureTime: z.string().nullable().default(null),
  arrivalAirport: z.string().default(''),
  arrivalTime: z.string().nullable().default(null),
  airline: z.string().default(''),
  flightNumber: z.string().nullable().default(null),
  durationMinutes: z.number().nullable().default(null),
})

export const EMPTY_FLIGHT_DETAILS: FlightDetails = {
  outboundSegments: [],
  returnSegments: [],
  totalDurationMinutes: null,
  stops: null,
  bookingToken: null,
}

// Rows written before details were structured fall back to empty details.
const flightDetails = z
  .object({
    outboundSegments: z.array(flightSegment).default([]),
    returnSegments: z.array(flightSegment).default([]),
    totalDurationMinutes: z.number().nullable().default(null),
    stops: z.number().nullable().default(null),
    bookingToken: z.string().nullable().default(null),
  })
  .catch(EMPTY_FLIGHT_DETAILS)

const priceTrackingRow = z.object({
  search_request_id: id,
  minimum_price: numeric.nullable(),
  last_checked: z.coerce.date().nullable(),
  last_notified_price: numeric.nullable(),
  latest_price: numeric.nullable().optional(),
  currency: z.string().nullable().optional(),
  airlines: z.array(z.string()).nullable().optional(),
  flight_details: flightDetails.nullable().optional(),
  flight_link: z.string().nullable().optional(),
})

const userRow = z.object({
  id,
  email: z.string().nullable(),
})

function parseRow<S extends z.ZodTypeAny>(table: string, schema: S, row: unknown): z.output<S> {
  const result = schema.safeParse(row)
  if (!result.success) {
    throw new RowConversionError(
      table,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(row)'}: ${issue.message}`)
    )
  }
  return result.data
}

export function toTrackingSubject(row: unknown): TrackingSubject {
  const r = parseRow('search_requests', searchRequestRow, row)
  const stopsPreference: StopsPreference = r.stops ?? 0

  return {
    id: r.id,
    userId: r.user_id,
    origin: r.depart_from.toUpperCase(),
    destination: r.arrive_at.toUpperCase(),
    departureDate: r.departure_date,
    returnDate: r.return_date,
    tripType: TRIP_TYPES[r.trip_type],
    preferredCarriers: (r.preferred_airlines ?? []).map((c) => c.trim()).filter((c) => c.length > 0),
    stops: stopsPreference,
    passengers: r.passengers ?? 1,
  }
}

function rawField(row: unknown, key: string): string {
  if (!row || typeof row !== 'object') return ''
  const value: unknown = Reflect.get(row, key)
  if (typeof value === 'string') return value.trim()
  if (typeof value === 'number') return String(value)
  return ''
}

/**
 * Describe a search_requests row that failed conversion, from whatever raw
 * fields it still has.
 */
export function rejectSubjectRow(row: unknown, error: RowConversionError): RejectedSubject {
  const origin = rawField(row, 'depart_from').toUpperCase()
  const destination = rawField(row, 'arrive_at').toUpperCase()
  return {
    id: rawField(row, 'id') || '(unknown)',
    route: `${origin}-${destination} ${rawField(row, 'departure_date')}`,
    reason: error.message,
  }
}

export function toPriceRecord(row: unknown): PriceRecord {
  const r = parseRow('price_tracking', priceTrackingRow, row)

  let latest: PriceSnapshot | null = null
  if (r.latest_price !== null && r.latest_price !== undefined) {
    latest = {
      price: r.latest_price,
      currency: r.currency ?? 'USD',
      carriers: r.airlines ?? [],
      details: r.flight_details ?? EMPTY_FLIGHT_DETAILS,
      link: r.flight_link ?? null,
    }
  }

  return {
    subjectId: r.search_request_id,
    minimumPrice: r.minimum_price,
    lastCheckedAt: r.last_checked,
    lastNotifiedPrice: r.last_notified_price,
    latest,
  }
}

export function toUser(row: unknown): User {
  const r = parseRow('users', userRow, row)
  return { id: r.id, email: r.email }
}
