/**
 * Google Flights response parsing
 *
 * Turns a SerpApi google_flights payload into the cheapest FlightOffer.
 * Only the fields we read are declared; unknown keys are ignored. Offers are
 * validated one by one so a single odd offer does not hide its siblings.
 */

import { z } from 'zod'
import type { FlightDetails, FlightSegment } from '@farewatch/db'
import type { FlightOffer, PriceQueryResult } from './types'

// ═══════════════════════════════════════════════════════════════════════════════
// Schema
// ═══════════════════════════════════════════════════════════════════════════════

const airportSchema = z.object({
  id: z.string().optional(),
  time: z.string().optional(),
})

const segmentSchema = z.object({
  departure_airport: airportSchema.optional(),
  arrival_airport: airportSchema.optional(),
  airline: z.string().optional(),
  flight_number: z.string().optional(),
  duration: z.number().optional(),
})

const priceSchema = z.union([
  z.number(),
  z.object({
    total: z.union([z.number(), z.string()]).optional(),
    currency: z.string().optional(),
  }),
])

const offerSchema = z.object({
  flights: z.array(segmentSchema).default([]),
  return_flights: z.array(segmentSchema).optional(),
  layovers: z.array(z.unknown()).optional(),
  price: priceSchema.optional(),
  total_duration: z.number().optional(),
  stops: z.number().int().nonnegative().optional(),
  link: z.string().optional(),
  booking_token: z.string().optional(),
})

export const searchResponseSchema = z.object({
  error: z.string().optional(),
  search_metadata: z
    .object({
      status: z.string().optional(),
      google_flights_url: z.string().optional(),
    })
    .optional(),
  search_parameters: z
    .object({
      currency: z.string().optional(),
    })
    .optional(),
  best_flights: z.array(z.unknown()).optional(),
  other_flights: z.array(z.unknown()).optional(),
})

type RawOffer = z.infer<typeof offerSchema>
type RawSegment = z.infer<typeof segmentSchema>
export type SearchResponse = z.infer<typeof searchResponseSchema>

// ═══════════════════════════════════════════════════════════════════════════════
// Extraction
// ═══════════════════════════════════════════════════════════════════════════════

const NO_RESULTS_PATTERN = /hasn't returned any results|no results/i

export function isNoResultsMessage(message: string): boolean {
  return NO_RESULTS_PATTERN.test(message)
}

interface OfferPrice {
  amount: number
  currency: string | null
}

function readPrice(price: RawOffer['price']): OfferPrice | null {
  if (price === undefined) return null

  if (typeof price === 'number') {
    return Number.isFinite(price) && price > 0 ? { amount: price, currency: null } : null
  }

  const amount = typeof price.total === 'string' ? Number(price.total) : price.total
  if (amount === undefined || !Number.isFinite(amount) || amount <= 0) return null
  return { amount, currency: price.currency ?? null }
}

function readOffers(items: unknown[] | undefined): RawOffer[] {
  const offers: RawOffer[] = []
  for (const item of items ?? []) {
    const parsed = offerSchema.safeParse(item)
    if (parsed.success) offers.push(parsed.data)
  }
  return offers
}

function toSegment(segment: RawSegment): FlightSegment {
  return {
    departureAirport: segment.departure_airport?.id ?? '',
    departureTime: segment.departure_airport?.time ?? null,
    arrivalAirport: segment.arrival_airport?.id ?? '',
    arrivalTime: segment.arrival_airport?.time ?? null,
    airline: segment.airline ?? '',
    flightNumber: segment.flight_number ?? null,
    durationMinutes: segment.duration ?? null,
  }
}

function toDetails(offer: RawOffer): FlightDetails {
  const stops = offer.stops ?? offer.layovers?.length ?? Math.max(offer.flights.length - 1, 0)
  return {
    outboundSegments: offer.flights.map(toSegment),
    returnSegments: (offer.return_flights ?? []).map(toSegment),
    totalDurationMinutes: offer.total_duration ?? null,
    stops,
    bookingToken: offer.booking_token ?? null,
  }
}

function distinctCarriers(offer: RawOffer): string[] {
  const carriers: string[] = []
  for (const segment of offer.flights) {
    const airline = segment.airline?.trim()
    if (airline && !carriers.includes(airline)) {
      carriers.push(airline)
    }
  }
  return carriers
}

/**
 * Cheapest priced offer across best_flights then other_flights. Ties keep the
 * earlier offer; offers that do not match the offer schema are skipped.
 */
export function selectCheapestOffer(
  response: SearchResponse,
  fallbackCurrency: string
): FlightOffer | null {
  const offers = [...readOffers(response.best_flights), ...readOffers(response.other_flights)]
  const responseCurrency = response.search_parameters?.currency ?? fallbackCurrency

  let cheapest: { offer: RawOffer; price: OfferPrice } | null = null
  for (const offer of offers) {
    const price = readPrice(offer.price)
    if (price && (cheapest === null || price.amount < cheapest.price.amount)) {
      cheapest = { offer, price }
    }
  }

  if (cheapest === null) return null

  const { offer, price } = cheapest
  return {
    price: price.amount,
    currency: (price.currency ?? responseCurrency).toUpperCase(),
    carriers: distinctCarriers(offer),
    details: toDetails(offer),
    link: offer.link || response.search_metadata?.google_flights_url || null,
  }
}

/**
 * Classify a 200 response body.
 */
export function parseSearchResponse(data: unknown, fallbackCurrency: string): PriceQueryResult {
  const parsed = searchResponseSchema.safeParse(data)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    return {
      status: 'ERROR',
      code: 'MALFORMED_RESPONSE',
      message: `Unexpected response shape: ${issues.join('; ')}`,
    }
  }

  const response = parsed.data
  if (response.error) {
    if (isNoResultsMessage(response.error)) {
      return { status: 'NO_RESULTS', message: response.error }
    }
    return { status: 'ERROR', code: 'UPSTREAM_ERROR', message: response.error }
  }

  const offer = selectCheapestOffer(response, fallbackCurrency)
  if (offer === null) {
    return { status: 'NO_RESULTS', message: 'No priced flight offers returned' }
  }

  return { status: 'OK', offer }
}
