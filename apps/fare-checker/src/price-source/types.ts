/**
 * Price Source contract
 *
 * A price source answers one PriceQuery with a result union. Expected failures
 * (no flights, auth, quota, transport) come back as values, never as throws.
 */

import type { PriceSnapshot } from '@farewatch/db'

export type TripQuery = { type: 'ONE_WAY' } | { type: 'ROUND_TRIP'; returnDate: string }

export interface PriceQuery {
  origin: string
  destination: string
  /** YYYY-MM-DD */
  departureDate: string
  trip: TripQuery
  /** Names, codes or alliance keywords as the user saved them. Empty means any. */
  carriers: string[]
  /** Absent means any number of stops */
  stops?: 1 | 2 | 3
  passengers: number
}

export type FlightOffer = PriceSnapshot

export type PriceSourceErrorCode =
  | 'AUTH'
  | 'QUOTA'
  | 'TIMEOUT'
  | 'NETWORK'
  | 'MALFORMED_RESPONSE'
  | 'UPSTREAM_ERROR'

export type PriceQueryResult =
  | { status: 'OK'; offer: FlightOffer }
  | { status: 'NO_RESULTS'; message: string }
  | { status: 'ERROR'; code: PriceSourceErrorCode; message: string; httpStatus?: number }

export interface PriceSource {
  search(query: PriceQuery): Promise<PriceQueryResult>
}
