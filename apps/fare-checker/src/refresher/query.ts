import type { TrackingSubject } from '@farewatch/db'
import { InvalidSubjectError } from '../errors'
import type { PriceQuery, TripQuery } from '../price-source/types'

export function describeRoute(subject: TrackingSubject): string {
  return `${subject.origin}-${subject.destination} ${subject.departureDate}`
}

function toTrip(subject: TrackingSubject): TripQuery {
  switch (subject.tripType) {
    case 'ONE_WAY':
      return { type: 'ONE_WAY' }
    case 'ROUND_TRIP':
      if (!subject.returnDate) {
        throw new InvalidSubjectError(subject.id, 'Round trip has no return date')
      }
      if (subject.returnDate < subject.departureDate) {
        throw new InvalidSubjectError(
          subject.id,
          `Return date ${subject.returnDate} is before departure date ${subject.departureDate}`
        )
      }
      return { type: 'ROUND_TRIP', returnDate: subject.returnDate }
  }
}

/**
 * Build the price query for a subject. Stops 0 (any) leaves the constraint out.
 */
export function buildPriceQuery(subject: TrackingSubject): PriceQuery {
  if (subject.origin === subject.destination) {
    throw new InvalidSubjectError(subject.id, `Origin and destination are both ${subject.origin}`)
  }

  const query: PriceQuery = {
    origin: subject.origin,
    destination: subject.destination,
    departureDate: subject.departureDate,
    trip: toTrip(subject),
    carriers: subject.preferredCarriers,
    passengers: subject.passengers,
  }

  if (subject.stops !== 0) {
    query.stops = subject.stops
  }

  return query
}
