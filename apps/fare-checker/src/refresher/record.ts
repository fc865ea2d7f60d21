import type { PriceRecord, PriceRecordUpdate } from '@farewatch/db'
import type { FlightOffer } from '../price-source/types'

/**
 * Fields to write after a successful check. The minimum only ever goes down;
 * lastNotifiedPrice is left to the alerter.
 */
export function applyOffer(
  previous: PriceRecord | null,
  offer: FlightOffer,
  checkedAt: Date
): PriceRecordUpdate {
  const currentMinimum = previous?.minimumPrice ?? null
  const minimumPrice =
    currentMinimum === null || offer.price < currentMinimum ? offer.price : currentMinimum

  return {
    minimumPrice,
    lastCheckedAt: checkedAt,
    latest: offer,
  }
}
