/**
 * Alert policy
 *
 * Decides whether a freshly stored price is worth an email. Kept apart from
 * the refresher so the threshold can change without touching price storage.
 */

export interface AlertInput {
  latestPrice: number
  /** Minimum before this run's update */
  previousMinimum: number | null
  previousNotifiedPrice: number | null
}

export type AlertDecision =
  | { alert: true; baseline: number }
  | { alert: false; reason: 'NO_BASELINE' | 'NOT_LOWER' }

export interface AlertPolicy {
  decide(input: AlertInput): AlertDecision
}

/**
 * Compare against the last price we emailed about, falling back to the
 * previous minimum. A first-ever price has nothing to beat.
 */
export const baselinePolicy: AlertPolicy = {
  decide({ latestPrice, previousMinimum, previousNotifiedPrice }) {
    const baseline = previousNotifiedPrice ?? previousMinimum
    if (baseline === null) {
      return { alert: false, reason: 'NO_BASELINE' }
    }
    if (latestPrice < baseline) {
      return { alert: true, baseline }
    }
    return { alert: false, reason: 'NOT_LOWER' }
  },
}
