/**
 * Price-drop Alerter
 *
 * Runs after a refresh over the subjects that were updated. Emails the owner
 * when the policy says so, then records the notified price. One failed alert
 * never stops the others.
 */

import type { SubjectStore, UserStore } from '@farewatch/db'
import type { ILogger } from '@farewatch/logger'
import type { PriceDropInfo } from '@farewatch/notifications'
import { logger } from '../config/logger'
import { errorMessage } from '../errors'
import type { PriceUpdate } from '../refresher/types'
import { baselinePolicy, type AlertPolicy } from './policy'

export { baselinePolicy } from './policy'
export type { AlertDecision, AlertInput, AlertPolicy } from './policy'

export interface DeliveryResult {
  success: boolean
  error?: string
}

export interface PriceDropSender {
  send(to: string, info: PriceDropInfo): Promise<DeliveryResult>
}

export interface AlerterDeps {
  store: Pick<SubjectStore, 'markPriceNotified'>
  users: UserStore
  sender: PriceDropSender
  policy?: AlertPolicy
  /** Log what would be sent and leave records alone */
  dryRun?: boolean
  log?: ILogger
}

export interface AlertRunSummary {
  evaluated: number
  sent: number
  skipped: number
  /** Alerts that would have been sent in dry-run mode */
  dryRun: number
  failed: number
}

type AlertOutcome = 'SENT' | 'SKIPPED' | 'DRY_RUN' | 'FAILED'

export class PriceDropAlerter {
  private readonly policy: AlertPolicy
  private readonly log: ILogger

  constructor(private readonly deps: AlerterDeps) {
    this.policy = deps.policy ?? baselinePolicy
    this.log = deps.log ?? logger.alerter
  }

  async processUpdates(updates: readonly PriceUpdate[]): Promise<AlertRunSummary> {
    const summary: AlertRunSummary = { evaluated: 0, sent: 0, skipped: 0, dryRun: 0, failed: 0 }

    for (const update of updates) {
      summary.evaluated++
      const outcome = await this.processUpdate(update)
      switch (outcome) {
        case 'SENT':
          summary.sent++
          break
        case 'SKIPPED':
          summary.skipped++
          break
        case 'DRY_RUN':
          summary.dryRun++
          break
        case 'FAILED':
          summary.failed++
          break
      }
    }

    this.log.info('PRICE_ALERTS_DONE', { event_name: 'PRICE_ALERTS_DONE', ...summary })
    return summary
  }

  private async processUpdate(update: PriceUpdate): Promise<AlertOutcome> {
    const { subject, record } = update
    const latest = record.latest
    if (latest === null) return 'SKIPPED'

    const decision = this.policy.decide({
      latestPrice: latest.price,
      previousMinimum: update.previousMinimum,
      previousNotifiedPrice: update.previousNotifiedPrice,
    })
    if (!decision.alert) {
      this.log.debug('PRICE_ALERT_NOT_TRIGGERED', { subjectId: subject.id, reason: decision.reason })
      return 'SKIPPED'
    }

    const context = {
      subjectId: subject.id,
      userId: subject.userId,
      price: latest.price,
      baseline: decision.baseline,
    }

    try {
      const user = await this.deps.users.getUserById(subject.userId)
      if (!user?.email) {
        this.log.warn('PRICE_ALERT_NO_EMAIL', { event_name: 'PRICE_ALERT_NO_EMAIL', ...context })
        return 'SKIPPED'
      }

      if (this.deps.dryRun) {
        this.log.info('PRICE_ALERT_DRY_RUN', { event_name: 'PRICE_ALERT_DRY_RUN', ...context })
        return 'DRY_RUN'
      }

      const delivery = await this.deps.sender.send(user.email, {
        origin: subject.origin,
        destination: subject.destination,
        departureDate: subject.departureDate,
        returnDate: subject.returnDate,
        latestPrice: latest.price,
        previousPrice: decision.baseline,
        currency: latest.currency,
        link: latest.link,
      })
      if (!delivery.success) {
        this.log.warn('PRICE_ALERT_DELIVERY_FAILED', {
          event_name: 'PRICE_ALERT_DELIVERY_FAILED',
          ...context,
          reason: delivery.error,
        })
        return 'FAILED'
      }

      const marked = await this.deps.store.markPriceNotified(subject.id, latest.price)
      if (!marked) {
        this.log.warn('PRICE_ALERT_MARK_MISSING', { event_name: 'PRICE_ALERT_MARK_MISSING', ...context })
      }

      this.log.info('PRICE_ALERT_SENT', { event_name: 'PRICE_ALERT_SENT', ...context })
      return 'SENT'
    } catch (error) {
      this.log.error(
        'PRICE_ALERT_FAILED',
        { event_name: 'PRICE_ALERT_FAILED', ...context, reason: errorMessage(error) },
        error
      )
      return 'FAILED'
    }
  }
}
