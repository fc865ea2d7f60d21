/**
 * Batch Price Refresher
 *
 * Checks every active tracked search once, sequentially, and records the
 * cheapest offer found. A subject that fails, or a row that cannot be read as a
 * subject, is recorded in the summary and the run moves on. Only failing to
 * list subjects ends the run.
 */

import { randomUUID } from 'crypto'
import type { ActiveSubjects, PriceRecord, RejectedSubject, SubjectStore, TrackingSubject } from '@farewatch/db'
import { withRunContext, type ILogger } from '@farewatch/logger'
import { logger } from '../config/logger'
import { InvalidSubjectError, RefreshRunError, errorMessage } from '../errors'
import type { PriceQueryResult, PriceSource } from '../price-source/types'
import { buildPriceQuery, describeRoute } from './query'
import { applyOffer } from './record'
import type { FailureCode, PriceUpdate, RunSummary, SubjectFailure } from './types'

export { RefreshRunError } from '../errors'
export { applyOffer } from './record'
export { buildPriceQuery, describeRoute } from './query'
export type {
  FailureCode,
  PriceUpdate,
  RunStatus,
  RunSummary,
  SubjectFailure,
} from './types'

export interface RefresherDeps {
  store: SubjectStore
  priceSource: PriceSource
  now?: () => Date
  log?: ILogger
  newRunId?: () => string
}

type SubjectOutcome = { ok: true; update: PriceUpdate } | { ok: false; failure: SubjectFailure }

/** UTC calendar date of an instant */
export function toRunDate(instant: Date): string {
  return instant.toISOString().slice(0, 10)
}

export class PriceRefresher {
  private readonly store: SubjectStore
  private readonly priceSource: PriceSource
  private readonly now: () => Date
  private readonly log: ILogger
  private readonly newRunId: () => string

  constructor(deps: RefresherDeps) {
    this.store = deps.store
    this.priceSource = deps.priceSource
    this.now = deps.now ?? (() => new Date())
    this.log = deps.log ?? logger.refresher
    this.newRunId = deps.newRunId ?? randomUUID
  }

  async run(): Promise<RunSummary> {
    const runId = this.newRunId()
    return withRunContext({ runId }, () => this.execute(runId))
  }

  private async execute(runId: string): Promise<RunSummary> {
    const startedAt = this.now()
    const asOf = toRunDate(startedAt)

    let listed: ActiveSubjects
    try {
      listed = await this.store.listActiveSubjects(asOf)
    } catch (error) {
      this.log.error('PRICE_REFRESH_LISTING_FAILED', { event_name: 'PRICE_REFRESH_LISTING_FAILED', asOf }, error)
      throw new RefreshRunError('LISTING_FAILED', `Could not list active subjects: ${errorMessage(error)}`, {
        cause: error,
      })
    }

    const { subjects, rejected } = listed
    this.log.info('PRICE_REFRESH_START', {
      event_name: 'PRICE_REFRESH_START',
      asOf,
      subjects: subjects.length,
      rejected: rejected.length,
    })

    const failures: SubjectFailure[] = rejected.map((row) => this.rejectRow(row))
    const updates: PriceUpdate[] = []

    for (const subject of subjects) {
      const outcome = await this.refreshSubject(subject, startedAt)
      if (outcome.ok) {
        updates.push(outcome.update)
      } else {
        failures.push(outcome.failure)
      }
    }

    const finishedAt = this.now()
    return {
      runId,
      asOf,
      startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      status: failures.length === 0 ? 'SUCCESS' : 'PARTIAL',
      total: subjects.length + rejected.length,
      succeeded: updates.length,
      failed: failures.length,
      failures,
      updates,
    }
  }

  private rejectRow(row: RejectedSubject): SubjectFailure {
    this.log.warn('PRICE_REFRESH_SUBJECT_FAILED', {
      event_name: 'PRICE_REFRESH_SUBJECT_FAILED',
      subjectId: row.id,
      route: row.route,
      code: 'INVALID_SUBJECT',
      reason: row.reason,
    })
    return { subjectId: row.id, route: row.route, code: 'INVALID_SUBJECT', message: row.reason }
  }

  /**
   * Never throws. Every error is turned into a failure for this subject.
   */
  private async refreshSubject(subject: TrackingSubject, checkedAt: Date): Promise<SubjectOutcome> {
    const route = describeRoute(subject)
    const fail = (code: FailureCode, message: string, error?: unknown): SubjectOutcome => {
      this.log.warn(
        'PRICE_REFRESH_SUBJECT_FAILED',
        { event_name: 'PRICE_REFRESH_SUBJECT_FAILED', subjectId: subject.id, route, code, reason: message },
        error
      )
      return { ok: false, failure: { subjectId: subject.id, route, code, message: message || code } }
    }

    let result: PriceQueryResult
    try {
      result = await this.priceSource.search(buildPriceQuery(subject))
    } catch (error) {
      if (error instanceof InvalidSubjectError) {
        return fail('INVALID_SUBJECT', error.message)
      }
      return fail('UNEXPECTED', errorMessage(error), error)
    }

    switch (result.status) {
      case 'NO_RESULTS':
        return fail('NO_RESULTS', result.message)
      case 'ERROR':
        return fail(result.code, result.message)
      case 'OK':
        break
    }

    let previous: PriceRecord | null
    let record: PriceRecord
    try {
      previous = await this.store.getPriceRecord(subject.id)
      record = await this.store.upsertPriceRecord(subject.id, applyOffer(previous, result.offer, checkedAt))
    } catch (error) {
      return fail('PERSISTENCE', errorMessage(error), error)
    }

    const previousMinimum = previous?.minimumPrice ?? null
    const minimumLowered = previousMinimum === null || result.offer.price < previousMinimum

    this.log.info('PRICE_REFRESH_SUBJECT_UPDATED', {
      event_name: 'PRICE_REFRESH_SUBJECT_UPDATED',
      subjectId: subject.id,
      route,
      price: result.offer.price,
      currency: result.offer.currency,
      minimumPrice: record.minimumPrice,
      minimumLowered,
    })

    return {
      ok: true,
      update: {
        subject,
        previousMinimum,
        previousNotifiedPrice: previous?.lastNotifiedPrice ?? null,
        record,
        minimumLowered,
      },
    }
  }
}
