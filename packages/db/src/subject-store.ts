/**
 * Subject Store
 *
 * Data access for tracked searches (search_requests) and their price records
 * (price_tracking). Every write is a single statement, so a record is always
 * either the old or the new snapshot.
 */

import type { Queryable } from './client'
import { RowConversionError } from './errors'
import { rejectSubjectRow, toPriceRecord, toTrackingSubject } from './rows'
import type { ActiveSubjects, PriceRecord, PriceRecordUpdate } from './types'

export interface SubjectStore {
  /**
   * Subjects whose departure date is on or after `asOf` (YYYY-MM-DD),
   * ordered by departure date, then id. Rows that cannot be converted are
   * returned in `rejected` instead of failing the listing.
   */
  listActiveSubjects(asOf: string): Promise<ActiveSubjects>
  getPriceRecord(subjectId: string): Promise<PriceRecord | null>
  upsertPriceRecord(subjectId: string, update: PriceRecordUpdate): Promise<PriceRecord>
  /** Returns false when the subject has no price record */
  markPriceNotified(subjectId: string, price: number): Promise<boolean>
}

const SUBJECT_COLUMNS = `
  id,
  user_id,
  depart_from,
  arrive_at,
  departure_date::text AS departure_date,
  return_date::text AS return_date,
  trip_type,
  preferred_airlines,
  stops,
  passengers`

const PRICE_COLUMNS = `
  search_request_id,
  minimum_price,
  last_checked,
  last_notified_price,
  latest_price,
  currency,
  airlines,
  flight_details,
  flight_link`

export const LIST_ACTIVE_SUBJECTS_SQL = `
SELECT ${SUBJECT_COLUMNS}
FROM search_requests
WHERE departure_date >= $1::date
ORDER BY departure_date ASC, id ASC`

export const GET_PRICE_RECORD_SQL = `
SELECT ${PRICE_COLUMNS}
FROM price_tracking
WHERE search_request_id = $1`

export const UPSERT_PRICE_RECORD_SQL = `
INSERT INTO price_tracking (
  search_request_id, minimum_price, last_checked, latest_price,
  currency, airlines, flight_details, flight_link
)
VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, $8)
ON CONFLICT (search_request_id) DO UPDATE SET
  minimum_price = EXCLUDED.minimum_price,
  last_checked = EXCLUDED.last_checked,
  latest_price = EXCLUDED.latest_price,
  currency = EXCLUDED.currency,
  airlines = EXCLUDED.airlines,
  flight_details = EXCLUDED.flight_details,
  flight_link = EXCLUDED.flight_link
RETURNING ${PRICE_COLUMNS}`

export const MARK_PRICE_NOTIFIED_SQL = `
UPDATE price_tracking
SET last_notified_price = $2
WHERE search_request_id = $1`

export class PgSubjectStore implements SubjectStore {
  constructor(private readonly db: Queryable) {}

  async listActiveSubjects(asOf: string): Promise<ActiveSubjects> {
    const { rows } = await this.db.query(LIST_ACTIVE_SUBJECTS_SQL, [asOf])

    const listed: ActiveSubjects = { subjects: [], rejected: [] }
    for (const row of rows) {
      try {
        listed.subjects.push(toTrackingSubject(row))
      } catch (error) {
        if (!(error instanceof RowConversionError)) throw error
        listed.rejected.push(rejectSubjectRow(row, error))
      }
    }
    return listed
  }

  async getPriceRecord(subjectId: string): Promise<PriceRecord | null> {
    const { rows } = await this.db.query(GET_PRICE_RECORD_SQL, [subjectId])
    return rows.length > 0 ? toPriceRecord(rows[0]) : null
  }

  async upsertPriceRecord(subjectId: string, update: PriceRecordUpdate): Promise<PriceRecord> {
    const { latest } = update
    const { rows } = await this.db.query(UPSERT_PRICE_RECORD_SQL, [
      subjectId,
      update.minimumPrice,
      update.lastCheckedAt,
      latest.price,
      latest.currency,
      latest.carriers,
      JSON.stringify(latest.details),
      latest.link,
    ])

    if (rows.length === 0) {
      throw new Error(`Upsert of price record ${subjectId} returned no row`)
    }
    return toPriceRecord(rows[0])
  }

  async markPriceNotified(subjectId: string, price: number): Promise<boolean> {
    const { rowCount } = await this.db.query(MARK_PRICE_NOTIFIED_SQL, [subjectId, price])
    return (rowCount ?? 0) > 0
  }
}
