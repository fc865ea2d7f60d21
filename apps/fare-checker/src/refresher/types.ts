import type { PriceRecord, TrackingSubject } from '@farewatch/db'
import type { PriceSourceErrorCode } from '../price-source/types'

export type FailureCode =
  | 'INVALID_SUBJECT'
  | 'NO_RESULTS'
  | PriceSourceErrorCode
  | 'PERSISTENCE'
  | 'UNEXPECTED'

export interface SubjectFailure {
  subjectId: string
  /** ORIGIN-DESTINATION departureDate */
  route: string
  code: FailureCode
  message: string
}

/** A successful check, with the values the record had before it */
export interface PriceUpdate {
  subject: TrackingSubject
  previousMinimum: number | null
  previousNotifiedPrice: number | null
  record: PriceRecord
  minimumLowered: boolean
}

export type RunStatus = 'SUCCESS' | 'PARTIAL'

export interface RunSummary {
  runId: string
  /** Run date, YYYY-MM-DD (UTC) */
  asOf: string
  startedAt: Date
  finishedAt: Date
  durationMs: number
  status: RunStatus
  total: number
  succeeded: number
  failed: number
  failures: SubjectFailure[]
  updates: PriceUpdate[]
}
