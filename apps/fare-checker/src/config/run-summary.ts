/**
 * Price Refresh Run Summary
 *
 * One structured event per run, plus the mapping from run outcome to process
 * exit code. Scheduled and manual invocations read the same exit codes.
 */

import type { ILogger } from '@farewatch/logger'
import type { RunSummaryInfo } from '@farewatch/notifications'
import type { AlertRunSummary } from '../alerter'
import type { RunSummary } from '../refresher/types'
import { logger } from './logger'

export const EXIT_CODES = {
  SUCCESS: 0,
  FATAL: 1,
  PARTIAL: 2,
} as const

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES]

export function exitCodeFor(summary: RunSummary): ExitCode {
  return summary.failed === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.PARTIAL
}

/**
 * Count failures per code, for low-cardinality dashboards
 */
export function countFailureCodes(summary: RunSummary): Record<string, number> {
  const codes: Record<string, number> = {}
  for (const failure of summary.failures) {
    codes[failure.code] = (codes[failure.code] ?? 0) + 1
  }
  return codes
}

export function emitRunSummary(
  summary: RunSummary,
  alerts: AlertRunSummary | null,
  log: ILogger = logger.summary
): void {
  const payload = {
    event_name: 'PRICE_REFRESH_RUN_SUMMARY',
    runId: summary.runId,
    asOf: summary.asOf,
    status: summary.status,
    durationMs: summary.durationMs,
    total: summary.total,
    succeeded: summary.succeeded,
    failed: summary.failed,
    failureCodes: countFailureCodes(summary),
    failures: summary.failures,
    alerts,
  }

  if (summary.status === 'SUCCESS') {
    log.info('PRICE_REFRESH_RUN_SUMMARY', payload)
  } else {
    log.warn('PRICE_REFRESH_RUN_SUMMARY', payload)
  }
}

export function toRunSummaryInfo(summary: RunSummary, alerts: AlertRunSummary | null): RunSummaryInfo {
  return {
    runId: summary.runId,
    asOf: summary.asOf,
    total: summary.total,
    succeeded: summary.succeeded,
    failed: summary.failed,
    durationMs: summary.durationMs,
    failures: summary.failures,
    alertsSent: alerts ? alerts.sent : undefined,
  }
}
