/**
 * Wiring and the two CLI commands.
 *
 * Everything here takes its collaborators as arguments so the command flow can
 * be exercised without a database or network.
 */

import {
  PgSubjectStore,
  PgUserStore,
  SystemSettings,
  type Queryable,
  type SubjectStore,
} from '@farewatch/db'
import type { ILogger } from '@farewatch/logger'
import {
  createEmailChannel,
  notifyRefreshRunCompleted,
  sendPriceDropEmail,
  type RunSummaryInfo,
  type SlackResult,
} from '@farewatch/notifications'
import { PriceDropAlerter, type AlertRunSummary } from './alerter'
import type { AppConfig } from './config/env'
import { logger } from './config/logger'
import { EXIT_CODES, emitRunSummary, exitCodeFor, toRunSummaryInfo, type ExitCode } from './config/run-summary'
import { errorMessage } from './errors'
import { SerpApiPriceSource } from './price-source/serpapi'
import { PriceRefresher, toRunDate, type RunSummary } from './refresher'

export type RuntimeSettings = Pick<SystemSettings, 'isPriceRefreshEnabled' | 'isPriceAlertsEnabled'>

export interface PriceCheckDeps {
  refresher: Pick<PriceRefresher, 'run'>
  alerter: Pick<PriceDropAlerter, 'processUpdates'>
  settings: RuntimeSettings
  slackWebhookUrl?: string
  notifySlack?: (info: RunSummaryInfo, webhookUrl: string | undefined) => Promise<SlackResult>
  log?: ILogger
}

export interface Services extends PriceCheckDeps {
  store: SubjectStore
}

export function createServices(config: AppConfig, db: Queryable): Services {
  const store = new PgSubjectStore(db)
  const settings = new SystemSettings(db, {
    onFallback: (key, error) =>
      logger.settings.warn('SYSTEM_SETTING_FALLBACK', { event_name: 'SYSTEM_SETTING_FALLBACK', key }, error),
  })
  const email = createEmailChannel({
    apiKey: config.email.apiKey,
    fromAddress: config.email.fromAddress,
    appUrl: config.email.appUrl,
  })

  return {
    store,
    settings,
    refresher: new PriceRefresher({
      store,
      priceSource: new SerpApiPriceSource(config.serpApi),
    }),
    alerter: new PriceDropAlerter({
      store,
      users: new PgUserStore(db),
      sender: { send: (to, info) => sendPriceDropEmail(email, to, info) },
      dryRun: config.alerts.dryRun,
    }),
    slackWebhookUrl: config.slackWebhookUrl,
  }
}

/**
 * `run`: refresh prices, send alerts, report. Returns the process exit code.
 */
export async function runPriceCheck(deps: PriceCheckDeps): Promise<ExitCode> {
  const log = deps.log ?? logger.cli
  const notifySlack = deps.notifySlack ?? notifyRefreshRunCompleted

  if (!(await deps.settings.isPriceRefreshEnabled())) {
    log.warn('PRICE_REFRESH_DISABLED', { event_name: 'PRICE_REFRESH_DISABLED' })
    return EXIT_CODES.SUCCESS
  }

  let summary: RunSummary
  try {
    summary = await deps.refresher.run()
  } catch (error) {
    log.fatal('PRICE_REFRESH_FATAL', { event_name: 'PRICE_REFRESH_FATAL', reason: errorMessage(error) }, error)
    return EXIT_CODES.FATAL
  }

  let alerts: AlertRunSummary | null = null
  if (summary.updates.length > 0) {
    if (await deps.settings.isPriceAlertsEnabled()) {
      alerts = await deps.alerter.processUpdates(summary.updates)
    } else {
      log.info('PRICE_ALERTS_DISABLED', { event_name: 'PRICE_ALERTS_DISABLED' })
    }
  }

  emitRunSummary(summary, alerts)

  const slack = await notifySlack(toRunSummaryInfo(summary, alerts), deps.slackWebhookUrl)
  if (!slack.success) {
    log.warn('RUN_SUMMARY_SLACK_FAILED', { event_name: 'RUN_SUMMARY_SLACK_FAILED', reason: slack.error })
  }

  return exitCodeFor(summary)
}

/**
 * `active`: print the subjects a run would check today.
 */
export async function listActive(
  store: Pick<SubjectStore, 'listActiveSubjects'>,
  now: Date,
  write: (line: string) => void
): Promise<ExitCode> {
  const asOf = toRunDate(now)
  const { subjects, rejected } = await store.listActiveSubjects(asOf)

  for (const subject of subjects) {
    const dates = subject.returnDate ? `${subject.departureDate}..${subject.returnDate}` : subject.departureDate
    const carriers = subject.preferredCarriers.length > 0 ? subject.preferredCarriers.join(',') : 'any'
    write(
      `${subject.id}\t${subject.origin}-${subject.destination}\t${dates}\t${subject.tripType}\tstops=${subject.stops}\tcarriers=${carriers}`
    )
  }
  for (const row of rejected) {
    write(`${row.id}\tUNREADABLE\t${row.reason}`)
  }
  const unreadable = rejected.length > 0 ? `, ${rejected.length} unreadable` : ''
  write(`${subjects.length} active subject(s) as of ${asOf}${unreadable}`)
  return EXIT_CODES.SUCCESS
}
