/**
 * Fare Checker Logger Configuration
 *
 * Pre-configured loggers for fare-checker components
 */

import { createLogger } from '@farewatch/logger'

// Root logger for the fare-checker service
const rootLogger = createLogger('fare-checker')

export const logger = {
  cli: rootLogger.child('cli'),
  refresher: rootLogger.child('refresher'),
  priceSource: rootLogger.child('price-source'),
  alerter: rootLogger.child('alerter'),
  summary: rootLogger.child('summary'),
  settings: rootLogger.child('settings'),
}

export { rootLogger }
