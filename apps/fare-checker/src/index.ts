#!/usr/bin/env node
/**
 * Fare checker CLI
 *
 * Usage:
 *   npm run start --workspace apps/fare-checker -- run      # refresh prices, send alerts
 *   npm run start --workspace apps/fare-checker -- active   # list what a run would check
 *
 * Exit codes: 0 every subject refreshed, 2 some subjects failed, 1 the run
 * could not happen.
 */

import 'dotenv/config'
import { createPool, fromPool } from '@farewatch/db'
import { listActive, createServices, runPriceCheck } from './app'
import { loadConfig, type AppConfig } from './config/env'
import { logger } from './config/logger'
import { EXIT_CODES } from './config/run-summary'
import { errorMessage } from './errors'

const log = logger.cli

const USAGE = `Usage: fare-checker <command>

Commands:
  run      Refresh prices for every active tracked search
  active   List active tracked searches without querying prices`

async function main(): Promise<number> {
  const command = process.argv[2]
  if (command !== 'run' && command !== 'active') {
    console.log(USAGE)
    return command === undefined || command === 'help' || command === '--help'
      ? EXIT_CODES.SUCCESS
      : EXIT_CODES.FATAL
  }

  let config: AppConfig
  try {
    config = loadConfig(process.env)
  } catch (error) {
    log.fatal('CONFIG_INVALID', { event_name: 'CONFIG_INVALID', reason: errorMessage(error) })
    return EXIT_CODES.FATAL
  }

  const pool = createPool(config.databaseUrl)
  try {
    const services = createServices(config, fromPool(pool))
    if (command === 'active') {
      return await listActive(services.store, new Date(), (line) => console.log(line))
    }
    return await runPriceCheck(services)
  } finally {
    await pool.end()
  }
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    log.fatal('FARE_CHECKER_CRASHED', { event_name: 'FARE_CHECKER_CRASHED', reason: errorMessage(error) }, error)
    process.exitCode = EXIT_CODES.FATAL
  })
