/**
 * Environment configuration
 *
 * Read once at startup. Nothing below the CLI touches process.env.
 */

import { z } from 'zod'
import { ConfigError } from '../errors'

const TRUTHY = new Set(['1', 'true', 'yes'])

const envSchema = z.object({
  DATABASE_URL: z.string().min(1, 'is required'),
  SERPAPI_KEY: z.string().min(1, 'is required'),
  SERPAPI_BASE_URL: z.string().url().default('https://serpapi.com/search'),
  SERPAPI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  PRICE_CURRENCY: z
    .string()
    .transform((value) => value.toUpperCase())
    .pipe(z.string().regex(/^[A-Z]{3}$/, 'must be a 3-letter currency code'))
    .default('USD'),
  RESEND_API_KEY: z.string().optional(),
  FROM_EMAIL: z.string().email().default('alerts@farewatch.app'),
  PRICE_ALERT_DRY_RUN: z
    .string()
    .optional()
    .transform((value) => TRUTHY.has((value ?? '').toLowerCase())),
  SLACK_OPS_WEBHOOK_URL: z.string().url().optional(),
  APP_URL: z.string().url().default('http://localhost:3000'),
})

export interface AppConfig {
  databaseUrl: string
  serpApi: {
    apiKey: string
    baseUrl: string
    timeoutMs: number
    currency: string
  }
  email: {
    apiKey?: string
    fromAddress: string
    appUrl: string
  }
  alerts: {
    dryRun: boolean
  }
  slackWebhookUrl?: string
}

/**
 * Blank variables count as unset.
 */
function presentValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    const trimmed = value?.trim()
    if (trimmed) values[key] = trimmed
  }
  return values
}

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(presentValues(env))
  if (!parsed.success) {
    // Key names only, values may be secrets
    const issues = parsed.error.issues.map((issue) => {
      const key = issue.path.join('.')
      return issue.code === 'invalid_type' && issue.received === 'undefined'
        ? `${key} is required`
        : `${key} ${issue.message}`
    })
    throw new ConfigError(issues)
  }

  const vars = parsed.data
  return {
    databaseUrl: vars.DATABASE_URL,
    serpApi: {
      apiKey: vars.SERPAPI_KEY,
      baseUrl: vars.SERPAPI_BASE_URL,
      timeoutMs: vars.SERPAPI_TIMEOUT_MS,
      currency: vars.PRICE_CURRENCY,
    },
    email: {
      apiKey: vars.RESEND_API_KEY,
      fromAddress: vars.FROM_EMAIL,
      appUrl: vars.APP_URL.replace(/\/+$/, ''),
    },
    alerts: {
      dryRun: vars.PRICE_ALERT_DRY_RUN,
    },
    slackWebhookUrl: vars.SLACK_OPS_WEBHOOK_URL,
  }
}
