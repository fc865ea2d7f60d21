/**
 * System Settings for runtime switches
 *
 * Values live in the system_settings table and can be overridden by an env var
 * of the same name. Reads are cached for a minute.
 */

import type { Queryable } from './client'

export const SETTING_KEYS = {
  PRICE_REFRESH_ENABLED: 'PRICE_REFRESH_ENABLED',
  PRICE_ALERTS_ENABLED: 'PRICE_ALERTS_ENABLED',
} as const

export type SettingKey = (typeof SETTING_KEYS)[keyof typeof SETTING_KEYS]

const DEFAULTS: Record<SettingKey, boolean> = {
  [SETTING_KEYS.PRICE_REFRESH_ENABLED]: true,
  [SETTING_KEYS.PRICE_ALERTS_ENABLED]: true,
}

const CACHE_TTL_MS = 60_000

interface CachedSetting {
  value: boolean
  timestamp: number
}

export interface SettingsOptions {
  env?: NodeJS.ProcessEnv
  now?: () => number
  /** Called when the table cannot be read and the default is used */
  onFallback?: (key: SettingKey, error: unknown) => void
}

export class SystemSettings {
  private readonly cache = new Map<SettingKey, CachedSetting>()
  private readonly env: NodeJS.ProcessEnv
  private readonly now: () => number

  constructor(
    private readonly db: Queryable,
    private readonly options: SettingsOptions = {}
  ) {
    this.env = options.env ?? process.env
    this.now = options.now ?? Date.now
  }

  /**
   * Boolean setting with env override ('true' / 'false')
   */
  async getBoolean(key: SettingKey): Promise<boolean> {
    const envValue = this.env[key]
    if (envValue === 'true') return true
    if (envValue === 'false') return false

    const cached = this.cache.get(key)
    if (cached && this.now() - cached.timestamp < CACHE_TTL_MS) {
      return cached.value
    }

    try {
      const { rows } = await this.db.query('SELECT value FROM system_settings WHERE key = $1', [key])
      const stored = rows[0]?.value
      const value = typeof stored === 'boolean' ? stored : DEFAULTS[key]
      this.cache.set(key, { value, timestamp: this.now() })
      return value
    } catch (error) {
      // Not cached, so the next read retries the table
      this.options.onFallback?.(key, error)
      return DEFAULTS[key]
    }
  }

  isPriceRefreshEnabled(): Promise<boolean> {
    return this.getBoolean(SETTING_KEYS.PRICE_REFRESH_ENABLED)
  }

  isPriceAlertsEnabled(): Promise<boolean> {
    return this.getBoolean(SETTING_KEYS.PRICE_ALERTS_ENABLED)
  }
}
