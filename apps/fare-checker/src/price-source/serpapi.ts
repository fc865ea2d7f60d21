/**
 * SerpApi Google Flights price source
 *
 * One GET per query. Transport and HTTP failures are mapped to result codes
 * here so the refresher only ever sees a PriceQueryResult.
 */

import axios, { AxiosError, isAxiosError, type AxiosRequestConfig } from 'axios'
import type { ILogger } from '@farewatch/logger'
import { logger } from '../config/logger'
import { normalizeCarriers } from './airlines'
import { parseSearchResponse } from './parser'
import type { PriceQuery, PriceQueryResult, PriceSource } from './types'

const ERROR_EXCERPT_LENGTH = 200

export interface SerpApiConfig {
  apiKey: string
  baseUrl: string
  timeoutMs: number
  currency: string
}

/**
 * The slice of axios the source uses
 */
export interface HttpGetter {
  get(url: string, config: AxiosRequestConfig): Promise<{ status: number; data: unknown }>
}

export type SearchParams = Record<string, string | number>

export interface BuiltSearchParams {
  params: SearchParams
  /** Carrier values dropped from include_airlines */
  invalidCarriers: string[]
}

export function buildSearchParams(query: PriceQuery, config: SerpApiConfig): BuiltSearchParams {
  const params: SearchParams = {
    engine: 'google_flights',
    api_key: config.apiKey,
    departure_id: query.origin,
    arrival_id: query.destination,
    outbound_date: query.departureDate,
    adults: query.passengers,
    currency: config.currency,
  }

  switch (query.trip.type) {
    case 'ROUND_TRIP':
      params.type = 1
      params.return_date = query.trip.returnDate
      break
    case 'ONE_WAY':
      params.type = 2
      break
  }

  const { codes, invalid } = normalizeCarriers(query.carriers)
  if (codes.length > 0) {
    params.include_airlines = codes.join(',')
  }

  if (query.stops !== undefined) {
    params.stops = query.stops
  }

  return { params, invalidCarriers: invalid }
}

function clip(text: string): string | null {
  const trimmed = text.trim()
  return trimmed ? trimmed.slice(0, ERROR_EXCERPT_LENGTH) : null
}

function excerpt(data: unknown): string | null {
  if (data && typeof data === 'object') {
    for (const key of ['error', 'message']) {
      const value: unknown = Reflect.get(data, key)
      const text = typeof value === 'string' ? clip(value) : null
      if (text) return text
    }
    return null
  }
  return typeof data === 'string' ? clip(data) : null
}

/**
 * Map a failed request to a result. Anything that is not an axios error is a
 * transport problem from our side of the wire.
 */
export function classifyRequestError(error: unknown): PriceQueryResult {
  if (!isAxiosError(error)) {
    return {
      status: 'ERROR',
      code: 'NETWORK',
      message: error instanceof Error ? error.message : String(error),
    }
  }

  if (error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT) {
    return { status: 'ERROR', code: 'TIMEOUT', message: error.message || 'Request timed out' }
  }

  const response = error.response
  if (!response) {
    return { status: 'ERROR', code: 'NETWORK', message: error.message || 'Request failed' }
  }

  const httpStatus = response.status
  const message = excerpt(response.data) ?? `HTTP ${httpStatus}`

  if (httpStatus === 401 || httpStatus === 403) {
    return { status: 'ERROR', code: 'AUTH', message, httpStatus }
  }
  if (httpStatus === 429) {
    return { status: 'ERROR', code: 'QUOTA', message, httpStatus }
  }
  return { status: 'ERROR', code: 'UPSTREAM_ERROR', message, httpStatus }
}

export function createHttpGetter(): HttpGetter {
  const client = axios.create({
    headers: { Accept: 'application/json' },
  })
  return {
    get: (url, config) => client.get<unknown>(url, config),
  }
}

export class SerpApiPriceSource implements PriceSource {
  constructor(
    private readonly config: SerpApiConfig,
    private readonly http: HttpGetter = createHttpGetter(),
    private readonly log: ILogger = logger.priceSource
  ) {}

  async search(query: PriceQuery): Promise<PriceQueryResult> {
    const { params, invalidCarriers } = buildSearchParams(query, this.config)
    const route = `${query.origin}-${query.destination}`

    if (invalidCarriers.length > 0) {
      this.log.warn('SERPAPI_CARRIERS_DROPPED', {
        event_name: 'SERPAPI_CARRIERS_DROPPED',
        route,
        invalidCarriers,
      })
    }

    const started = Date.now()
    let result: PriceQueryResult
    try {
      const response = await this.http.get(this.config.baseUrl, {
        params,
        timeout: this.config.timeoutMs,
      })
      result = parseSearchResponse(response.data, this.config.currency)
    } catch (error) {
      result = classifyRequestError(error)
    }

    this.log.debug('SERPAPI_SEARCH_DONE', {
      event_name: 'SERPAPI_SEARCH_DONE',
      route,
      departureDate: query.departureDate,
      status: result.status,
      code: result.status === 'ERROR' ? result.code : undefined,
      durationMs: Date.now() - started,
    })

    return result
  }
}
