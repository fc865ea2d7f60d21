/**
 * Carrier normalisation for the include_airlines filter.
 *
 * Users save airline display names ("Delta"), IATA codes ("dl") or alliance
 * keywords. The search API only takes codes and alliances.
 */

import airlineNames from './airlines.json'

const NAME_TO_CODE: Readonly<Record<string, string>> = airlineNames

const NAME_TO_CODE_LOWER = new Map(
  Object.entries(NAME_TO_CODE).map(([name, code]) => [name.toLowerCase(), code])
)

export const ALLIANCES = ['STAR_ALLIANCE', 'SKYTEAM', 'ONEWORLD'] as const

const ALLIANCE_SET: ReadonlySet<string> = new Set(ALLIANCES)

const IATA_CODE = /^(?:[A-Z]{2}|[A-Z][0-9]|[0-9][A-Z])$/

export interface NormalizedCarriers {
  codes: string[]
  /** Input values that could not be turned into a code, as given */
  invalid: string[]
}

export function isCarrierCode(value: string): boolean {
  return IATA_CODE.test(value) || ALLIANCE_SET.has(value)
}

export function normalizeCarrier(value: string): string | null {
  const trimmed = value.trim()
  if (!trimmed) return null

  const mapped = NAME_TO_CODE_LOWER.get(trimmed.toLowerCase()) ?? trimmed
  const code = mapped.toUpperCase()
  return isCarrierCode(code) ? code : null
}

export function normalizeCarriers(values: readonly string[]): NormalizedCarriers {
  const codes: string[] = []
  const invalid: string[] = []

  for (const value of values) {
    const code = normalizeCarrier(value)
    if (code === null) {
      invalid.push(value)
    } else if (!codes.includes(code)) {
      codes.push(code)
    }
  }

  return { codes, invalid }
}
