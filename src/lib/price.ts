/**
 * Listing price policy: source price × markup, then up to the next price
 * ending in the rounding target (.99 by default).
 *
 *   19.00 × 1.075 = 20.425  → 20.99
 *   "€45,00"      = 45.00   → 48.375 → 48.99
 *   9.30 × 1.075  = 9.9975  → 10.99
 */

import type { Logger } from '../core/clock.js'

export type SourcePrice =
  | { kind: 'decimal'; value: number }
  | { kind: 'raw'; text: string }

export type PriceQuote =
  | { kind: 'adjusted'; value: number; source: number }
  | { kind: 'unadjusted'; original: string | number; warning: string }

export interface PricePolicy {
  markup: number
  roundingTarget: number
}

export const DEFAULT_PRICE_POLICY: PricePolicy = { markup: 1.075, roundingTarget: 0.99 }

/**
 * Parse a scraped price. Currency symbols, codes and spaces are dropped; a
 * lone comma followed by 1-2 digits is a decimal comma ("45,00"), and when
 * both separators appear the last one is the decimal point.
 */
export function parseSourcePrice(input: string | number): SourcePrice {
  if (typeof input === 'number') {
    return Number.isFinite(input) ? { kind: 'decimal', value: input } : { kind: 'raw', text: String(input) }
  }

  let cleaned = input.replace(/[^\d.,-]/g, '')
  const lastComma = cleaned.lastIndexOf(',')
  const lastDot = cleaned.lastIndexOf('.')

  if (lastComma >= 0 && lastDot >= 0) {
    cleaned = lastComma > lastDot
      ? cleaned.replace(/\./g, '').replace(',', '.')
      : cleaned.replace(/,/g, '')
  } else if (lastComma >= 0) {
    cleaned = /^-?\d*,\d{1,2}$/.test(cleaned) ? cleaned.replace(',', '.') : cleaned.replace(/,/g, '')
  }

  if (!/^-?(\d+\.?\d*|\.\d+)$/.test(cleaned)) return { kind: 'raw', text: input }
  const value = Number(cleaned)
  return Number.isFinite(value) ? { kind: 'decimal', value } : { kind: 'raw', text: input }
}

/** Round a positive amount up to the next value ending in the target fraction */
export function roundUpToTarget(amount: number, target: number): number {
  // Six-decimal snap keeps float noise (20.424999…) from deciding the branch.
  const snapped = Math.round(amount * 1e6) / 1e6
  const whole = Math.floor(snapped)
  const fraction = snapped - whole
  const base = fraction < target ? whole : Math.ceil(snapped)
  return Math.round((base + target) * 100) / 100
}

export function quotePrice(input: string | number, policy: PricePolicy = DEFAULT_PRICE_POLICY): PriceQuote {
  const source = parseSourcePrice(input)
  if (source.kind === 'raw') {
    return { kind: 'unadjusted', original: input, warning: `unparseable price "${source.text}"` }
  }
  if (source.value <= 0) {
    return { kind: 'unadjusted', original: input, warning: `non-positive price ${source.value}` }
  }
  return {
    kind: 'adjusted',
    value: roundUpToTarget(source.value * policy.markup, policy.roundingTarget),
    source: source.value,
  }
}

/** adjust(price): the listing price, or the input unchanged with a warning when it won't parse */
export function adjustPrice(
  input: string | number,
  policy: PricePolicy = DEFAULT_PRICE_POLICY,
  logger: Logger = console
): number | string {
  const quote = quotePrice(input, policy)
  if (quote.kind === 'adjusted') return quote.value
  logger.warn(`[price] ${quote.warning}, keeping original value`)
  return quote.original
}

/** Price string for an API payload (two decimals when adjusted) */
export function formatQuote(quote: PriceQuote): string {
  return quote.kind === 'adjusted' ? quote.value.toFixed(2) : String(quote.original).trim()
}
