/**
 * Product payload builder: LocalProduct → admin API create/update body.
 */

import type { Logger } from '../core/clock.js'
import type { LocalProduct, LocalVariant } from '../schema/catalog-product.js'
import type { ProductPayload, VariantPayload } from '../types/shopify.js'
import { formatQuote, quotePrice, type PricePolicy } from './price.js'

export interface PayloadOptions extends PricePolicy {
  inStockQuantity: number
}

/** ISO-8601 timestamps only; anything Date.parse rejects is dropped */
export function isIsoTimestamp(value: string | undefined): value is string {
  if (!value || !/^\d{4}-\d{2}-\d{2}/.test(value)) return false
  return !Number.isNaN(Date.parse(value))
}

/** Image URLs across all variants, first-seen order, no duplicates */
export function collectImages(product: LocalProduct): string[] {
  const seen = new Set<string>()
  for (const variant of product.variants) {
    for (const src of variant.images) {
      if (src) seen.add(src)
    }
  }
  return [...seen]
}

function listingPrice(raw: string | number, policy: PricePolicy, logger: Logger, context: string): string {
  const quote = quotePrice(raw, policy)
  if (quote.kind === 'unadjusted') {
    logger.warn(`[price] ${context}: ${quote.warning}, keeping original value`)
  }
  return formatQuote(quote)
}

function buildVariant(variant: LocalVariant, options: PayloadOptions, logger: Logger): VariantPayload {
  const payload: VariantPayload = {
    option1: variant.variant_title || 'Default',
    price: listingPrice(variant.price, options, logger, `sku ${variant.sku}`),
    sku: variant.sku,
    inventory_quantity: variant.available ? options.inStockQuantity : 0,
    inventory_management: 'shopify',
    inventory_policy: 'deny',
  }

  if (variant.compare_at_price != null && variant.compare_at_price !== '') {
    payload.compare_at_price = listingPrice(variant.compare_at_price, options, logger, `sku ${variant.sku} compare-at`)
  }
  if (variant.barcode != null) payload.barcode = variant.barcode
  if (variant.weight != null) payload.weight = variant.weight
  if (variant.weight_unit != null) payload.weight_unit = variant.weight_unit
  if (variant.taxable != null) payload.taxable = variant.taxable

  return payload
}

export function buildProductPayload(
  product: LocalProduct,
  options: PayloadOptions,
  logger: Logger = console
): ProductPayload {
  const body: ProductPayload['product'] = {
    title: product.title,
    body_html: product.body_html ?? '',
    options: [{ name: 'Size' }],
    variants: product.variants.map(v => buildVariant(v, options, logger)),
    images: collectImages(product).map(src => ({ src })),
  }

  if (product.vendor) body.vendor = product.vendor
  if (product.product_type) body.product_type = product.product_type
  if (product.tags?.length) body.tags = product.tags.join(', ')
  if (product.handle) body.handle = product.handle

  for (const field of ['created_at', 'updated_at', 'published_at'] as const) {
    const value = product[field]
    if (isIsoTimestamp(value)) {
      body[field] = value
    } else if (value) {
      logger.warn(`[payload] "${product.title}": invalid ${field} "${value}", dropped`)
    }
  }

  return { product: body }
}
