/**
 * Public storefront feed adapter.
 *
 * Paginates <storeUrl>/collections/all/products.json?page=N until an empty
 * page. No auth; calls share the storefront's own rate limiter through the
 * executor. Returns raw StorefrontProduct[] for the mapper.
 */

import { z } from 'zod'
import type { Logger } from '../core/clock.js'
import type { RequestExecutor } from '../core/fetch-with-retry.js'
import type { BrandSource } from '../schema/catalog-product.js'

const StorefrontVariantSchema = z.object({
  title: z.string().optional(),
  price: z.union([z.string(), z.number()]).optional(),
  compare_at_price: z.union([z.string(), z.number()]).nullish(),
  sku: z.string().nullish(),
  available: z.boolean().optional(),
  taxable: z.boolean().optional(),
  grams: z.number().optional(),
  barcode: z.string().nullish(),
})

const StorefrontProductSchema = z.object({
  title: z.string().optional(),
  body_html: z.string().nullish(),
  vendor: z.string().nullish(),
  product_type: z.string().nullish(),
  tags: z.union([z.array(z.string()), z.string()]).optional(),
  handle: z.string().optional(),
  created_at: z.string().nullish(),
  updated_at: z.string().nullish(),
  published_at: z.string().nullish(),
  images: z.array(z.object({ src: z.string() })).default([]),
  variants: z.array(StorefrontVariantSchema).default([]),
})

const StorefrontPageSchema = z.object({
  products: z.array(StorefrontProductSchema).default([]),
})

export type StorefrontVariant = z.infer<typeof StorefrontVariantSchema>
export type StorefrontProduct = z.infer<typeof StorefrontProductSchema>

export interface ScrapeOptions {
  /** Hard stop for stores that never return an empty page */
  maxPages?: number
  logger?: Logger
}

export interface ScrapeOutcome {
  products: StorefrontProduct[]
  pages: number
  error: string | null
}

export async function scrape(
  executor: RequestExecutor,
  brand: BrandSource,
  options: ScrapeOptions = {}
): Promise<ScrapeOutcome> {
  const logger = options.logger ?? console
  const maxPages = options.maxPages ?? 200
  const products: StorefrontProduct[] = []
  let page = 1

  while (page <= maxPages) {
    const url = `${brand.storeUrl}/collections/all/products.json?page=${page}`
    const result = await executor.execute('GET', url)

    if (!result.ok) {
      logger.error(`[${brand.name}] Page ${page} failed: ${result.error.detail}`)
      return { products, pages: page - 1, error: result.error.message }
    }

    const parsed = StorefrontPageSchema.safeParse(result.response.body)
    if (!parsed.success) {
      logger.error(`[${brand.name}] Page ${page} is not a products.json payload`)
      return { products, pages: page - 1, error: `unexpected payload on page ${page}` }
    }
    if (parsed.data.products.length === 0) break

    products.push(...parsed.data.products)
    page++
  }

  logger.log(`[${brand.name}] Fetched ${products.length} products across ${page - 1} pages`)
  return { products, pages: page - 1, error: null }
}
