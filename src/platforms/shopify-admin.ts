/**
 * Shopify admin REST adapter.
 *
 * Every call goes through the shared RequestExecutor (rate limiter + retry).
 * Listing pagination follows the Link header: products.json?limit=250 first,
 * then page_info cursors.
 */

import { z } from 'zod'
import type { RequestExecutor, RequestResult } from '../core/fetch-with-retry.js'
import { fetchAll, type PageExtract, type PageWalk } from '../core/paginate.js'
import type {
  InventoryLevelPayload,
  ProductPayload,
  PublishPayload,
  RemoteProduct,
} from '../types/shopify.js'

const RemoteVariantSchema = z.object({
  id: z.number(),
  product_id: z.number().optional(),
  sku: z.string().nullable().default(null),
  inventory_item_id: z.number(),
  title: z.string().optional(),
})

const RemoteProductSchema = z.object({
  id: z.number(),
  title: z.string(),
  handle: z.string().optional(),
  variants: z.array(RemoteVariantSchema).default([]),
})

const ProductListSchema = z.object({ products: z.array(z.unknown()) })
const ProductEnvelopeSchema = z.object({ product: RemoteProductSchema })

export type CallResult<T> = { ok: true; value: T } | { ok: false; error: string }

/** What the reconciler and runner need from the remote catalog */
export interface CatalogClient {
  listProducts(): Promise<PageWalk<RemoteProduct>>
  createProduct(payload: ProductPayload): Promise<CallResult<RemoteProduct>>
  updateProduct(id: number, payload: ProductPayload | PublishPayload): Promise<CallResult<null>>
  setInventoryLevel(inventoryItemId: number, available: number): Promise<CallResult<null>>
}

export interface ShopifyAdminConfig {
  shopUrl: string
  apiVersion: string
  locationId: string
}

/** Admin API base, e.g. https://shop.myshopify.com/admin/api/2024-01 */
export function adminBaseUrl(shopUrl: string, apiVersion: string): string {
  const host = shopUrl.replace(/^https?:\/\//, '').replace(/\/+$/, '')
  return `https://${host}/admin/api/${apiVersion}`
}

function describeProduct(raw: unknown, index: number): string {
  if (raw && typeof raw === 'object' && 'id' in raw && typeof raw.id === 'number') return `product ${raw.id}`
  return `product at position ${index}`
}

/** Products of one listing page; a single unreadable product fails the whole page */
export function extractProducts(body: unknown): PageExtract<RemoteProduct> {
  const page = ProductListSchema.safeParse(body)
  if (!page.success) return { ok: false, reason: 'response has no products array' }

  const items: RemoteProduct[] = []
  const rejected: string[] = []
  page.data.products.forEach((raw, index) => {
    const parsed = RemoteProductSchema.safeParse(raw)
    if (parsed.success) {
      items.push(parsed.data)
      return
    }
    const issue = parsed.error.issues[0]
    const where = issue?.path.length ? `${issue.path.join('.')} ` : ''
    rejected.push(`${describeProduct(raw, index)}: ${where}${issue?.message ?? 'invalid'}`)
  })

  if (rejected.length > 0) {
    return { ok: false, reason: `${rejected.length} product(s) failed validation (${rejected.join('; ')})` }
  }
  return { ok: true, items }
}

function failure(result: Extract<RequestResult, { ok: false }>): { ok: false; error: string } {
  return { ok: false, error: result.error.message }
}

export class ShopifyAdminClient implements CatalogClient {
  private readonly baseUrl: string

  constructor(
    private readonly executor: RequestExecutor,
    private readonly config: ShopifyAdminConfig
  ) {
    this.baseUrl = adminBaseUrl(config.shopUrl, config.apiVersion)
  }

  listProducts(): Promise<PageWalk<RemoteProduct>> {
    return fetchAll(this.executor, `${this.baseUrl}/products.json?limit=250`, extractProducts)
  }

  async createProduct(payload: ProductPayload): Promise<CallResult<RemoteProduct>> {
    const result = await this.executor.execute('POST', `${this.baseUrl}/products.json`, payload)
    if (!result.ok) return failure(result)

    const parsed = ProductEnvelopeSchema.safeParse(result.response.body)
    if (!parsed.success) {
      return { ok: false, error: `POST ${this.baseUrl}/products.json returned no product` }
    }
    return { ok: true, value: parsed.data.product }
  }

  async updateProduct(id: number, payload: ProductPayload | PublishPayload): Promise<CallResult<null>> {
    const body = { product: { ...payload.product, id } }
    const result = await this.executor.execute('PUT', `${this.baseUrl}/products/${id}.json`, body)
    return result.ok ? { ok: true, value: null } : failure(result)
  }

  async setInventoryLevel(inventoryItemId: number, available: number): Promise<CallResult<null>> {
    const payload: InventoryLevelPayload = {
      location_id: this.config.locationId,
      inventory_item_id: inventoryItemId,
      available,
    }
    const result = await this.executor.execute('POST', `${this.baseUrl}/inventory_levels/set.json`, payload)
    return result.ok ? { ok: true, value: null } : failure(result)
  }
}
