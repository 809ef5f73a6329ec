/**
 * Sync configuration: read from environment variables (.env via dotenv).
 *
 * Every option has a default except the admin credentials, which only the
 * `sync` command needs.
 */

import { readFileSync } from 'node:fs'
import { z } from 'zod'
import type { BrandSource } from '../schema/catalog-product.js'

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

const numberFromEnv = (fallback: number, schema: z.ZodNumber = z.number()) =>
  z.preprocess(v => (v === undefined || v === '' ? fallback : Number(v)), schema.finite())

const listFromEnv = z.preprocess(
  v => (typeof v === 'string' && v.trim() ? v.split(',').map(s => s.trim()).filter(Boolean) : []),
  z.array(z.string())
)

const flagFromEnv = z.preprocess(
  v => (typeof v === 'string' ? ['1', 'true', 'yes'].includes(v.toLowerCase()) : false),
  z.boolean()
)

const EnvSchema = z.object({
  SHOPIFY_URL: z.string().optional(),
  SHOPIFY_TOKEN: z.string().optional(),
  SHOPIFY_API_VERSION: z.string().default('2024-01'),
  SHOPIFY_LOCATION_ID: z.string().optional(),
  SYNC_CALLS_PER_SECOND: numberFromEnv(2, z.number().positive()),
  SYNC_CACHE_TTL_SECONDS: numberFromEnv(300, z.number().nonnegative()),
  SYNC_MAX_RETRIES: numberFromEnv(3, z.number().int().nonnegative()),
  SYNC_WORKERS: numberFromEnv(2, z.number().int().positive()),
  SYNC_IN_STOCK_QUANTITY: numberFromEnv(1000, z.number().int().nonnegative()),
  PRICE_MARKUP: numberFromEnv(1.075, z.number().positive()),
  PRICE_ROUNDING_TARGET: numberFromEnv(0.99, z.number().min(0).max(0.99)),
  SYNC_EXCLUDED_VENDORS: listFromEnv,
  SYNC_REQUIRE_IMAGES: flagFromEnv,
})

export interface SyncConfig {
  shopUrl: string | null
  accessToken: string | null
  apiVersion: string
  locationId: string | null
  callsPerSecond: number
  cacheTtlSeconds: number
  maxRetries: number
  workers: number
  inStockQuantity: number
  markup: number
  roundingTarget: number
  excludedVendors: string[]
  requireImages: boolean
}

export interface AdminCredentials {
  shopUrl: string
  accessToken: string
  locationId: string
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`)
  }
  const e = parsed.data

  return {
    shopUrl: e.SHOPIFY_URL?.trim() || null,
    accessToken: e.SHOPIFY_TOKEN?.trim() || null,
    apiVersion: e.SHOPIFY_API_VERSION,
    locationId: e.SHOPIFY_LOCATION_ID?.trim() || null,
    callsPerSecond: e.SYNC_CALLS_PER_SECOND,
    cacheTtlSeconds: e.SYNC_CACHE_TTL_SECONDS,
    maxRetries: e.SYNC_MAX_RETRIES,
    workers: e.SYNC_WORKERS,
    inStockQuantity: e.SYNC_IN_STOCK_QUANTITY,
    markup: e.PRICE_MARKUP,
    roundingTarget: e.PRICE_ROUNDING_TARGET,
    excludedVendors: e.SYNC_EXCLUDED_VENDORS,
    requireImages: e.SYNC_REQUIRE_IMAGES,
  }
}

/** Admin API credentials; only throws when the sync command asks for them */
export function requireAdminCredentials(config: SyncConfig): AdminCredentials {
  const missing: string[] = []
  if (!config.shopUrl) missing.push('SHOPIFY_URL')
  if (!config.accessToken) missing.push('SHOPIFY_TOKEN')
  if (!config.locationId) missing.push('SHOPIFY_LOCATION_ID')

  if (!config.shopUrl || !config.accessToken || !config.locationId) {
    throw new ConfigError(`Missing ${missing.join(', ')} env vars`)
  }
  return {
    shopUrl: config.shopUrl,
    accessToken: config.accessToken,
    locationId: config.locationId,
  }
}

const BrandListSchema = z.array(
  z.object({
    slug: z.string().min(1),
    name: z.string().min(1),
    storeUrl: z.string().url(),
  })
)

/** Load brand sources from a JSON file (config/brands.json) */
export function loadBrands(path: string): BrandSource[] {
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'))
  } catch (err) {
    throw new ConfigError(`Failed to read brand list ${path}: ${err instanceof Error ? err.message : String(err)}`)
  }
  const parsed = BrandListSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError(`Invalid brand list ${path}: ${parsed.error.issues[0]?.message ?? 'unknown error'}`)
  }
  return parsed.data.map(b => ({ ...b, storeUrl: b.storeUrl.replace(/\/+$/, '') }))
}
