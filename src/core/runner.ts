/**
 * Core runner: for each brand batch, refresh cache → validate → reconcile
 * (bounded worker pool) → force refresh. Then one stale-item sweep over every
 * remote variant whose SKU no batch carried.
 *
 * Only a CacheBootstrapError escapes; every other failure becomes a result.
 */

import pLimit from 'p-limit'
import { systemClock, type Clock, type Logger } from './clock.js'
import type { RemoteCatalogCache } from './remote-cache.js'
import { reconcile, type ReconcileOptions } from './reconciler.js'
import { buildSummary, isSuccess, type BrandResult, type RunSummary, type SweepResult } from './summary.js'
import { validateProduct, type ValidationPolicy } from '../lib/validate.js'
import type { CatalogClient } from '../platforms/shopify-admin.js'
import type { BrandBatch, SyncResult } from '../schema/catalog-product.js'
import type { RemoteProduct } from '../types/shopify.js'

export interface RunOptions extends Omit<ReconcileOptions, 'logger'>, ValidationPolicy {
  workers: number
  /** Stale-item sweep after the batches; only safe when every brand is in the run */
  sweep?: boolean
}

export interface RunDeps {
  client: CatalogClient
  cache: RemoteCatalogCache
  options: RunOptions
  clock?: Clock
  logger?: Logger
}

/** Every SKU present in the raw snapshot records, valid or not */
export function collectSkus(products: unknown[]): Set<string> {
  const skus = new Set<string>()
  for (const product of products) {
    if (!product || typeof product !== 'object' || !('variants' in product)) continue
    if (!Array.isArray(product.variants)) continue
    const variants: unknown[] = product.variants
    for (const variant of variants) {
      if (variant && typeof variant === 'object' && 'sku' in variant && typeof variant.sku === 'string') {
        const sku = variant.sku.trim()
        if (sku) skus.add(sku)
      }
    }
  }
  return skus
}

/** Remote variants whose SKU is not in the seen set, one entry per inventory item */
export function findStaleInventoryItems(snapshot: readonly RemoteProduct[], seen: Set<string>): Map<number, string> {
  const stale = new Map<number, string>()
  for (const product of snapshot) {
    for (const variant of product.variants) {
      const sku = variant.sku?.trim()
      if (!sku || seen.has(sku)) continue
      stale.set(variant.inventory_item_id, sku)
    }
  }
  return stale
}

async function syncProduct(
  raw: unknown,
  snapshot: readonly RemoteProduct[],
  deps: RunDeps,
  logger: Logger
): Promise<SyncResult> {
  const { options } = deps
  const validation = validateProduct(raw, options)
  if (!validation.ok) {
    logger.warn(`  - "${validation.title}": invalid, ${validation.reason}`)
    return { status: 'skipped', title: validation.title, reason: 'invalid-product', detail: validation.reason }
  }

  try {
    return await reconcile(validation.product, snapshot, deps.client, { ...options, logger })
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    logger.error(`  x "${validation.product.title}": ${reason}`)
    return { status: 'failed', title: validation.product.title, reason }
  }
}

export async function runBatch(batch: BrandBatch, deps: RunDeps): Promise<BrandResult> {
  const clock = deps.clock ?? systemClock
  const logger = deps.logger ?? console
  const startTime = clock.now()

  logger.log(`[${batch.brand}] Processing ${batch.products.length} products...`)
  const snapshot = await deps.cache.get()

  const limit = pLimit(deps.options.workers)
  const results = await Promise.all(
    batch.products.map(raw => limit(() => syncProduct(raw, snapshot, deps, logger)))
  )

  // Later batches must see this batch's creates.
  await deps.cache.get(true)

  const succeeded = results.filter(isSuccess).length
  logger.log(`[${batch.brand}] ${succeeded}/${results.length} products synced`)
  return { brand: batch.brand, results, durationMs: clock.now() - startTime }
}

export async function sweepStale(seen: Set<string>, deps: RunDeps): Promise<SweepResult> {
  const logger = deps.logger ?? console
  const snapshot = await deps.cache.get(true)
  const stale = findStaleInventoryItems(snapshot, seen)

  if (stale.size === 0) {
    logger.log('[sweep] No stale remote variants')
    return { disabled: 0, failed: 0 }
  }
  logger.log(`[sweep] Disabling ${stale.size} remote variants missing from every snapshot...`)

  const limit = pLimit(deps.options.workers)
  const outcomes = await Promise.all(
    [...stale].map(([inventoryItemId, sku]) =>
      limit(async () => {
        const result = await deps.client.setInventoryLevel(inventoryItemId, 0)
        if (!result.ok) logger.error(`[sweep] Failed to disable ${sku}: ${result.error}`)
        return result.ok
      })
    )
  )

  const disabled = outcomes.filter(Boolean).length
  return { disabled, failed: outcomes.length - disabled }
}

export async function runSync(batches: BrandBatch[], deps: RunDeps): Promise<RunSummary> {
  const clock = deps.clock ?? systemClock
  const startTime = clock.now()
  const brandResults: BrandResult[] = []

  // Batches run one after another so each sees the previous one's writes.
  for (const batch of batches) {
    brandResults.push(await runBatch(batch, deps))
  }

  let sweep: SweepResult = { disabled: 0, failed: 0 }
  if (deps.options.sweep ?? true) {
    const seen = collectSkus(batches.flatMap(b => b.products))
    sweep = await sweepStale(seen, deps)
  }

  return buildSummary(brandResults, sweep, clock.now() - startTime)
}
