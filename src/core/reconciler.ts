/**
 * Reconciler: matches one local product to the remote snapshot by SKU and
 * drives the create / update / inventory calls.
 *
 *   no remote match          → create (+ publish follow-up when no published_at)
 *   all variants matched     → inventory per variant + full product update
 *   some variants unmatched  → inventory for the matched ones only, then skip
 *   SKUs on several products → skip as ambiguous, no calls
 *
 * Never throws for API failures; they come back as a failed SyncResult.
 */

import type { Logger } from './clock.js'
import type { LocalProduct, LocalVariant, SyncResult } from '../schema/catalog-product.js'
import type { RemoteProduct, RemoteVariant } from '../types/shopify.js'
import type { CatalogClient } from '../platforms/shopify-admin.js'
import { buildProductPayload, isIsoTimestamp, type PayloadOptions } from '../lib/payload.js'

export interface ReconcileOptions extends PayloadOptions {
  /** Skip product-level updates on fully matched products */
  inventoryOnly?: boolean
  now?: () => Date
  logger?: Logger
}

export interface RemoteMatch {
  remote: RemoteProduct
  bySku: Map<string, RemoteVariant>
}

export type MatchOutcome =
  | { kind: 'none' }
  | { kind: 'single'; match: RemoteMatch }
  | { kind: 'ambiguous'; productIds: number[] }

/** Find the remote product(s) carrying any of the local SKUs */
export function findRemoteMatch(product: LocalProduct, snapshot: readonly RemoteProduct[]): MatchOutcome {
  const skus = new Set(product.variants.map(v => v.sku))
  const matches: RemoteMatch[] = []

  for (const remote of snapshot) {
    const bySku = new Map<string, RemoteVariant>()
    for (const variant of remote.variants) {
      if (variant.sku && skus.has(variant.sku) && !bySku.has(variant.sku)) {
        bySku.set(variant.sku, variant)
      }
    }
    if (bySku.size > 0) matches.push({ remote, bySku })
  }

  const [first] = matches
  if (!first) return { kind: 'none' }
  if (matches.length > 1) return { kind: 'ambiguous', productIds: matches.map(m => m.remote.id) }
  return { kind: 'single', match: first }
}

export async function reconcile(
  product: LocalProduct,
  snapshot: readonly RemoteProduct[],
  client: CatalogClient,
  options: ReconcileOptions
): Promise<SyncResult> {
  const logger = options.logger ?? console
  const title = product.title
  const outcome = findRemoteMatch(product, snapshot)

  if (outcome.kind === 'ambiguous') {
    const ids = outcome.productIds.join(', ')
    logger.warn(`  ! "${title}": SKUs found on several remote products (${ids}), not touching any`)
    return { status: 'skipped', title, reason: 'ambiguous-sku', detail: `remote products ${ids}` }
  }

  if (outcome.kind === 'single') {
    return updateExisting(product, outcome.match, client, options, logger)
  }

  return createNew(product, client, options, logger)
}

async function updateExisting(
  product: LocalProduct,
  { remote, bySku }: RemoteMatch,
  client: CatalogClient,
  options: ReconcileOptions,
  logger: Logger
): Promise<SyncResult> {
  const title = product.title
  const matched: Array<[LocalVariant, RemoteVariant]> = []
  const unmatched: LocalVariant[] = []

  for (const variant of product.variants) {
    const remoteVariant = bySku.get(variant.sku)
    if (remoteVariant) matched.push([variant, remoteVariant])
    else unmatched.push(variant)
  }

  const inventoryErrors: string[] = []
  for (const [local, remoteVariant] of matched) {
    const available = local.available ? options.inStockQuantity : 0
    const result = await client.setInventoryLevel(remoteVariant.inventory_item_id, available)
    if (!result.ok) inventoryErrors.push(`${local.sku}: ${result.error}`)
  }
  logger.log(`  ~ "${title}": inventory set for ${matched.length - inventoryErrors.length}/${matched.length} variants`)

  if (unmatched.length > 0) {
    const skus = unmatched.map(v => v.sku).join(', ')
    logger.warn(`  ! "${title}": new variants ${skus} on remote product ${remote.id}, product update withheld`)
    if (inventoryErrors.length > 0) {
      return { status: 'failed', title, reason: `inventory update failed (${inventoryErrors.join('; ')})` }
    }
    return { status: 'skipped', title, reason: 'new-variant-requires-manual-merge', detail: `unmatched SKUs ${skus}` }
  }

  if (!options.inventoryOnly) {
    const payload = buildProductPayload(product, options, logger)
    const update = await client.updateProduct(remote.id, payload)
    if (!update.ok) {
      return { status: 'failed', title, reason: `product update failed: ${update.error}` }
    }
  }

  if (inventoryErrors.length > 0) {
    return { status: 'failed', title, reason: `inventory update failed (${inventoryErrors.join('; ')})` }
  }

  if (options.inventoryOnly) {
    return { status: 'inventory-only-updated', title, productId: remote.id }
  }
  logger.log(`  ~ "${title}": product #${remote.id} updated`)
  return { status: 'updated', title, productId: remote.id }
}

async function createNew(
  product: LocalProduct,
  client: CatalogClient,
  options: ReconcileOptions,
  logger: Logger
): Promise<SyncResult> {
  const title = product.title

  if (!product.variants.some(v => v.available)) {
    logger.log(`  - "${title}": no available variant, not creating`)
    return { status: 'skipped', title, reason: 'no-available-variant' }
  }

  const created = await client.createProduct(buildProductPayload(product, options, logger))
  if (!created.ok) {
    return { status: 'failed', title, reason: `create failed: ${created.error}` }
  }
  const productId = created.value.id
  logger.log(`  + "${title}": created as #${productId}`)

  if (!isIsoTimestamp(product.published_at)) {
    const now = (options.now ?? (() => new Date()))()
    const publish = await client.updateProduct(productId, {
      product: { id: productId, published_at: now.toISOString() },
    })
    if (!publish.ok) {
      return { status: 'failed', title, reason: `created #${productId} but publish failed: ${publish.error}` }
    }
  }

  return { status: 'created', title, productId }
}
