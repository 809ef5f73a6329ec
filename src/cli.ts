#!/usr/bin/env tsx
/**
 * CLI for the storefront → admin catalog sync.
 *
 * Usage:
 *   npx tsx src/cli.ts list
 *   npx tsx src/cli.ts scrape --brand <slug> | --all
 *   npx tsx src/cli.ts sync --brand <slug> | --all [--inventory-only]
 */

import 'dotenv/config'

import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { loadBrands, loadConfig, requireAdminCredentials, type SyncConfig } from './lib/config.js'
import { mapStorefrontProducts } from './lib/storefront-map.js'
import { RateLimiter } from './core/rate-limiter.js'
import { RequestExecutor } from './core/fetch-with-retry.js'
import { RemoteCatalogCache } from './core/remote-cache.js'
import { runSync } from './core/runner.js'
import { formatSummary, writeSummary } from './core/summary.js'
import { readBrandSnapshot, writeBrandSnapshot, SnapshotError } from './core/snapshot.js'
import { saveDebugArtifacts } from './core/debug.js'
import { ShopifyAdminClient } from './platforms/shopify-admin.js'
import { scrape } from './platforms/shopify-storefront.js'
import type { BrandBatch, BrandSource } from './schema/catalog-product.js'

const ROOT = fileURLToPath(new URL('..', import.meta.url))
const BRANDS_PATH = join(ROOT, 'config', 'brands.json')
const OUTPUT_DIR = join(ROOT, 'output')

const args = process.argv.slice(2)
const command = args[0]

function getFlag(name: string): string | undefined {
  const idx = args.indexOf(`--${name}`)
  return idx >= 0 ? args[idx + 1] : undefined
}

function hasFlag(name: string): boolean {
  return args.includes(`--${name}`)
}

function snapshotPath(brand: BrandSource): string {
  return join(OUTPUT_DIR, `${brand.slug}.json`)
}

/** Brands selected by --brand <slug> or --all; exits on bad input */
function selectBrands(): BrandSource[] {
  const brands = loadBrands(BRANDS_PATH)
  const slug = getFlag('brand')

  if (hasFlag('all')) return brands
  if (!slug) {
    printUsage()
    process.exit(1)
  }

  const brand = brands.find(b => b.slug === slug)
  if (!brand) {
    console.error(`Error: no brand configured for "${slug}"`)
    console.error(`Available: ${brands.map(b => b.slug).join(', ') || 'none'}`)
    process.exit(1)
  }
  return [brand]
}

async function runScrape(config: SyncConfig, brands: BrandSource[]): Promise<number> {
  const executor = new RequestExecutor({
    limiter: new RateLimiter(config.callsPerSecond),
    maxRetries: config.maxRetries,
  })

  let failed = 0
  for (const brand of brands) {
    console.log(`\n--- Scraping: ${brand.name} ---`)
    const outcome = await scrape(executor, brand)
    if (outcome.error) {
      // A partial listing would make the sweep disable live items; keep the previous snapshot.
      console.log(`  FAILED: ${outcome.error} (previous snapshot kept)`)
      failed++
      continue
    }
    const products = mapStorefrontProducts(outcome.products, brand)
    writeBrandSnapshot(snapshotPath(brand), products)
    console.log(`  Products: ${products.length}`)
    console.log(`  Output: ${snapshotPath(brand)}`)
  }
  return failed
}

async function runSyncCommand(config: SyncConfig, brands: BrandSource[], fullRun: boolean): Promise<number> {
  const credentials = requireAdminCredentials(config)
  const executor = new RequestExecutor({
    limiter: new RateLimiter(config.callsPerSecond),
    maxRetries: config.maxRetries,
    headers: { 'X-Shopify-Access-Token': credentials.accessToken },
  })
  const client = new ShopifyAdminClient(executor, {
    shopUrl: credentials.shopUrl,
    apiVersion: config.apiVersion,
    locationId: credentials.locationId,
  })
  const cache = new RemoteCatalogCache(() => client.listProducts(), { ttlSeconds: config.cacheTtlSeconds })

  const batches: BrandBatch[] = []
  let missing = 0
  for (const brand of brands) {
    try {
      batches.push({ brand: brand.name, products: readBrandSnapshot(snapshotPath(brand)) })
    } catch (err) {
      if (!(err instanceof SnapshotError)) throw err
      console.error(`[${brand.name}] ${err.message}, skipping`)
      missing++
    }
  }

  const sweep = fullRun && missing === 0
  if (fullRun && !sweep) {
    console.warn('WARNING: stale-item sweep disabled because some snapshots could not be read')
  }

  const summary = await runSync(batches, {
    client,
    cache,
    options: {
      workers: config.workers,
      inStockQuantity: config.inStockQuantity,
      markup: config.markup,
      roundingTarget: config.roundingTarget,
      excludedVendors: config.excludedVendors,
      requireImages: config.requireImages,
      inventoryOnly: hasFlag('inventory-only'),
      sweep,
    },
  })

  console.log()
  formatSummary(summary).forEach(line => console.log(line))
  const summaryPath = join(OUTPUT_DIR, 'sync-summary.json')
  writeSummary(summary, summaryPath)
  console.log(`  Summary: ${summaryPath}`)

  return summary.failed + summary.disableFailed + missing
}

async function main() {
  if (!command) {
    printUsage()
    process.exit(1)
  }

  if (command === 'list') {
    const brands = loadBrands(BRANDS_PATH)
    console.log('Available brands:')
    for (const b of brands) {
      console.log(`  ${b.slug.padEnd(24)} ${b.name.padEnd(24)} ${b.storeUrl}`)
    }
    if (brands.length === 0) console.log('  (none, add entries to config/brands.json)')
    process.exit(0)
  }

  if (command === 'scrape') {
    const failed = await runScrape(loadConfig(), selectBrands())
    process.exit(failed > 0 ? 1 : 0)
  }

  if (command === 'sync') {
    const config = loadConfig()
    const brands = selectBrands()
    const failed = await runSyncCommand(config, brands, hasFlag('all'))
    process.exit(failed > 0 ? 1 : 0)
  }

  console.error(`Unknown command: ${command}`)
  printUsage()
  process.exit(1)
}

function printUsage() {
  console.log(`
Usage:
  npx tsx src/cli.ts list
  npx tsx src/cli.ts scrape --brand <slug> | --all
  npx tsx src/cli.ts sync --brand <slug> | --all [--inventory-only]

Examples:
  npx tsx src/cli.ts scrape --all
  npx tsx src/cli.ts sync --brand north-studio
  npx tsx src/cli.ts sync --all --inventory-only
`)
}

main().catch(err => {
  console.error('Fatal error:', err instanceof Error ? err.message : err)
  saveDebugArtifacts(err, OUTPUT_DIR, { command, args })
  process.exit(1)
})
