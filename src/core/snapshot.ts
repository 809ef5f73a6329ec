/**
 * Brand snapshot files: output/<slug>.json, a JSON array of product records.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'
import type { LocalProduct } from '../schema/catalog-product.js'

export class SnapshotError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SnapshotError'
  }
}

/** Raw records as written; the runner validates each one */
export function readBrandSnapshot(path: string): unknown[] {
  if (!existsSync(path)) {
    throw new SnapshotError(`No snapshot at ${path} (run scrape first)`)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'))
  } catch (err) {
    throw new SnapshotError(`Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`)
  }

  if (!Array.isArray(parsed)) {
    throw new SnapshotError(`${path} must contain a JSON array of products`)
  }
  const records: unknown[] = parsed
  return records
}

export function writeBrandSnapshot(path: string, products: LocalProduct[]): void {
  mkdirSync(dirname(path), { recursive: true })
  writeFileSync(path, JSON.stringify(products, null, 2) + '\n', 'utf-8')
}
