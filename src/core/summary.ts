/**
 * Summary builder: run totals from per-product SyncResults, written to
 * sync-summary.json and printed at the end of a run.
 */

import { mkdirSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'
import type { SyncResult } from '../schema/catalog-product.js'

export interface BrandResult {
  brand: string
  results: SyncResult[]
  durationMs: number
}

export interface BrandSummary {
  brand: string
  processed: number
  succeeded: number
  skipped: number
  failed: number
  durationMs: number
}

export interface RunSummary {
  processed: number
  succeeded: number
  skipped: number
  failed: number
  disabled: number
  disableFailed: number
  byStatus: Record<string, number>
  skipReasons: Record<string, number>
  brands: BrandSummary[]
  failures: Array<{ brand: string; title: string; reason: string }>
  durationMs: number
  generatedAt: string
}

export interface SweepResult {
  disabled: number
  failed: number
}

export function isSuccess(result: SyncResult): boolean {
  return result.status === 'created' || result.status === 'updated' || result.status === 'inventory-only-updated'
}

function countBy(values: string[]): Record<string, number> {
  const counts: Record<string, number> = {}
  for (const val of values) {
    counts[val] = (counts[val] || 0) + 1
  }
  // Sort by count descending
  return Object.fromEntries(
    Object.entries(counts).sort(([, a], [, b]) => b - a)
  )
}

export function summarizeBrand({ brand, results, durationMs }: BrandResult): BrandSummary {
  return {
    brand,
    processed: results.length,
    succeeded: results.filter(isSuccess).length,
    skipped: results.filter(r => r.status === 'skipped').length,
    failed: results.filter(r => r.status === 'failed').length,
    durationMs,
  }
}

export function buildSummary(brandResults: BrandResult[], sweep: SweepResult, durationMs: number): RunSummary {
  const brands = brandResults.map(summarizeBrand)
  const all = brandResults.flatMap(b => b.results)
  const failures = brandResults.flatMap(b =>
    b.results.flatMap(r => (r.status === 'failed' ? [{ brand: b.brand, title: r.title, reason: r.reason }] : []))
  )
  const skipReasons = all.flatMap(r => (r.status === 'skipped' ? [r.reason] : []))

  return {
    processed: all.length,
    succeeded: brands.reduce((s, b) => s + b.succeeded, 0),
    skipped: brands.reduce((s, b) => s + b.skipped, 0),
    failed: brands.reduce((s, b) => s + b.failed, 0),
    disabled: sweep.disabled,
    disableFailed: sweep.failed,
    byStatus: countBy(all.map(r => r.status)),
    skipReasons: countBy(skipReasons),
    brands,
    failures,
    durationMs,
    generatedAt: new Date().toISOString(),
  }
}

export function writeSummary(summary: RunSummary, outputPath: string): void {
  mkdirSync(dirname(outputPath), { recursive: true })
  writeFileSync(outputPath, JSON.stringify(summary, null, 2) + '\n', 'utf-8')
}

export function formatSummary(summary: RunSummary): string[] {
  const lines = [
    '=== SUMMARY ===',
    `  Processed: ${summary.processed}`,
    `  Succeeded: ${summary.succeeded}`,
    `  Skipped: ${summary.skipped}`,
    `  Failed: ${summary.failed}`,
    `  Disabled: ${summary.disabled}${summary.disableFailed ? ` (${summary.disableFailed} disable calls failed)` : ''}`,
    `  Duration: ${(summary.durationMs / 1000).toFixed(1)}s`,
  ]
  for (const [reason, count] of Object.entries(summary.skipReasons)) {
    lines.push(`    skipped ${reason}: ${count}`)
  }
  return lines
}
