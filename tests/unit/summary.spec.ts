import { test } from '@japa/runner'
import { mkdtempSync, readFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { buildSummary, formatSummary, writeSummary, type BrandResult } from '../../src/core/summary.js'

const brandResults: BrandResult[] = [
  {
    brand: 'North Studio',
    durationMs: 4000,
    results: [
      { status: 'created', title: 'Tee', productId: 1 },
      { status: 'skipped', title: 'Cap', reason: 'ambiguous-sku', detail: 'remote products 2, 3' },
      { status: 'failed', title: 'Scarf', reason: 'create failed: boom' },
    ],
  },
  {
    brand: 'Atelier Demo',
    durationMs: 8000,
    results: [
      { status: 'updated', title: 'Coat', productId: 4 },
      { status: 'skipped', title: 'Hat', reason: 'ambiguous-sku' },
      { status: 'skipped', title: 'Belt', reason: 'no-available-variant' },
    ],
  },
]

test.group('Run summary', () => {
  test('totals results per run and per brand', ({ assert }) => {
    const summary = buildSummary(brandResults, { disabled: 2, failed: 1 }, 12_345)

    assert.equal(summary.processed, 6)
    assert.equal(summary.succeeded, 2)
    assert.equal(summary.skipped, 3)
    assert.equal(summary.failed, 1)
    assert.equal(summary.disabled, 2)
    assert.equal(summary.disableFailed, 1)
    assert.deepEqual(summary.skipReasons, { 'ambiguous-sku': 2, 'no-available-variant': 1 })
    assert.deepEqual(summary.failures, [{ brand: 'North Studio', title: 'Scarf', reason: 'create failed: boom' }])
    assert.deepEqual(summary.brands[1], {
      brand: 'Atelier Demo',
      processed: 3,
      succeeded: 1,
      skipped: 2,
      failed: 0,
      durationMs: 8000,
    })
  })

  test('formats the console report', ({ assert }) => {
    const summary = buildSummary(brandResults, { disabled: 2, failed: 1 }, 12_345)

    assert.deepEqual(formatSummary(summary), [
      '=== SUMMARY ===',
      '  Processed: 6',
      '  Succeeded: 2',
      '  Skipped: 3',
      '  Failed: 1',
      '  Disabled: 2 (1 disable calls failed)',
      '  Duration: 12.3s',
      '    skipped ambiguous-sku: 2',
      '    skipped no-available-variant: 1',
    ])
  })

  test('omits the disable failure note when every disable succeeded', ({ assert }) => {
    const lines = formatSummary(buildSummary([], { disabled: 0, failed: 0 }, 0))
    assert.equal(lines[5], '  Disabled: 0')
  })

  test('writes the summary into an output directory that does not exist yet', ({ assert }) => {
    const path = join(mkdtempSync(join(tmpdir(), 'catalog-sync-')), 'output', 'sync-summary.json')
    const summary = buildSummary([], { disabled: 0, failed: 0 }, 0)

    writeSummary(summary, path)

    assert.deepEqual(JSON.parse(readFileSync(path, 'utf-8')), summary)
  })
})
