import { test } from '@japa/runner'
import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { SnapshotError, readBrandSnapshot, writeBrandSnapshot } from '../../src/core/snapshot.js'
import { saveDebugArtifacts } from '../../src/core/debug.js'
import { localProduct, localVariant } from '../helpers/products.js'

const workdir = () => mkdtempSync(join(tmpdir(), 'catalog-sync-'))

function errorFrom(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  return null
}

test.group('Brand snapshots', () => {
  test('writes pretty JSON into a new directory and reads the raw records back', ({ assert }) => {
    const path = join(workdir(), 'output', 'north-studio.json')
    const products = [localProduct('Tee', [localVariant('T-1')])]

    writeBrandSnapshot(path, products)

    assert.isTrue(readFileSync(path, 'utf-8').endsWith(']\n'))
    assert.deepEqual(readBrandSnapshot(path), products)
  })

  test('a missing file is a SnapshotError', ({ assert }) => {
    const path = join(workdir(), 'missing.json')
    const error = errorFrom(() => readBrandSnapshot(path))

    assert.instanceOf(error, SnapshotError)
    if (error instanceof SnapshotError) assert.equal(error.message, `No snapshot at ${path} (run scrape first)`)
  })

  test('a file that is not an array is a SnapshotError', ({ assert }) => {
    const path = join(workdir(), 'object.json')
    writeFileSync(path, '{"products": []}')

    const error = errorFrom(() => readBrandSnapshot(path))

    assert.instanceOf(error, SnapshotError)
    if (error instanceof SnapshotError) assert.equal(error.message, `${path} must contain a JSON array of products`)
  })
})

test.group('Debug artifacts', () => {
  test('records the error and run context', ({ assert }) => {
    const dir = workdir()
    const path = saveDebugArtifacts(new Error('listing failed'), dir, { command: 'sync' })

    assert.equal(path, join(dir, 'debug', 'error.json'))
    const saved: unknown = JSON.parse(readFileSync(path, 'utf-8'))
    assert.containsSubset(saved, { name: 'Error', message: 'listing failed', command: 'sync' })
  })
})
