/**
 * Debug artifact writer: saves error details when a run aborts.
 */

import { mkdirSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'

export function saveDebugArtifacts(error: unknown, outputDir: string, context: Record<string, unknown> = {}): string {
  const debugDir = join(outputDir, 'debug')
  mkdirSync(debugDir, { recursive: true })

  const errorInfo = {
    name: error instanceof Error ? error.name : 'Error',
    message: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
    timestamp: new Date().toISOString(),
    ...context,
  }

  const path = join(debugDir, 'error.json')
  writeFileSync(path, JSON.stringify(errorInfo, null, 2) + '\n', 'utf-8')
  console.log(`  Debug error saved to ${path}`)
  return path
}
