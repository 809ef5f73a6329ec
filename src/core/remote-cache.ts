/**
 * Remote catalog cache: the last full product listing, refreshed on TTL
 * expiry or on demand.
 *
 * A refresh builds a whole new snapshot and swaps it in; readers never see a
 * half-built list. Concurrent get() calls share one in-flight refresh.
 */

import { systemClock, type Clock, type Logger } from './clock.js'
import type { RemoteProduct } from '../types/shopify.js'
import type { PageWalk } from './paginate.js'

export class CacheBootstrapError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CacheBootstrapError'
  }
}

/** Loads the full remote listing; complete=false means the walk stopped early */
export type CatalogLoader = () => Promise<PageWalk<RemoteProduct>>

export interface RemoteCacheOptions {
  ttlSeconds?: number
  clock?: Clock
  logger?: Logger
}

export class RemoteCatalogCache {
  private snapshot: readonly RemoteProduct[] | null = null
  private lastRefresh = 0
  private inflight: Promise<readonly RemoteProduct[]> | null = null
  private readonly ttlMs: number
  private readonly clock: Clock
  private readonly logger: Logger

  constructor(private readonly load: CatalogLoader, options: RemoteCacheOptions = {}) {
    this.ttlMs = (options.ttlSeconds ?? 300) * 1000
    this.clock = options.clock ?? systemClock
    this.logger = options.logger ?? console
  }

  async get(forceRefresh = false): Promise<readonly RemoteProduct[]> {
    if (this.snapshot && !forceRefresh && this.clock.now() - this.lastRefresh <= this.ttlMs) {
      return this.snapshot
    }
    if (!this.inflight) {
      this.inflight = this.refresh().finally(() => {
        this.inflight = null
      })
    }
    return this.inflight
  }

  /** Drop the snapshot age so the next get() refreshes */
  invalidate(): void {
    this.lastRefresh = Number.NEGATIVE_INFINITY
  }

  private async refresh(): Promise<readonly RemoteProduct[]> {
    this.logger.log('[cache] Refreshing remote product cache...')
    const startedAt = this.clock.now()
    const walk = await this.load()

    if (walk.complete) {
      this.snapshot = Object.freeze([...walk.items])
      this.lastRefresh = startedAt
      this.logger.log(`[cache] Cached ${walk.items.length} remote products across ${walk.pages} pages`)
      return this.snapshot
    }

    const reason = walk.error?.message ?? 'listing ended early'
    if (!this.snapshot) {
      throw new CacheBootstrapError(`Initial remote catalog fetch failed: ${reason}`)
    }
    this.logger.warn(
      `[cache] WARNING: refresh failed after ${walk.items.length} products (${reason}); serving stale snapshot of ${this.snapshot.length}`
    )
    return this.snapshot
  }
}
