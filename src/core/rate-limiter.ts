/**
 * Global call-rate limiter shared by every worker that talks to one API.
 *
 * acquire() resolves no sooner than 1/N seconds after the previous grant.
 * Callers are chained in arrival order, so the last-grant timestamp is only
 * ever read and written by the caller at the head of the chain.
 */

import { systemClock, type Clock } from './clock.js'

export class RateLimiter {
  private readonly intervalMs: number
  private lastGrant: number | null = null
  private tail: Promise<void> = Promise.resolve()

  constructor(callsPerSecond = 2, private readonly clock: Clock = systemClock) {
    if (!(callsPerSecond > 0)) {
      throw new RangeError(`callsPerSecond must be positive, got ${callsPerSecond}`)
    }
    this.intervalMs = 1000 / callsPerSecond
  }

  acquire(): Promise<void> {
    const turn = this.tail.then(() => this.grant())
    this.tail = turn
    return turn
  }

  private async grant(): Promise<void> {
    if (this.lastGrant !== null) {
      const wait = this.lastGrant + this.intervalMs - this.clock.now()
      if (wait > 0) await this.clock.sleep(wait)
    }
    this.lastGrant = this.clock.now()
  }
}
