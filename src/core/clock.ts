/**
 * Time source shared by the rate limiter, request executor and remote cache.
 * Tests pass a fake clock whose sleep() advances now() without waiting.
 */

export interface Clock {
  now(): number
  sleep(ms: number): Promise<void>
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: ms => new Promise(resolve => setTimeout(resolve, ms)),
}

/** Diagnostic sink; defaults to console everywhere */
export type Logger = Pick<Console, 'log' | 'warn' | 'error'>
