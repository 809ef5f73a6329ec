/**
 * Request executor: one logical API call through the rate limiter, with
 * retries, timeout, and exponential backoff.
 *
 * 429 responses wait for the server's Retry-After and do not use up a retry.
 * Network errors, timeouts, 408 and 5xx retry after 2^attempt seconds.
 * Anything else fails straight away. execute() never throws: callers get a
 * RequestResult and decide what a failure means for their record.
 */

import { systemClock, type Clock, type Logger } from './clock.js'
import type { RateLimiter } from './rate-limiter.js'

export type HttpMethod = 'GET' | 'POST' | 'PUT'

export interface HttpResponse {
  status: number
  headers: Headers
  body: unknown
}

export class RequestError extends Error {
  constructor(
    readonly method: HttpMethod,
    readonly url: string,
    readonly status: number | null,
    readonly detail: string,
    readonly attempts: number
  ) {
    super(`${method} ${url} failed after ${attempts} attempt(s): ${detail}`)
    this.name = 'RequestError'
  }
}

export type RequestResult =
  | { ok: true; response: HttpResponse }
  | { ok: false; error: RequestError }

export interface ExecutorOptions {
  limiter: RateLimiter
  maxRetries?: number
  timeoutMs?: number
  /** Wait used when a 429 carries no usable Retry-After */
  defaultRetryAfterMs?: number
  headers?: Record<string, string>
  clock?: Clock
  fetchImpl?: typeof fetch
  logger?: Logger
}

type Attempt =
  | { kind: 'ok'; response: HttpResponse }
  | { kind: 'rate-limited'; waitMs: number }
  | { kind: 'transient'; status: number | null; detail: string }
  | { kind: 'fatal'; status: number | null; detail: string }

export class RequestExecutor {
  private readonly limiter: RateLimiter
  private readonly maxRetries: number
  private readonly timeoutMs: number
  private readonly defaultRetryAfterMs: number
  private readonly headers: Record<string, string>
  private readonly clock: Clock
  private readonly fetchImpl: typeof fetch
  private readonly logger: Logger

  constructor(options: ExecutorOptions) {
    this.limiter = options.limiter
    this.maxRetries = options.maxRetries ?? 3
    this.timeoutMs = options.timeoutMs ?? 30_000
    this.defaultRetryAfterMs = options.defaultRetryAfterMs ?? 2_000
    this.headers = options.headers ?? {}
    this.clock = options.clock ?? systemClock
    this.fetchImpl = options.fetchImpl ?? fetch
    this.logger = options.logger ?? console
  }

  async execute(method: HttpMethod, url: string, body?: unknown): Promise<RequestResult> {
    let retries = 0
    let attempts = 0

    for (;;) {
      await this.limiter.acquire()
      attempts++
      const attempt = await this.attempt(method, url, body)

      switch (attempt.kind) {
        case 'ok':
          return { ok: true, response: attempt.response }

        case 'rate-limited':
          this.logger.warn(`[http] ${method} ${url} rate limited, waiting ${attempt.waitMs}ms...`)
          await this.clock.sleep(attempt.waitMs)
          continue

        case 'fatal':
          return this.fail(method, url, attempt.status, attempt.detail, attempts)

        case 'transient': {
          if (retries >= this.maxRetries) {
            return this.fail(method, url, attempt.status, attempt.detail, attempts)
          }
          retries++
          const delay = 1000 * Math.pow(2, retries)
          this.logger.warn(`[http] ${method} ${url} failed (${attempt.detail}), retrying in ${delay}ms...`)
          await this.clock.sleep(delay)
        }
      }
    }
  }

  private fail(
    method: HttpMethod,
    url: string,
    status: number | null,
    detail: string,
    attempts: number
  ): RequestResult {
    const error = new RequestError(method, url, status, detail, attempts)
    this.logger.error(`[http] ${error.message}`)
    return { ok: false, error }
  }

  private async attempt(method: HttpMethod, url: string, body: unknown): Promise<Attempt> {
    const sent = await this.send(method, url, body)
    if ('error' in sent) {
      return { kind: 'transient', status: null, detail: sent.error }
    }
    const { res, text } = sent

    if (res.status === 429) {
      return { kind: 'rate-limited', waitMs: this.retryAfterMs(res.headers.get('retry-after')) }
    }

    if (!res.ok) {
      const detail = `HTTP ${res.status}: ${text.slice(0, 500) || res.statusText}`
      const transient = res.status === 408 || res.status >= 500
      return transient
        ? { kind: 'transient', status: res.status, detail }
        : { kind: 'fatal', status: res.status, detail }
    }

    if (!text.trim()) {
      return { kind: 'ok', response: { status: res.status, headers: res.headers, body: null } }
    }
    try {
      const parsed: unknown = JSON.parse(text)
      return { kind: 'ok', response: { status: res.status, headers: res.headers, body: parsed } }
    } catch {
      return { kind: 'fatal', status: res.status, detail: `invalid JSON body: ${text.slice(0, 200)}` }
    }
  }

  private async send(
    method: HttpMethod,
    url: string,
    body: unknown
  ): Promise<{ res: Response; text: string } | { error: string }> {
    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), this.timeoutMs)
    const headers: Record<string, string> = { Accept: 'application/json', ...this.headers }
    if (body !== undefined) headers['Content-Type'] = 'application/json'

    try {
      const res = await this.fetchImpl(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      })
      return { res, text: await res.text() }
    } catch (err) {
      if (controller.signal.aborted) return { error: `timeout after ${this.timeoutMs}ms` }
      return { error: err instanceof Error ? err.message : String(err) }
    } finally {
      clearTimeout(timer)
    }
  }

  /** Retry-After as delta-seconds (fractions allowed) or an HTTP date */
  private retryAfterMs(header: string | null): number {
    if (!header) return this.defaultRetryAfterMs
    const seconds = Number(header.trim())
    if (Number.isFinite(seconds) && seconds >= 0) return Math.ceil(seconds * 1000)
    const date = Date.parse(header)
    if (!Number.isNaN(date)) return Math.max(0, date - this.clock.now())
    return this.defaultRetryAfterMs
  }
}
