/**
 * Cursor pagination: follows the rel="next" entry of each response's Link
 * header until there is none.
 *
 * A failed or unreadable page ends the walk; whatever was gathered so far is
 * returned with complete=false and the error that stopped it.
 */

import type { RequestError, RequestExecutor } from './fetch-with-retry.js'

/** Items read from one page body, or why the page could not be used */
export type PageExtract<T> = { ok: true; items: T[] } | { ok: false; reason: string }

export class PageError extends Error {
  constructor(
    readonly url: string,
    readonly reason: string
  ) {
    super(`GET ${url} returned an unusable page: ${reason}`)
    this.name = 'PageError'
  }
}

export interface PageWalk<T> {
  items: T[]
  pages: number
  complete: boolean
  error: RequestError | PageError | null
}

/** Extract the rel="next" target from a Link header */
export function parseNextLink(header: string | null): string | null {
  if (!header) return null
  for (const part of header.split(',')) {
    const match = part.match(/<([^>]+)>\s*;(.*)/)
    if (!match) continue
    const rel = (match[2] ?? '').match(/rel\s*=\s*"?([^";]*)"?/i)
    const relations = rel?.[1]?.toLowerCase().split(/\s+/) ?? []
    if (relations.includes('next')) return match[1] ?? null
  }
  return null
}

export async function fetchAll<T>(
  executor: RequestExecutor,
  startUrl: string,
  extract: (body: unknown) => PageExtract<T>
): Promise<PageWalk<T>> {
  const items: T[] = []
  let pages = 0
  let url: string | null = startUrl

  while (url) {
    const result = await executor.execute('GET', url)
    if (!result.ok) {
      return { items, pages, complete: false, error: result.error }
    }
    const page = extract(result.response.body)
    if (!page.ok) {
      return { items, pages, complete: false, error: new PageError(url, page.reason) }
    }
    items.push(...page.items)
    pages++
    url = parseNextLink(result.response.headers.get('link'))
  }

  return { items, pages, complete: true, error: null }
}
