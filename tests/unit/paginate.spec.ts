import { test } from '@japa/runner'
import { PageError, fetchAll, parseNextLink, type PageExtract } from '../../src/core/paginate.js'
import { RateLimiter } from '../../src/core/rate-limiter.js'
import { RequestError, RequestExecutor } from '../../src/core/fetch-with-retry.js'
import { FakeClock, captureLogger, json, scriptedFetch, text, type FetchStep } from '../helpers/fakes.js'

const BASE = 'https://shop.test/admin/api/2024-01/products.json'

function executorFor(steps: FetchStep[]) {
  const clock = new FakeClock()
  const { fetchImpl, requests } = scriptedFetch(steps)
  const executor = new RequestExecutor({
    limiter: new RateLimiter(1000, clock),
    clock,
    fetchImpl,
    maxRetries: 0,
    logger: captureLogger(),
  })
  return { executor, requests }
}

function numbers(body: unknown): PageExtract<number> {
  if (!body || typeof body !== 'object' || !('items' in body) || !Array.isArray(body.items)) {
    return { ok: false, reason: 'no items array' }
  }
  const items: unknown[] = body.items
  return { ok: true, items: items.filter((n): n is number => typeof n === 'number') }
}

test.group('parseNextLink', () => {
  test('extracts the rel="next" target', ({ assert }) => {
    const header = `<${BASE}?limit=250&page_info=abc>; rel="next"`
    assert.equal(parseNextLink(header), `${BASE}?limit=250&page_info=abc`)
  })

  test('picks next when previous is also present', ({ assert }) => {
    const header = `<${BASE}?page_info=prev>; rel="previous", <${BASE}?page_info=nxt>; rel="next"`
    assert.equal(parseNextLink(header), `${BASE}?page_info=nxt`)
  })

  test('returns null without a next relation', ({ assert }) => {
    assert.isNull(parseNextLink(`<${BASE}?page_info=prev>; rel="previous"`))
    assert.isNull(parseNextLink(null))
  })
})

test.group('fetchAll', () => {
  test('follows next links until the last page', async ({ assert }) => {
    const { executor, requests } = executorFor([
      json({ items: [1, 2] }, 200, { Link: `<${BASE}?page_info=p2>; rel="next"` }),
      json({ items: [3] }, 200, { Link: `<${BASE}?page_info=p1>; rel="previous", <${BASE}?page_info=p3>; rel="next"` }),
      json({ items: [4, 5] }, 200, { Link: `<${BASE}?page_info=p2>; rel="previous"` }),
    ])

    const walk = await fetchAll(executor, `${BASE}?limit=250`, numbers)

    assert.deepEqual(walk.items, [1, 2, 3, 4, 5])
    assert.equal(walk.pages, 3)
    assert.isTrue(walk.complete)
    assert.isNull(walk.error)
    assert.deepEqual(
      requests.map(r => r.url),
      [`${BASE}?limit=250`, `${BASE}?page_info=p2`, `${BASE}?page_info=p3`]
    )
  })

  test('returns the partial result when a page fails', async ({ assert }) => {
    const { executor } = executorFor([
      json({ items: [1, 2] }, 200, { Link: `<${BASE}?page_info=p2>; rel="next"` }),
      text('gone', 404),
    ])

    const walk = await fetchAll(executor, BASE, numbers)

    assert.deepEqual(walk.items, [1, 2])
    assert.equal(walk.pages, 1)
    assert.isFalse(walk.complete)
    assert.instanceOf(walk.error, RequestError)
    if (walk.error instanceof RequestError) assert.equal(walk.error.status, 404)
  })

  test('stops at a page whose body cannot be read', async ({ assert }) => {
    const { executor } = executorFor([
      json({ items: [1, 2] }, 200, { Link: `<${BASE}?page_info=p2>; rel="next"` }),
      json({ unexpected: true }, 200, { Link: `<${BASE}?page_info=p3>; rel="next"` }),
    ])

    const walk = await fetchAll(executor, BASE, numbers)

    assert.deepEqual(walk.items, [1, 2])
    assert.equal(walk.pages, 1)
    assert.isFalse(walk.complete)
    assert.instanceOf(walk.error, PageError)
    assert.equal(walk.error?.message, `GET ${BASE}?page_info=p2 returned an unusable page: no items array`)
  })
})
