import { test } from '@japa/runner'
import { RateLimiter } from '../../src/core/rate-limiter.js'
import { RequestExecutor } from '../../src/core/fetch-with-retry.js'
import { scrape, type StorefrontProduct } from '../../src/platforms/shopify-storefront.js'
import { mapStorefrontProduct } from '../../src/lib/storefront-map.js'
import type { BrandSource } from '../../src/schema/catalog-product.js'
import { FakeClock, captureLogger, json, scriptedFetch, text, type FetchStep } from '../helpers/fakes.js'

const brand: BrandSource = { slug: 'north-studio', name: 'North Studio', storeUrl: 'https://north-studio.example.com' }
const feed = (page: number) => `https://north-studio.example.com/collections/all/products.json?page=${page}`

function setup(steps: FetchStep[]) {
  const clock = new FakeClock()
  const logger = captureLogger()
  const { fetchImpl, requests } = scriptedFetch(steps)
  const executor = new RequestExecutor({ limiter: new RateLimiter(1000, clock), clock, fetchImpl, maxRetries: 0, logger })
  return { executor, logger, requests }
}

const item = (title: string) => ({ title, variants: [{ sku: `${title}-1`, price: '10.00', available: true }] })

test.group('Storefront scrape', () => {
  test('walks pages until an empty one', async ({ assert }) => {
    const { executor, logger, requests } = setup([
      json({ products: [item('A'), item('B')] }),
      json({ products: [item('C')] }),
      json({ products: [] }),
    ])

    const outcome = await scrape(executor, brand, { logger })

    assert.deepEqual(outcome.products.map(p => p.title), ['A', 'B', 'C'])
    assert.equal(outcome.pages, 2)
    assert.isNull(outcome.error)
    assert.deepEqual(requests.map(r => r.url), [feed(1), feed(2), feed(3)])
    assert.deepEqual(logger.lines.log, ['[North Studio] Fetched 3 products across 2 pages'])
  })

  test('stops with an error when a page fails', async ({ assert }) => {
    const { executor, logger } = setup([json({ products: [item('A')] }), text('nope', 404)])

    const outcome = await scrape(executor, brand, { logger })

    assert.equal(outcome.products.length, 1)
    assert.equal(outcome.pages, 1)
    assert.equal(outcome.error, `GET ${feed(2)} failed after 1 attempt(s): HTTP 404: nope`)
    assert.equal(logger.lines.error[1], '[North Studio] Page 2 failed: HTTP 404: nope')
  })

  test('rejects a page that is not a product listing', async ({ assert }) => {
    const { executor, logger } = setup([json([1, 2, 3])])

    const outcome = await scrape(executor, brand, { logger })

    assert.equal(outcome.error, 'unexpected payload on page 1')
    assert.lengthOf(outcome.products, 0)
  })

  test('honours the page cap', async ({ assert }) => {
    const { executor, logger } = setup([json({ products: [item('A')] })])

    const outcome = await scrape(executor, brand, { maxPages: 3, logger })

    assert.equal(outcome.pages, 3)
    assert.lengthOf(outcome.products, 3)
  })
})

test.group('Storefront mapping', () => {
  test('maps a feed item into the local catalog shape', ({ assert }) => {
    const feedItem: StorefrontProduct = {
      title: ' Linen Shirt ',
      body_html: '<p>Linen</p>',
      vendor: null,
      product_type: 'Shirt',
      tags: 'linen, summer ,',
      handle: 'linen-shirt',
      created_at: '2024-02-01T09:00:00Z',
      updated_at: null,
      published_at: '',
      images: [{ src: 'https://cdn.test/l1.jpg' }, { src: '' }],
      variants: [
        { title: 'S', price: '59.00', compare_at_price: null, sku: ' LS-S ', available: true, taxable: true, grams: 250, barcode: '' },
        { title: 'M', price: '59.00', sku: null, grams: 0 },
      ],
    }

    assert.deepEqual(mapStorefrontProduct(feedItem, brand), {
      title: 'Linen Shirt',
      body_html: '<p>Linen</p>',
      vendor: 'North Studio',
      product_type: 'Shirt',
      tags: ['linen', 'summer'],
      handle: 'linen-shirt',
      created_at: '2024-02-01T09:00:00Z',
      variants: [
        {
          sku: 'LS-S',
          variant_title: 'S',
          price: '59.00',
          available: true,
          images: ['https://cdn.test/l1.jpg'],
          taxable: true,
          weight: 250,
          weight_unit: 'g',
        },
        { sku: '', variant_title: 'M', price: '59.00', available: false, images: ['https://cdn.test/l1.jpg'] },
      ],
    })
  })

  test('keeps tag arrays and compare-at prices', ({ assert }) => {
    const mapped = mapStorefrontProduct(
      {
        title: 'Cap',
        tags: ['wool', ' winter '],
        images: [],
        variants: [{ sku: 'C-1', price: 25, compare_at_price: '30.00', available: true }],
      },
      brand
    )

    assert.deepEqual(mapped.tags, ['wool', 'winter'])
    assert.equal(mapped.variants[0]?.compare_at_price, '30.00')
    assert.equal(mapped.variants[0]?.price, 25)
  })
})
