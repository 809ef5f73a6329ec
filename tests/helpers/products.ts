import type { LocalProduct, LocalVariant } from '../../src/schema/catalog-product.js'
import type { RemoteProduct } from '../../src/types/shopify.js'

export function localVariant(sku: string, overrides: Partial<LocalVariant> = {}): LocalVariant {
  return {
    sku,
    variant_title: 'M',
    price: '19.00',
    available: true,
    images: [`https://cdn.test/${sku}.jpg`],
    ...overrides,
  }
}

export function localProduct(title: string, variants: LocalVariant[], overrides: Partial<LocalProduct> = {}): LocalProduct {
  return {
    title,
    body_html: '<p>Heavyweight cotton</p>',
    vendor: 'North Studio',
    product_type: 'T-Shirt',
    tags: ['summer', 'basics'],
    handle: title.toLowerCase().replace(/\s+/g, '-'),
    variants,
    ...overrides,
  }
}

/** Remote product whose variant ids and inventory item ids derive from the product id */
export function remoteProduct(id: number, skus: Array<string | null>): RemoteProduct {
  return {
    id,
    title: `Remote ${id}`,
    variants: skus.map((sku, i) => ({
      id: id * 10 + i,
      product_id: id,
      sku,
      inventory_item_id: id * 100 + i,
    })),
  }
}
