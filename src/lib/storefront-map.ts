/**
 * Storefront mapping: products.json items → LocalProduct[].
 *
 * Field mapping:
 *   variant.title → variant_title
 *   variant.grams → weight (g)
 *   product.images[].src → images on every variant
 *   vendor → falls back to the brand name
 */

import type { BrandSource, LocalProduct, LocalVariant } from '../schema/catalog-product.js'
import type { StorefrontProduct, StorefrontVariant } from '../platforms/shopify-storefront.js'

function splitTags(tags: StorefrontProduct['tags']): string[] {
  if (!tags) return []
  const list = Array.isArray(tags) ? tags : tags.split(',')
  return list.map(t => t.trim()).filter(Boolean)
}

function mapVariant(variant: StorefrontVariant, images: string[]): LocalVariant {
  const mapped: LocalVariant = {
    sku: variant.sku?.trim() ?? '',
    variant_title: variant.title ?? '',
    price: variant.price ?? '',
    available: variant.available ?? false,
    images,
  }
  if (variant.compare_at_price != null && variant.compare_at_price !== '') {
    mapped.compare_at_price = variant.compare_at_price
  }
  if (variant.barcode) mapped.barcode = variant.barcode
  if (variant.taxable !== undefined) mapped.taxable = variant.taxable
  if (variant.grams != null && variant.grams > 0) {
    mapped.weight = variant.grams
    mapped.weight_unit = 'g'
  }
  return mapped
}

export function mapStorefrontProduct(item: StorefrontProduct, brand: BrandSource): LocalProduct {
  const images = item.images.map(img => img.src).filter(Boolean)
  const product: LocalProduct = {
    title: item.title?.trim() ?? '',
    body_html: item.body_html ?? '',
    vendor: item.vendor?.trim() || brand.name,
    product_type: item.product_type ?? '',
    tags: splitTags(item.tags),
    handle: item.handle ?? '',
    variants: item.variants.map(v => mapVariant(v, images)),
  }
  if (item.created_at) product.created_at = item.created_at
  if (item.updated_at) product.updated_at = item.updated_at
  if (item.published_at) product.published_at = item.published_at
  return product
}

export function mapStorefrontProducts(items: StorefrontProduct[], brand: BrandSource): LocalProduct[] {
  return items.map(item => mapStorefrontProduct(item, brand))
}
