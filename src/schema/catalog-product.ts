/**
 * Local catalog schema: every brand snapshot normalizes into this.
 * This is the single input shape for validation, reconciliation and snapshot files.
 */

export interface LocalVariant {
  sku: string
  variant_title: string
  price: string | number
  available: boolean
  compare_at_price?: string | number | null
  barcode?: string | null
  weight?: number | null
  weight_unit?: string | null
  taxable?: boolean | null
  images: string[]
}

export interface LocalProduct {
  title: string
  body_html?: string
  vendor?: string
  product_type?: string
  tags?: string[]
  handle?: string
  created_at?: string
  updated_at?: string
  published_at?: string
  variants: LocalVariant[]
}

export interface BrandSource {
  slug: string
  name: string
  storeUrl: string
}

/** One brand's products, in snapshot order. Records are unvalidated until the runner checks them. */
export interface BrandBatch {
  brand: string
  products: unknown[]
}

export type SyncResult =
  | { status: 'created'; title: string; productId: number }
  | { status: 'updated'; title: string; productId: number }
  | { status: 'inventory-only-updated'; title: string; productId: number }
  | { status: 'skipped'; title: string; reason: SkipReason; detail?: string }
  | { status: 'failed'; title: string; reason: string }

export type SkipReason =
  | 'invalid-product'
  | 'no-available-variant'
  | 'new-variant-requires-manual-merge'
  | 'ambiguous-sku'
