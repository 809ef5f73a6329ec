/**
 * Product validation: rejects malformed or policy-excluded snapshot records
 * before anything reaches the network.
 */

import { z } from 'zod'
import type { Logger } from '../core/clock.js'
import type { LocalProduct } from '../schema/catalog-product.js'

// Snapshot files may carry null for any optional field; null reads as absent.
const optionalText = z.string().nullish().transform(v => v ?? undefined)

const VariantSchema = z.object({
  sku: z.string({ required_error: 'missing sku' }).trim().min(1, 'missing sku'),
  variant_title: z.string().nullish().transform(v => v ?? ''),
  price: z.union([z.string().trim().min(1, 'missing price'), z.number()]),
  available: z.boolean({ invalid_type_error: 'available must be boolean', required_error: 'missing available' }),
  compare_at_price: z.union([z.string(), z.number()]).nullish(),
  barcode: z.string().nullish(),
  weight: z.number().nullish(),
  weight_unit: z.string().nullish(),
  taxable: z.boolean().nullish(),
  images: z.array(z.string()).nullish().transform(v => v ?? []),
})

const ProductSchema = z.object({
  title: z.string({ required_error: 'missing title' }).trim().min(1, 'missing title'),
  body_html: optionalText,
  vendor: optionalText,
  product_type: optionalText,
  tags: z.array(z.string()).nullish().transform(v => v ?? undefined),
  handle: optionalText,
  created_at: optionalText,
  updated_at: optionalText,
  published_at: optionalText,
  variants: z.array(VariantSchema, { required_error: 'no variants' }).min(1, 'no variants'),
})

export interface ValidationPolicy {
  excludedVendors: string[]
  requireImages: boolean
}

export type ValidationResult =
  | { ok: true; product: LocalProduct }
  | { ok: false; title: string; reason: string }

function titleOf(raw: unknown): string {
  if (raw && typeof raw === 'object' && 'title' in raw && typeof raw.title === 'string' && raw.title.trim()) {
    return raw.title
  }
  return 'Unknown'
}

export function validateProduct(
  raw: unknown,
  policy: ValidationPolicy = { excludedVendors: [], requireImages: false }
): ValidationResult {
  const title = titleOf(raw)
  const parsed = ProductSchema.safeParse(raw)

  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue?.path.length ? ` at ${issue.path.join('.')}` : ''
    return { ok: false, title, reason: `${issue?.message ?? 'invalid product'}${where}` }
  }

  const product: LocalProduct = parsed.data
  const excluded = new Set(policy.excludedVendors.map(v => v.trim().toLowerCase()))
  if (product.vendor && excluded.has(product.vendor.trim().toLowerCase())) {
    return { ok: false, title, reason: `excluded vendor "${product.vendor}"` }
  }

  if (policy.requireImages && !product.variants.some(v => v.images.length > 0)) {
    return { ok: false, title, reason: 'no variant has an image' }
  }

  return { ok: true, product }
}

/** Predicate form; rejections are reported to the logger */
export function isValidProduct(raw: unknown, policy?: ValidationPolicy, logger: Logger = console): boolean {
  const result = validateProduct(raw, policy)
  if (!result.ok) logger.warn(`[validate] Skipping "${result.title}": ${result.reason}`)
  return result.ok
}
