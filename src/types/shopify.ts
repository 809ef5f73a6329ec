// Remote catalog shapes (admin REST API)

export interface RemoteVariant {
  id: number
  product_id?: number
  sku: string | null
  inventory_item_id: number
  title?: string
}

export interface RemoteProduct {
  id: number
  title: string
  handle?: string
  variants: RemoteVariant[]
}

export interface VariantPayload {
  option1: string
  price: string
  compare_at_price?: string
  sku: string
  inventory_quantity: number
  inventory_management: 'shopify'
  inventory_policy: 'deny'
  barcode?: string | null
  weight?: number | null
  weight_unit?: string | null
  taxable?: boolean | null
}

export interface ProductPayload {
  product: {
    id?: number
    title: string
    body_html: string
    vendor?: string
    product_type?: string
    tags?: string
    handle?: string
    created_at?: string
    updated_at?: string
    published_at?: string
    options: Array<{ name: string }>
    variants: VariantPayload[]
    images: Array<{ src: string }>
  }
}

export interface PublishPayload {
  product: {
    id: number
    published_at: string
  }
}

export interface InventoryLevelPayload {
  location_id: string
  inventory_item_id: number
  available: number
}
