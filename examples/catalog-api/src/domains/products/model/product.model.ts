import { z } from "zod/mini"

export const Product = z.object({
  sku: z.string(),
  name: z.string(),
  category: z.string(),
  tags: z.array(z.string()),
  priceCents: z.int().check(z.nonnegative()),
})

export type Product = z.infer<typeof Product>

export type SearchCriteria = {
  name?: string
  category?: string
  tags: string[]
  skus?: string[]
  minPriceCents?: number
  maxPriceCents?: number
  limit: number
  offset: number
}

export type ProductPage = {
  items: Product[]
  total: number
  limit: number
  offset: number
}

export type Order = {
  orderId: string
  sku: string
  qty: number
  totalCents: bigint
  note?: string
}
