import { createJsonArrayCodec, type Infer, q } from "@flatquery/codec"
import { z } from "zod/mini"

export const DEFAULT_PAGE = { limit: 10, offset: 0 } as const

/**
 * `GET /products` query, e.g.
 * `?category=lighting&tags=desk&limit=5&offset=0&ids=["LMP-001","LMP-002"]`
 */
export const searchQuery = q.record({
  name: q.optional(q.string()),
  category: q.optional(q.string()),
  tags: q.seq(q.string()),
  ids: q.optional(q.array(createJsonArrayCodec(z.string()))),
  minPrice: q.optional(q.u32()),
  maxPrice: q.optional(q.u32()),
  pagination: q.optional(q.record({ limit: q.u32(), offset: q.u32() })),
})

export type SearchQuery = Infer<typeof searchQuery>

export const orderForm = q.record({
  sku: q.string(),
  qty: q.u16(),
  note: q.optional(q.string()),
})

export type OrderForm = Infer<typeof orderForm>

export const orderReceipt = q.record({
  orderId: q.string(),
  sku: q.string(),
  qty: q.u16(),
  totalCents: q.u64(),
  note: q.optional(q.string()),
})
