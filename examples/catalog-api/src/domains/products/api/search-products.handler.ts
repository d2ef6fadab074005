import type { QueryEnv } from "@flatquery/hono"
import type { Handler } from "hono"
import type { ProductPage, SearchCriteria } from "../model/product.model"
import type { ProductCatalog } from "../services/product-catalog"
import { DEFAULT_PAGE, type SearchQuery } from "./products.api.schema"

export function toSearchCriteria(query: SearchQuery): SearchCriteria {
  const page = query.pagination ?? DEFAULT_PAGE

  return {
    tags: query.tags,
    limit: page.limit,
    offset: page.offset,
    ...(query.name !== undefined && { name: query.name }),
    ...(query.category !== undefined && { category: query.category }),
    ...(query.ids !== undefined && { skus: query.ids }),
    ...(query.minPrice !== undefined && { minPriceCents: query.minPrice }),
    ...(query.maxPrice !== undefined && { maxPriceCents: query.maxPrice }),
  }
}

export function searchProductsHandler(catalog: ProductCatalog): Handler<QueryEnv<SearchQuery>> {
  return (c) => c.json<ProductPage>(catalog.search(toSearchCriteria(c.var.query)))
}
