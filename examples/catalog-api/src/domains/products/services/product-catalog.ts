import fs from "node:fs"
import { z } from "zod/mini"
import { Product, type ProductPage, type SearchCriteria } from "../model/product.model"

const PRODUCTS_FILE = new URL("../data/products.json", import.meta.url)

export function loadProducts(file: URL = PRODUCTS_FILE): Product[] {
  return z.array(Product).parse(JSON.parse(fs.readFileSync(file, "utf-8")))
}

function matches(product: Product, criteria: SearchCriteria): boolean {
  if (criteria.name && !product.name.toLowerCase().includes(criteria.name.toLowerCase())) {
    return false
  }
  if (criteria.category && product.category !== criteria.category) return false
  if (!criteria.tags.every((tag) => product.tags.includes(tag))) return false
  if (criteria.skus && !criteria.skus.includes(product.sku)) return false
  if (criteria.minPriceCents !== undefined && product.priceCents < criteria.minPriceCents) {
    return false
  }
  if (criteria.maxPriceCents !== undefined && product.priceCents > criteria.maxPriceCents) {
    return false
  }
  return true
}

/**
 * Read-only, in-memory product list. Results keep the list's order.
 */
export class ProductCatalog {
  constructor(private readonly products: readonly Product[]) {}

  find(sku: string): Product | undefined {
    return this.products.find((p) => p.sku === sku)
  }

  search(criteria: SearchCriteria): ProductPage {
    const hits = this.products.filter((p) => matches(p, criteria))

    return {
      items: hits.slice(criteria.offset, criteria.offset + criteria.limit),
      total: hits.length,
      limit: criteria.limit,
      offset: criteria.offset,
    }
  }
}
