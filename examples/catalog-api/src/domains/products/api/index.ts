import { type QueryAdapterOptions, formBody, queryParams } from "@flatquery/hono"
import { Hono } from "hono"
import type { OrderBook } from "../services/order-book"
import type { ProductCatalog } from "../services/product-catalog"
import { placeOrderHandler } from "./place-order.handler"
import { orderForm, searchQuery } from "./products.api.schema"
import { searchProductsHandler } from "./search-products.handler"

type ProductsModuleDeps = {
  catalog: ProductCatalog
  orders: OrderBook
  query: QueryAdapterOptions
}

export function createProductsModule(deps: ProductsModuleDeps) {
  return {
    name: "products",
    register: (api: Hono) => {
      const products = new Hono()
      products.get("/", queryParams(searchQuery, deps.query), searchProductsHandler(deps.catalog))

      const orders = new Hono()
      orders.post("/", formBody(orderForm, deps.query), placeOrderHandler(deps))

      api.route("/products", products)
      api.route("/orders", orders)
    },
  }
}
