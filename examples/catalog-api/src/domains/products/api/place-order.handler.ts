import type { FormEnv } from "@flatquery/hono"
import { formResponse } from "@flatquery/hono"
import type { Handler } from "hono"
import type { OrderBook } from "../services/order-book"
import type { ProductCatalog } from "../services/product-catalog"
import { type OrderForm, orderReceipt } from "./products.api.schema"

export type PlaceOrderDeps = {
  catalog: ProductCatalog
  orders: OrderBook
}

/**
 * Takes a form-encoded order and answers with a form-encoded receipt.
 */
export function placeOrderHandler(deps: PlaceOrderDeps): Handler<FormEnv<OrderForm>> {
  return (c) => {
    const form = c.var.form
    const product = deps.catalog.find(form.sku)

    if (!product) return c.notFound()

    const order = deps.orders.place({
      product,
      qty: form.qty,
      ...(form.note !== undefined && { note: form.note }),
    })

    return formResponse(c, orderReceipt, order, 201)
  }
}
