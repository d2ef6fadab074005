import type { Order, Product } from "../model/product.model"

export type PlaceOrderInput = {
  product: Product
  qty: number
  note?: string
}

export class OrderBook {
  private readonly orders = new Map<string, Order>()
  private sequence = 0

  place(input: PlaceOrderInput): Order {
    this.sequence++

    const order: Order = {
      orderId: `ord-${this.sequence}`,
      sku: input.product.sku,
      qty: input.qty,
      totalCents: BigInt(input.product.priceCents) * BigInt(input.qty),
      ...(input.note !== undefined && { note: input.note }),
    }

    this.orders.set(order.orderId, order)
    return order
  }

  get(orderId: string): Order | undefined {
    return this.orders.get(orderId)
  }
}
