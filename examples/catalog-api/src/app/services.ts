import { createPinoLogger, type Logger } from "@flatquery/logger"
import { loadProducts, OrderBook, ProductCatalog } from "../domains/products"
import type { AppConfig } from "./config"

export type AppServices = {
  logger: Logger
  catalog: ProductCatalog
  orders: OrderBook
}

export function createAppServices(config: AppConfig): AppServices {
  const logger = createPinoLogger(
    {
      level: config.logging.level,
      prettify: config.logging.prettify,
    },
    { service: config.logging.serviceName, env: config.app.env },
  )

  return {
    logger,
    catalog: new ProductCatalog(loadProducts()),
    orders: new OrderBook(),
  }
}
