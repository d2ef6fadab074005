import type { QueryAdapterOptions } from "@flatquery/hono"
import type { Hono } from "hono"
import { createProductsModule } from "../../domains/products"
import type { AppConfig } from "../config"
import type { AppServices } from "../services"

export type ApiModule = {
  name: string
  register: (app: Hono) => void
}

export function queryOptions(config: AppConfig, services: AppServices): QueryAdapterOptions {
  return {
    logger: services.logger.child({ module: "query" }),
    strict: config.query.strict,
    maxPairs: config.query.maxPairs,
    requestIdHeader: config.requestId.header,
    ...(!config.query.percentDecode && { decodeComponent: (raw: string) => raw }),
  }
}

export function registerRoutes(app: Hono, config: AppConfig, services: AppServices): void {
  app.get("/", (c) => c.text(`Welcome to ${config.logging.serviceName} API`))

  const modules: ApiModule[] = [
    createProductsModule({
      catalog: services.catalog,
      orders: services.orders,
      query: queryOptions(config, services),
    }),
  ]

  for (const m of modules) {
    m.register(app)
  }
}

export type RegisterRoutesFn = typeof registerRoutes
