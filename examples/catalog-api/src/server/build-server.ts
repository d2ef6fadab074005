import { Hono } from "hono"
import type { AppContext } from "../app/create-context"
import { createErrorHandler } from "./create-error-handler"

export function buildApp(ctx: AppContext): Hono {
  const app = new Hono()

  app.onError(createErrorHandler(ctx.services.logger, ctx.config.requestId.header))
  ctx.registerRoutes(app, ctx.config, ctx.services)

  return app
}
