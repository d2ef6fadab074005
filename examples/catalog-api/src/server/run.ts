import { type ServerType, serve } from "@hono/node-server"
import { type AppContextOptions, createAppContext } from "../app/create-context"
import { buildApp } from "./build-server"

export async function run(options: AppContextOptions = {}): Promise<ServerType> {
  const ctx = await createAppContext(options)
  const app = buildApp(ctx)
  const logger = ctx.services.logger

  const server = serve(
    { fetch: app.fetch, hostname: ctx.config.server.host, port: ctx.config.server.port },
    (info) => logger.info("Server started", { host: info.address, port: info.port }),
  )

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info("Shutting down", { signal })
    server.close((err) => {
      if (err) logger.error("Shutdown failed", { err })
      process.exit(err ? 1 : 0)
    })
  }

  process.once("SIGINT", shutdown)
  process.once("SIGTERM", shutdown)

  return server
}
