import { type AppConfig, loadAppConfig } from "./config"
import { type RegisterRoutesFn, registerRoutes } from "./routes/register-routes"
import { type AppServices, createAppServices } from "./services"

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv
  /** Directory searched for `.env` files. */
  cwd?: string
  servicesOverrides?: Partial<AppServices>
}

export type AppContext = {
  config: AppConfig
  services: AppServices
  registerRoutes: RegisterRoutesFn
}

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const config = await loadAppConfig(options.env ?? process.env, options.cwd)

  const services = { ...createAppServices(config), ...options.servicesOverrides }

  return { config, services, registerRoutes }
}
