import { type LogLevelName, logLevelNames } from "@flatquery/logger"
import { z } from "zod/mini"

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "catalog-api"),
  SERVER_HOST: z._default(z.string(), "0.0.0.0"),
  SERVER_PORT: z._default(z.coerce.number(), 4663),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),

  REQUEST_ID_HEADER: z._default(z.string(), "x-request-id"),

  QUERY_STRICT: z._default(z.stringbool(), false),
  QUERY_MAX_PAIRS: z._default(z.coerce.number().check(z.positive()), 1000),
  QUERY_PERCENT_DECODE: z._default(z.stringbool(), true),
})

export type EnvConfig = z.infer<typeof envSchema>

export type AppConfig = {
  app: {
    env: string
  }

  server: {
    host: string
    port: number
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  requestId: {
    header: string
  }

  query: {
    strict: boolean
    maxPairs: number
    /** When false, keys and values reach the codec exactly as sent. */
    percentDecode: boolean
  }
}
