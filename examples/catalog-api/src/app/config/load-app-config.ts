import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { z } from "zod/mini"
import { type AppConfig, type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    server: {
      host: env.SERVER_HOST,
      port: env.SERVER_PORT,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    requestId: {
      header: env.REQUEST_ID_HEADER,
    },
    query: {
      strict: env.QUERY_STRICT,
      maxPairs: env.QUERY_MAX_PAIRS,
      percentDecode: env.QUERY_PERCENT_DECODE,
    },
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

async function readDotenv(file: string): Promise<Record<string, string>> {
  try {
    return parse(await fs.readFile(file, "utf-8"))
  } catch (err) {
    if (isMissingFile(err)) return {}
    throw err
  }
}

/**
 * Loads `.env.<NODE_ENV>` (or `.env`) from `cwd` when present, lets `env`
 * override it, and validates the result.
 */
export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const file = env.NODE_ENV ? `.env.${env.NODE_ENV}` : ".env"
  const fromFile = await readDotenv(path.resolve(cwd, file))

  const merged: Record<string, string> = { ...fromFile }

  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) merged[key] = value
  }

  const result = envSchema.safeParse(merged)

  if (!result.success) {
    throw new Error(`Configuration validation failed:\n${z.prettifyError(result.error)}`)
  }

  return mapEnvToConfig(result.data)
}
