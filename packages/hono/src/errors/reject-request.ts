import type { QueryError } from "@flatquery/codec"
import type { Context } from "hono"
import type { ResolvedAdapterOptions } from "../adapter-options"
import { isNonEmptyString } from "../utils/is-non-empty-string"
import { formatQueryError, REJECTION_STATUS } from "./errors"

export type RequestSource = "query" | "form"

/**
 * Turns a decoding failure into a 400 response.
 *
 * Logging policy:
 * - operational failures => info without `err`, debug with `err`
 * - non-operational failures (bad shape or options) => error with `err`, then rethrown
 */
export function rejectRequest(
  c: Context,
  err: QueryError,
  source: RequestSource,
  options: ResolvedAdapterOptions,
): Response {
  const header = c.req.header(options.requestIdHeader)
  const requestId = isNonEmptyString(header) ? header : "unknown"

  const base = {
    requestId,
    method: c.req.method,
    path: c.req.path,
    op: `decode ${source}`,
    code: err.code,
  }

  if (!err.isOperational) {
    options.logger.error("Query decoding misconfigured", { ...base, err })
    throw err
  }

  const meta = { ...base, status: REJECTION_STATUS }

  options.logger.info("Request rejected", meta)
  options.logger.debug("Request rejected details", { ...meta, err })

  return c.json(formatQueryError(err, requestId), REJECTION_STATUS)
}
