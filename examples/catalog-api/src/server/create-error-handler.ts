import { isNonEmptyString } from "@flatquery/hono"
import type { Logger } from "@flatquery/logger"
import type { ErrorHandler } from "hono"
import { HTTPException } from "hono/http-exception"

export type InternalErrorResponse = {
  error: {
    status: 500
    code: "internal_error"
    message: string
    requestId: string
  }
}

/**
 * Last-resort handler: anything that escapes a route (including query shapes
 * the codec cannot handle) is logged with `err` and answered with a 500.
 */
export function createErrorHandler(logger: Logger, requestIdHeader: string): ErrorHandler {
  return (err, c) => {
    if (err instanceof HTTPException) return err.getResponse()

    const header = c.req.header(requestIdHeader)
    const requestId = isNonEmptyString(header) ? header : "unknown"

    logger.error("Request failed", {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: 500,
      err,
    })

    const body: InternalErrorResponse = {
      error: {
        status: 500,
        code: "internal_error",
        message: "An unexpected error occurred",
        requestId,
      },
    }

    return c.json(body, 500)
  }
}
