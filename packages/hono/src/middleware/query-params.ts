import { createQueryCodec, type Infer, type RecordShape } from "@flatquery/codec"
import { createMiddleware } from "hono/factory"
import { type QueryAdapterOptions, resolveAdapterOptions } from "../adapter-options"
import { rejectRequest } from "../errors/reject-request"
import { rawQuery } from "../utils/raw-query"

export type QueryEnv<T> = {
  Variables: {
    query: T
  }
}

/**
 * Decodes the request's query string into `c.var.query`.
 *
 * The shape and options are checked when the middleware is created; a request
 * whose query does not decode is answered with 400 and never reaches `next`.
 *
 * @example
 * ```ts
 * app.get("/products", queryParams(search), (c) => c.json(c.var.query.name))
 * ```
 */
export function queryParams<S extends RecordShape>(shape: S, options: QueryAdapterOptions = {}) {
  const resolved = resolveAdapterOptions(options)
  const codec = createQueryCodec(shape, resolved.codec)

  return createMiddleware<QueryEnv<Infer<S>>>(async (c, next) => {
    const result = codec.safeDecode(rawQuery(c.req.url))

    if (result.kind === "error") {
      return rejectRequest(c, result.error, "query", resolved)
    }

    c.set("query", result.value)
    await next()
  })
}
