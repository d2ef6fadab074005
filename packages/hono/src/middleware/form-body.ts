import { createQueryCodec, type Infer, type RecordShape } from "@flatquery/codec"
import { createMiddleware } from "hono/factory"
import { type QueryAdapterOptions, resolveAdapterOptions } from "../adapter-options"
import { rejectRequest } from "../errors/reject-request"

export type FormEnv<T> = {
  Variables: {
    form: T
  }
}

/**
 * Decodes an `application/x-www-form-urlencoded` request body into `c.var.form`.
 *
 * The body is read as text; the content-type header is not checked.
 */
export function formBody<S extends RecordShape>(shape: S, options: QueryAdapterOptions = {}) {
  const resolved = resolveAdapterOptions(options)
  const codec = createQueryCodec(shape, resolved.codec)

  return createMiddleware<FormEnv<Infer<S>>>(async (c, next) => {
    const result = codec.safeDecode(await c.req.text())

    if (result.kind === "error") {
      return rejectRequest(c, result.error, "form", resolved)
    }

    c.set("form", result.value)
    await next()
  })
}
