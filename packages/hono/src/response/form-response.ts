import {
  encodeQuery,
  type Infer,
  percentEncode,
  type QueryCodecOptions,
  type RecordShape,
} from "@flatquery/codec"
import type { Context } from "hono"
import type { ContentfulStatusCode } from "hono/utils/http-status"

export const FORM_CONTENT_TYPE = "application/x-www-form-urlencoded"

/**
 * Responds with `value` encoded as a form body.
 *
 * Keys and values are percent-encoded unless `options.encodeComponent` says
 * otherwise.
 */
export function formResponse<S extends RecordShape>(
  c: Context,
  shape: S,
  value: Infer<S>,
  status: ContentfulStatusCode = 200,
  options: QueryCodecOptions = {},
): Response {
  const body = encodeQuery(shape, value, {
    ...options,
    encodeComponent: options.encodeComponent ?? percentEncode,
  })

  return c.body(body, status, { "content-type": FORM_CONTENT_TYPE })
}
