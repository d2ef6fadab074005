import type { QueryCodecOptions } from "../ports/codec-options"
import type { QueryCodec } from "../ports/query-codec"
import type { Infer, RecordShape } from "../ports/shape"
import { decodeResolved } from "./decoder/decoder"
import { encodeResolved } from "./encoder/encoder"
import { isQueryError } from "./errors/query-error"
import { resolveCodecOptions } from "./options/resolve-codec-options"
import { assertSupportedShape } from "./shape/assert-supported-shape"

/**
 * Bind a record shape and options into a reusable codec.
 *
 * The shape and the options are validated once, here.
 *
 * @example
 * ```ts
 * const search = createQueryCodec(
 *   q.record({
 *     name: q.string(),
 *     pagination: q.record({ limit: q.u32(), offset: q.u32() }),
 *     tags: q.seq(q.string()),
 *   }),
 * )
 *
 * search.encode({ name: "lamp", pagination: { limit: 10, offset: 0 }, tags: ["a", "b"] })
 * // "name=lamp&limit=10&offset=0&tags=a&tags=b"
 * ```
 */
export function createQueryCodec<S extends RecordShape>(
  shape: S,
  options: QueryCodecOptions = {},
): QueryCodec<Infer<S>> {
  assertSupportedShape(shape)
  const resolved = resolveCodecOptions(options)

  // the record reader builds exactly the fields the shape declares
  const decode = (text: string) => decodeResolved(shape, text, resolved) as Infer<S>

  return {
    encode: (value) => encodeResolved(shape, value, resolved),
    decode,
    safeDecode(text) {
      try {
        return { kind: "ok", value: decode(text) }
      } catch (err) {
        if (isQueryError(err)) return { kind: "error", error: err }
        throw err
      }
    },
  }
}
