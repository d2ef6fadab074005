import type { ArrayCodec } from "../../ports/array-codec"
import type { QueryCodecOptions, ResolvedCodecOptions } from "../../ports/codec-options"
import type { DecodeResult } from "../../ports/query-codec"
import type { Infer, RecordShape, Shape } from "../../ports/shape"
import { isQueryError, QueryError } from "../errors/query-error"
import { FieldMap } from "../field-map/field-map"
import { resolveCodecOptions } from "../options/resolve-codec-options"
import { decodeScalar } from "../scalar/scalar-codec"
import { assertSupportedShape } from "../shape/assert-supported-shape"

function noValue(key: string, path: readonly string[]): QueryError {
  return new QueryError("no value", {
    code: "no_value",
    context: { key, field: path.join(".") },
  })
}

/**
 * Whether any key `shape` would read at `key` still holds a value.
 * For records this looks at every nested field name.
 */
function isPresent(map: FieldMap, key: string, shape: Shape): boolean {
  switch (shape.kind) {
    case "optional":
      return isPresent(map, key, shape.inner)

    case "record":
      return Object.entries(shape.fields).some(([name, field]) => isPresent(map, name, field))

    default:
      return map.has(key)
  }
}

function decodeArray(codec: ArrayCodec<unknown>, text: string, key: string): unknown[] {
  try {
    return codec.decode(text)
  } catch (err) {
    if (isQueryError(err)) throw err

    throw new QueryError("invalid array value", {
      code: "array_codec_failed",
      cause: err,
      context: { key },
    })
  }
}

function readRecord(
  map: FieldMap,
  shape: RecordShape,
  path: readonly string[],
): Record<string, unknown> {
  const out: Record<string, unknown> = {}

  for (const [name, field] of Object.entries(shape.fields)) {
    const value = readField(map, name, field, [...path, name])
    if (value !== undefined) out[name] = value
  }

  return out
}

function readField(map: FieldMap, key: string, shape: Shape, path: readonly string[]): unknown {
  const context = { key, field: path.join(".") }

  switch (shape.kind) {
    case "scalar": {
      const text = map.take(key)
      if (text === undefined) throw noValue(key, path)

      return decodeScalar(shape.scalar, text, context)
    }

    case "optional": {
      const inner = shape.inner

      // an empty array document counts as absent for optional fields
      if (inner.kind === "array" && map.peek(key) === "") {
        map.take(key)
        return undefined
      }

      return isPresent(map, key, inner) ? readField(map, key, inner, path) : undefined
    }

    case "sequence": {
      const element = shape.element
      if (element.kind !== "scalar") {
        throw new QueryError(`unsupported shape: sequence of ${element.kind}`, {
          code: "unsupported_shape",
          context,
        })
      }

      return map.takeAll(key).map((text) => decodeScalar(element.scalar, text, context))
    }

    case "array": {
      const text = map.take(key)
      if (text === undefined || text === "") throw noValue(key, path)

      return decodeArray(shape.codec, text, key)
    }

    case "record":
      return readRecord(map, shape, path)
  }
}

/**
 * Decode with options that are already resolved and a shape that is already
 * known to be supported.
 */
export function decodeResolved(
  shape: RecordShape,
  text: string,
  options: ResolvedCodecOptions,
): Record<string, unknown> {
  const map = FieldMap.parse(text, options)

  options.logger.trace("Decoding query", { op: "decode", keys: map.size, pairs: map.remaining })

  const value = readRecord(map, shape, [])
  const leftover = map.keys()

  if (leftover.length > 0) {
    if (options.strict) {
      throw new QueryError("unexpected field", {
        code: "unknown_field",
        context: { keys: leftover },
      })
    }

    options.logger.debug("Ignoring unknown query keys", { op: "decode", keys: leftover })
  }

  return value
}

/**
 * Decode FlatText into a value of a record shape.
 *
 * Keys are looked up by name, so pair order does not matter. Nested records
 * read from the same key space as their parent.
 *
 * @example
 * ```ts
 * const shape = q.record({ name: q.string(), ids: q.seq(q.i32()) })
 * decodeQuery(shape, "ids=1&name=test&ids=2") // { name: "test", ids: [1, 2] }
 * ```
 *
 * @throws QueryError with code `invalid_pair`, `no_value`, `invalid_literal`,
 * `array_codec_failed`, `too_many_pairs`, `unknown_field`, `invalid_encoding`,
 * `unsupported_shape` or `invalid_options`
 */
export function decodeQuery<S extends RecordShape>(
  shape: S,
  text: string,
  options: QueryCodecOptions = {},
): Infer<S> {
  assertSupportedShape(shape)

  // the record reader builds exactly the fields the shape declares
  return decodeResolved(shape, text, resolveCodecOptions(options)) as Infer<S>
}

/**
 * Like `decodeQuery`, but reports decoding failures as a result value.
 * Errors that are not `QueryError`s still propagate.
 */
export function safeDecodeQuery<S extends RecordShape>(
  shape: S,
  text: string,
  options: QueryCodecOptions = {},
): DecodeResult<Infer<S>> {
  try {
    return { kind: "ok", value: decodeQuery(shape, text, options) }
  } catch (err) {
    if (isQueryError(err)) return { kind: "error", error: err }
    throw err
  }
}
