import type { ArrayCodec } from "../../ports/array-codec"
import type { QueryCodecOptions, ResolvedCodecOptions } from "../../ports/codec-options"
import type { Infer, RecordShape, Shape } from "../../ports/shape"
import { isQueryError, QueryError } from "../errors/query-error"
import { resolveCodecOptions } from "../options/resolve-codec-options"
import { encodeScalar } from "../scalar/scalar-codec"
import { assertSupportedShape } from "../shape/assert-supported-shape"
import { FlatTextWriter } from "./flat-text-writer"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v)
}

function invalidValue(message: string, key: string, path: readonly string[]): QueryError {
  return new QueryError(message, {
    code: "invalid_value",
    context: { key, field: path.join(".") },
  })
}

function encodeArray(codec: ArrayCodec<unknown>, items: readonly unknown[], key: string): string {
  try {
    return codec.encode(items)
  } catch (err) {
    if (isQueryError(err)) throw err

    throw new QueryError("invalid array value", {
      code: "array_codec_failed",
      cause: err,
      context: { key },
    })
  }
}

function writeRecord(
  writer: FlatTextWriter,
  shape: RecordShape,
  value: unknown,
  path: readonly string[],
): void {
  if (!isRecord(value)) {
    throw invalidValue("expected a record", path.at(-1) ?? "", path)
  }

  for (const [name, field] of Object.entries(shape.fields)) {
    // own properties only: `constructor` and friends are inherited, not present
    const fieldValue = Object.hasOwn(value, name) ? value[name] : undefined
    writeField(writer, name, field, fieldValue, [...path, name])
  }
}

function writeField(
  writer: FlatTextWriter,
  key: string,
  shape: Shape,
  value: unknown,
  path: readonly string[],
): void {
  const context = { key, field: path.join(".") }

  switch (shape.kind) {
    case "scalar":
      if (value === undefined || value === null) {
        throw invalidValue("missing value for required field", key, path)
      }
      writer.write(key, encodeScalar(shape.scalar, value, context))
      return

    case "optional":
      // absent: the key is never written
      if (value === undefined || value === null) return
      writeField(writer, key, shape.inner, value, path)
      return

    case "sequence": {
      const element = shape.element
      if (element.kind !== "scalar") {
        throw new QueryError(`unsupported shape: sequence of ${element.kind}`, {
          code: "unsupported_shape",
          context,
        })
      }
      if (!Array.isArray(value)) throw invalidValue("expected a sequence", key, path)

      for (const item of value) {
        writer.write(key, encodeScalar(element.scalar, item, context))
      }
      return
    }

    case "array":
      if (!Array.isArray(value)) throw invalidValue("expected an array", key, path)
      writer.write(key, encodeArray(shape.codec, value, key))
      return

    case "record":
      writeRecord(writer, shape, value, path)
      return
  }
}

/**
 * Encode with options that are already resolved and a shape that is already
 * known to be supported.
 */
export function encodeResolved(
  shape: RecordShape,
  value: unknown,
  options: ResolvedCodecOptions,
): string {
  const writer = new FlatTextWriter(options.encodeComponent)

  writeRecord(writer, shape, value, [])

  options.logger.trace("Encoded query", { op: "encode", pairs: writer.pairs })

  return writer.toString()
}

/**
 * Encode a record value as FlatText.
 *
 * Fields are written in declared order. Absent optionals and empty sequences
 * produce no key; sequences repeat their key per element; nested records
 * share the top-level namespace.
 *
 * @example
 * ```ts
 * encodeQuery(q.record({ ids: q.seq(q.i32()) }), { ids: [1, 2, 3] })
 * // "ids=1&ids=2&ids=3"
 * ```
 *
 * @throws QueryError with code `invalid_value`, `array_codec_failed`,
 * `unsupported_shape` or `invalid_options`
 */
export function encodeQuery<S extends RecordShape>(
  shape: S,
  value: Infer<S>,
  options: QueryCodecOptions = {},
): string {
  assertSupportedShape(shape)

  return encodeResolved(shape, value, resolveCodecOptions(options))
}
