import type { RecordShape, ScalarKind, Shape } from "../../ports/shape"
import { QueryError } from "../errors/query-error"

const SCALAR_KINDS: ReadonlySet<string> = new Set<ScalarKind>([
  "bool",
  "i8",
  "i16",
  "i32",
  "i64",
  "i128",
  "u8",
  "u16",
  "u32",
  "u64",
  "u128",
  "f32",
  "f64",
  "char",
  "string",
  "bytes",
])

// array-index names are enumerated before all others, whatever their declared position
const INDEX_LIKE_NAME = /^(?:0|[1-9]\d*)$/
const MAX_INDEX = 2 ** 32 - 2

function isIndexLikeName(name: string): boolean {
  return INDEX_LIKE_NAME.test(name) && Number(name) <= MAX_INDEX
}

function unsupported(message: string, path: readonly string[]): QueryError {
  return new QueryError(`unsupported shape: ${message}`, {
    code: "unsupported_shape",
    context: { field: path.join(".") },
  })
}

function check(shape: Shape, path: readonly string[]): void {
  switch (shape.kind) {
    case "scalar":
      if (!SCALAR_KINDS.has(shape.scalar)) {
        throw unsupported(`unknown scalar kind "${String(shape.scalar)}"`, path)
      }
      return

    case "optional":
      if (shape.inner.kind === "optional") {
        throw unsupported("optional of optional has no flat representation", path)
      }
      check(shape.inner, path)
      return

    case "sequence":
      if (shape.element.kind !== "scalar") {
        throw unsupported(`sequence of ${shape.element.kind} has no flat representation`, path)
      }
      check(shape.element, path)
      return

    case "array":
      return

    case "record":
      for (const [name, field] of Object.entries(shape.fields)) {
        if (isIndexLikeName(name)) {
          throw unsupported(
            `field name "${name}" cannot keep its declared position`,
            [...path, name],
          )
        }
        check(field, [...path, name])
      }
      return

    default:
      throw unsupported(`unknown shape kind "${describeKind(shape)}"`, path)
  }
}

function describeKind(shape: unknown): string {
  if (typeof shape === "object" && shape !== null && "kind" in shape) {
    return String(shape.kind)
  }
  return typeof shape
}

/**
 * Rejects shapes the flat wire format cannot express, before any value is read.
 *
 * @throws QueryError with code `unsupported_shape`
 */
export function assertSupportedShape(shape: Shape): asserts shape is RecordShape {
  if (shape.kind !== "record") {
    throw unsupported(`top-level shape must be a record, got ${shape.kind}`, [])
  }

  check(shape, [])
}
