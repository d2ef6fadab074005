import type { ErrorContext } from "../../ports/error"
import type { ScalarKind, ScalarValueMap } from "../../ports/shape"
import { QueryError } from "../errors/query-error"
import { decodeBase64, encodeBase64 } from "./base64"

type IntegerKind = "i8" | "i16" | "i32" | "i64" | "i128" | "u8" | "u16" | "u32" | "u64" | "u128"
type NumberIntegerKind = "i8" | "i16" | "i32" | "u8" | "u16" | "u32"
type BigIntegerKind = Exclude<IntegerKind, NumberIntegerKind>

type Bounds = Readonly<{ min: bigint; max: bigint }>

const INTEGER_BOUNDS: Readonly<Record<IntegerKind, Bounds>> = {
  i8: { min: -(2n ** 7n), max: 2n ** 7n - 1n },
  i16: { min: -(2n ** 15n), max: 2n ** 15n - 1n },
  i32: { min: -(2n ** 31n), max: 2n ** 31n - 1n },
  i64: { min: -(2n ** 63n), max: 2n ** 63n - 1n },
  i128: { min: -(2n ** 127n), max: 2n ** 127n - 1n },
  u8: { min: 0n, max: 2n ** 8n - 1n },
  u16: { min: 0n, max: 2n ** 16n - 1n },
  u32: { min: 0n, max: 2n ** 32n - 1n },
  u64: { min: 0n, max: 2n ** 64n - 1n },
  u128: { min: 0n, max: 2n ** 128n - 1n },
}

const SIGNED_INTEGER = /^[+-]?\d+$/
const UNSIGNED_INTEGER = /^\+?\d+$/
const FLOAT_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/
const FLOAT_SPECIAL = /^([+-]?)(inf|infinity|nan)$/i

// Decoders only throw native parse failures; decodeScalar wraps them.

function parseInteger(kind: IntegerKind, text: string): bigint {
  if (text === "") {
    throw new SyntaxError("cannot parse integer from empty string")
  }

  const bounds = INTEGER_BOUNDS[kind]
  const pattern = bounds.min === 0n ? UNSIGNED_INTEGER : SIGNED_INTEGER

  if (!pattern.test(text)) {
    throw new SyntaxError("invalid digit found in string")
  }

  const value = BigInt(text.startsWith("+") ? text.slice(1) : text)

  if (value > bounds.max) throw new RangeError("number too large to fit in target type")
  if (value < bounds.min) throw new RangeError("number too small to fit in target type")

  return value
}

function parseFloatLiteral(text: string): number {
  const special = FLOAT_SPECIAL.exec(text)

  if (special) {
    if (special[2]?.toLowerCase() === "nan") return Number.NaN
    return special[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY
  }

  if (!FLOAT_LITERAL.test(text)) {
    throw new SyntaxError("invalid float literal")
  }

  return Number(text)
}

function parseBool(text: string): boolean {
  if (text === "true") return true
  if (text === "false") return false

  throw new SyntaxError("provided string was not `true` or `false`")
}

function parseChar(text: string): string {
  const codePoints = [...text]

  if (codePoints.length === 0) throw new SyntaxError("cannot parse char from empty string")
  if (codePoints.length > 1) throw new SyntaxError("too many characters in string")

  return text
}

const decoders: { readonly [K in ScalarKind]: (text: string) => ScalarValueMap[K] } = {
  bool: parseBool,
  i8: (text) => Number(parseInteger("i8", text)),
  i16: (text) => Number(parseInteger("i16", text)),
  i32: (text) => Number(parseInteger("i32", text)),
  u8: (text) => Number(parseInteger("u8", text)),
  u16: (text) => Number(parseInteger("u16", text)),
  u32: (text) => Number(parseInteger("u32", text)),
  i64: (text) => parseInteger("i64", text),
  u64: (text) => parseInteger("u64", text),
  i128: (text) => parseInteger("i128", text),
  u128: (text) => parseInteger("u128", text),
  f32: (text) => Math.fround(parseFloatLiteral(text)),
  f64: parseFloatLiteral,
  char: parseChar,
  string: (text) => text,
  bytes: decodeBase64,
}

/**
 * Parse `text` into exactly the requested scalar kind.
 *
 * No widening or narrowing happens: `"40000"` fails for `i16` even though it
 * fits `i32`.
 *
 * @throws QueryError with code `invalid_literal`; its `cause` is the native
 * `SyntaxError` or `RangeError` describing the parse failure.
 */
export function decodeScalar<K extends ScalarKind>(
  kind: K,
  text: string,
  context: ErrorContext = {},
): ScalarValueMap[K] {
  const decode = decoders[kind]

  try {
    return decode(text)
  } catch (err) {
    throw new QueryError(`invalid ${kind} literal`, {
      code: "invalid_literal",
      cause: err,
      context: { ...context, kind, literal: text },
    })
  }
}

/** Expands exponent notation (`1e+21`, `1.5e-7`) into plain decimal digits. */
function toPlainDecimal(text: string): string {
  const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text)
  if (!match) return text

  const [, sign = "", whole = "", fraction = "", exponent = "0"] = match
  const digits = whole + fraction
  const point = whole.length + Number(exponent)

  if (point <= 0) return `${sign}0.${"0".repeat(-point)}${digits}`
  if (point >= digits.length) return `${sign}${digits}${"0".repeat(point - digits.length)}`
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`
}

function formatFloat(value: number, kind: "f32" | "f64"): string {
  if (Number.isNaN(value)) return "NaN"
  if (value === Number.POSITIVE_INFINITY) return "inf"
  if (value === Number.NEGATIVE_INFINITY) return "-inf"
  if (Object.is(value, -0)) return "-0"

  if (kind === "f32") {
    // shortest text that rounds back to the same f32
    const single = Math.fround(value)
    for (let digits = 1; digits <= 9; digits++) {
      const candidate = Number(single.toPrecision(digits))
      if (Math.fround(candidate) === single) return toPlainDecimal(String(candidate))
    }
  }

  return toPlainDecimal(String(value))
}

function invalidValue(kind: ScalarKind, value: unknown, context: ErrorContext): QueryError {
  return new QueryError(`invalid ${kind} value`, {
    code: "invalid_value",
    context: { ...context, kind, received: describe(value) },
  })
}

function describe(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  if (value instanceof Uint8Array) return "bytes"
  return typeof value
}

function isNumberIntegerKind(kind: ScalarKind): kind is NumberIntegerKind {
  return (
    kind === "i8" ||
    kind === "i16" ||
    kind === "i32" ||
    kind === "u8" ||
    kind === "u16" ||
    kind === "u32"
  )
}

function isBigIntegerKind(kind: ScalarKind): kind is BigIntegerKind {
  return kind === "i64" || kind === "u64" || kind === "i128" || kind === "u128"
}

function fits(kind: IntegerKind, value: bigint): boolean {
  const bounds = INTEGER_BOUNDS[kind]
  return value >= bounds.min && value <= bounds.max
}

/**
 * Render a scalar in its canonical text form.
 *
 * - integers and floats: plain decimal, never exponent notation (`-0` keeps its
 *   sign; `NaN`, `inf`, `-inf` for non-finite floats)
 * - booleans: `true` / `false`
 * - chars and strings: verbatim
 * - bytes: padded base64
 *
 * @throws QueryError with code `invalid_value` when the runtime value does not
 * match `kind` (wrong type, out of range, fractional integer, multi-char char).
 */
export function encodeScalar(kind: ScalarKind, value: unknown, context: ErrorContext = {}): string {
  if (isNumberIntegerKind(kind)) {
    if (typeof value !== "number" || !Number.isInteger(value) || !fits(kind, BigInt(value))) {
      throw invalidValue(kind, value, context)
    }
    return String(value)
  }

  if (isBigIntegerKind(kind)) {
    if (typeof value !== "bigint" || !fits(kind, value)) {
      throw invalidValue(kind, value, context)
    }
    return value.toString()
  }

  switch (kind) {
    case "bool":
      if (typeof value !== "boolean") throw invalidValue(kind, value, context)
      return value ? "true" : "false"

    case "f32":
    case "f64":
      if (typeof value !== "number") throw invalidValue(kind, value, context)
      return formatFloat(value, kind)

    case "char":
      if (typeof value !== "string" || [...value].length !== 1) {
        throw invalidValue(kind, value, context)
      }
      return value

    case "string":
      if (typeof value !== "string") throw invalidValue(kind, value, context)
      return value

    case "bytes":
      if (!(value instanceof Uint8Array)) throw invalidValue(kind, value, context)
      return encodeBase64(value)

    default:
      throw invalidValue(kind, value, context)
  }
}
