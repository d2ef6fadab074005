import type { ArrayCodec } from "../../ports/array-codec"
import type {
  ArrayShape,
  Fields,
  OptionalShape,
  RecordShape,
  ScalarKind,
  ScalarShape,
  SequenceShape,
  Shape,
} from "../../ports/shape"

function scalar<K extends ScalarKind>(kind: K): ScalarShape<K> {
  return { kind: "scalar", scalar: kind }
}

export function bool(): ScalarShape<"bool"> {
  return scalar("bool")
}

export function i8(): ScalarShape<"i8"> {
  return scalar("i8")
}

export function i16(): ScalarShape<"i16"> {
  return scalar("i16")
}

export function i32(): ScalarShape<"i32"> {
  return scalar("i32")
}

export function i64(): ScalarShape<"i64"> {
  return scalar("i64")
}

export function i128(): ScalarShape<"i128"> {
  return scalar("i128")
}

export function u8(): ScalarShape<"u8"> {
  return scalar("u8")
}

export function u16(): ScalarShape<"u16"> {
  return scalar("u16")
}

export function u32(): ScalarShape<"u32"> {
  return scalar("u32")
}

export function u64(): ScalarShape<"u64"> {
  return scalar("u64")
}

export function u128(): ScalarShape<"u128"> {
  return scalar("u128")
}

export function f32(): ScalarShape<"f32"> {
  return scalar("f32")
}

export function f64(): ScalarShape<"f64"> {
  return scalar("f64")
}

export function char(): ScalarShape<"char"> {
  return scalar("char")
}

export function string(): ScalarShape<"string"> {
  return scalar("string")
}

/** Byte buffer, base64 on the wire. */
export function bytes(): ScalarShape<"bytes"> {
  return scalar("bytes")
}

/** Absent values produce no key at all when encoding. */
export function optional<S extends Shape>(inner: S): OptionalShape<S> {
  return { kind: "optional", inner }
}

/** Repeats the key once per element. Elements must be scalars. */
export function seq<S extends Shape>(element: S): SequenceShape<S> {
  return { kind: "sequence", element }
}

/** Stores the whole sequence under one key through `codec`. */
export function array<T>(codec: ArrayCodec<T>): ArrayShape<T> {
  return { kind: "array", codec }
}

export function record<F extends Fields>(fields: F): RecordShape<F> {
  return { kind: "record", fields }
}
