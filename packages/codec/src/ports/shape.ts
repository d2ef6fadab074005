import type { ArrayCodec } from "./array-codec"

/**
 * Runtime representation of every scalar kind.
 *
 * 64- and 128-bit integers are `bigint`; narrower integers and floats are
 * `number`; `char` is a string holding exactly one code point.
 */
export type ScalarValueMap = {
  bool: boolean
  i8: number
  i16: number
  i32: number
  u8: number
  u16: number
  u32: number
  i64: bigint
  u64: bigint
  i128: bigint
  u128: bigint
  f32: number
  f64: number
  char: string
  string: string
  bytes: Uint8Array
}

export type ScalarKind = keyof ScalarValueMap

export interface ScalarShape<K extends ScalarKind = ScalarKind> {
  readonly kind: "scalar"
  readonly scalar: K
}

export interface OptionalShape<S extends Shape = Shape> {
  readonly kind: "optional"
  readonly inner: S
}

/** Repeated-key sequence: `ids=1&ids=2`. */
export interface SequenceShape<S extends Shape = Shape> {
  readonly kind: "sequence"
  readonly element: S
}

/** One key holding a sub-encoded document: `ids=["1","2"]`. */
export interface ArrayShape<T = unknown> {
  readonly kind: "array"
  readonly codec: ArrayCodec<T>
}

export type Fields = { readonly [name: string]: Shape }

/**
 * Named fields in declared order. A record nested in another record shares
 * its namespace: its keys are written and read without any prefix.
 */
export interface RecordShape<F extends Fields = Fields> {
  readonly kind: "record"
  readonly fields: F
}

export type Shape = ScalarShape | OptionalShape | SequenceShape | ArrayShape | RecordShape

export type ShapeKind = Shape["kind"]

type Simplify<T> = { [K in keyof T]: T[K] } & {}

type OptionalKeys<F extends Fields> = {
  [K in keyof F]: F[K] extends OptionalShape ? K : never
}[keyof F]

type RequiredKeys<F extends Fields> = Exclude<keyof F, OptionalKeys<F>>

type InferAt<F extends Fields, K extends keyof F> = F[K] extends Shape ? Infer<F[K]> : never

export type InferFields<F extends Fields> = Simplify<
  { -readonly [K in RequiredKeys<F>]: InferAt<F, K> } & {
    -readonly [K in OptionalKeys<F>]?: InferAt<F, K>
  }
>

/**
 * Static type of the values described by a shape.
 *
 * @example
 * ```ts
 * const search = q.record({ name: q.string(), page: q.optional(q.u32()) })
 * type Search = Infer<typeof search> // { name: string; page?: number | undefined }
 * ```
 */
export type Infer<S extends Shape> =
  S extends ScalarShape<infer K extends ScalarKind>
    ? ScalarValueMap[K]
    : S extends OptionalShape<infer I extends Shape>
      ? Infer<I> | undefined
      : S extends SequenceShape<infer E extends Shape>
        ? Infer<E>[]
        : S extends ArrayShape<infer T>
          ? T[]
          : S extends RecordShape<infer F extends Fields>
            ? InferFields<F>
            : never
