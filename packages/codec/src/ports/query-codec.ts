import type { QueryError } from "../core/errors/query-error"

export type DecodeOk<T> = {
  readonly kind: "ok"
  readonly value: T
}

export type DecodeFailed = {
  readonly kind: "error"
  readonly error: QueryError
}

/**
 * Result of a non-throwing decode.
 */
export type DecodeResult<T> = DecodeOk<T> | DecodeFailed

/**
 * QueryCodec binds a record shape to FlatText.
 *
 * @remarks
 * Both directions are pure and synchronous. `encode` writes fields in the
 * shape's declared order; `decode` looks keys up by name, so the order of
 * pairs in the text does not matter.
 */
export interface QueryCodec<T> {
  encode(value: T): string

  /** @throws QueryError */
  decode(text: string): T

  safeDecode(text: string): DecodeResult<T>
}
