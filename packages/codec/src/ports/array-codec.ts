/**
 * ArrayCodec turns a whole sequence into the single text value of one key,
 * and back.
 *
 * @remarks
 * Used by `q.array()` fields ("one key, many elements"), as opposed to
 * `q.seq()` fields which repeat the key once per element.
 *
 * The codec owns the sub-document format entirely; the query codec treats its
 * output as an opaque scalar and wraps anything it throws.
 *
 * @example
 * A comma-separated codec:
 * ```ts
 * const csv: ArrayCodec<string> = {
 *   encode: (items) => items.join(","),
 *   decode: (text) => text.split(","),
 * }
 * ```
 */
export interface ArrayCodec<T> {
  encode(items: readonly T[]): string

  decode(text: string): T[]
}
