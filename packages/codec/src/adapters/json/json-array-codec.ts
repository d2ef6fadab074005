import { z } from "zod/mini"
import type { ArrayCodec } from "../../ports/array-codec"

/**
 * Anything with a zod-style `parse`, e.g. `z.string()` or `z.number()`.
 */
export type ItemSchema<T> = { parse: (data: unknown) => T }

const jsonArray = z.array(z.unknown())

/**
 * Array sub-codec that embeds a JSON array as the value of one key.
 *
 * Decoded data must be an array, and every element must pass `item`.
 *
 * @example
 * ```ts
 * const ids = q.array(createJsonArrayCodec(z.string()))
 * // ids=["1","2","3"]
 * ```
 */
export function createJsonArrayCodec<T>(item: ItemSchema<T>): ArrayCodec<T> {
  return {
    encode(items) {
      return JSON.stringify(items)
    },
    decode(text) {
      return jsonArray.parse(JSON.parse(text)).map((element) => item.parse(element))
    },
  }
}
