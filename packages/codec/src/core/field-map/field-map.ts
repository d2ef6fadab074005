import type { ComponentTransform } from "../../ports/codec-options"
import { isQueryError, QueryError } from "../errors/query-error"

export const DEFAULT_MAX_PAIRS = 1000

export type ParseFieldMapOptions = {
  /** @default 1000 */
  maxPairs?: number

  /** @default identity */
  decodeComponent?: ComponentTransform
}

/**
 * Intermediate model of FlatText: every key with its values in arrival order.
 *
 * @remarks
 * Reading is destructive. `take` removes the front value and a key disappears
 * once its last value is taken, so a key that has been fully read looks the
 * same as one that never appeared. One decode call owns one FieldMap.
 */
export class FieldMap {
  private readonly values = new Map<string, string[]>()
  private pairs = 0

  static parse(text: string, options: ParseFieldMapOptions = {}): FieldMap {
    const maxPairs = options.maxPairs ?? DEFAULT_MAX_PAIRS
    const decodeComponent = options.decodeComponent
    const map = new FieldMap()

    if (text === "") return map

    const pieces = text.split("&")

    if (pieces.length > maxPairs) {
      throw new QueryError("too many pairs", {
        code: "too_many_pairs",
        context: { pairs: pieces.length, maxPairs },
      })
    }

    pieces.forEach((piece, index) => {
      const parts = piece.split("=")
      const [rawKey, rawValue] = parts

      if (parts.length !== 2 || rawKey === undefined || rawValue === undefined) {
        throw new QueryError("invalid pair", {
          code: "invalid_pair",
          context: { piece, index },
        })
      }

      const key = decodeComponent ? applyDecode(decodeComponent, rawKey, index) : rawKey
      const value = decodeComponent ? applyDecode(decodeComponent, rawValue, index) : rawValue

      map.append(key, value)
    })

    return map
  }

  append(key: string, value: string): void {
    const existing = this.values.get(key)

    if (existing) existing.push(value)
    else this.values.set(key, [value])

    this.pairs++
  }

  /** `true` while at least one value is left for `key`. */
  has(key: string): boolean {
    return this.values.has(key)
  }

  peek(key: string): string | undefined {
    return this.values.get(key)?.[0]
  }

  /** Removes and returns the front value for `key`. */
  take(key: string): string | undefined {
    const list = this.values.get(key)
    if (!list) return undefined

    const value = list.shift()
    if (list.length === 0) this.values.delete(key)

    this.pairs--
    return value
  }

  /** Removes and returns every remaining value for `key`, in order. */
  takeAll(key: string): string[] {
    const list = this.values.get(key) ?? []

    this.values.delete(key)
    this.pairs -= list.length

    return list
  }

  /** Keys that still hold values, in first-seen order. */
  keys(): string[] {
    return [...this.values.keys()]
  }

  /** Number of values not read yet, across all keys. */
  get remaining(): number {
    return this.pairs
  }

  get size(): number {
    return this.values.size
  }
}

function applyDecode(decodeComponent: ComponentTransform, raw: string, index: number): string {
  try {
    return decodeComponent(raw)
  } catch (err) {
    if (isQueryError(err)) throw err

    throw new QueryError("invalid encoding", {
      code: "invalid_encoding",
      cause: err,
      context: { component: raw, index },
    })
  }
}

/**
 * Split FlatText into a FieldMap.
 *
 * Every `&`-separated piece must split on `=` into exactly two parts; an empty
 * text has no pairs.
 *
 * @throws QueryError with code `invalid_pair`, `too_many_pairs` or `invalid_encoding`
 */
export function parseFieldMap(text: string, options: ParseFieldMapOptions = {}): FieldMap {
  return FieldMap.parse(text, options)
}
