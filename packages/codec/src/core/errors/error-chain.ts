function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function getCause(v: unknown): unknown {
  return isRecord(v) && "cause" in v ? v.cause : undefined
}

/**
 * Walk the error cause chain and return all values encountered.
 *
 * Stops after `maxDepth` entries or when a value repeats.
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)

    const next = getCause(current)

    if (next === undefined) break
    current = next
  }

  return chain
}

/**
 * Render an error and its causes on one line, outermost first.
 *
 * @example
 * ```ts
 * formatErrorChain(err) // "invalid i32 literal: invalid digit found in string"
 * ```
 */
export function formatErrorChain(err: unknown): string {
  return errorChain(err)
    .map((e) => {
      if (e instanceof Error) return e.message
      if (isRecord(e) && typeof e.message === "string") return e.message
      return String(e)
    })
    .join(": ")
}
