import { NullLogger } from "@flatquery/logger"
import { z } from "zod/mini"
import type {
  ComponentTransform,
  QueryCodecOptions,
  ResolvedCodecOptions,
} from "../../ports/codec-options"
import { QueryError } from "../errors/query-error"
import { DEFAULT_MAX_PAIRS } from "../field-map/field-map"

const optionsSchema = z.object({
  strict: z.optional(z.boolean()),
  maxPairs: z.optional(z.int().check(z.positive())),
})

export type OptionIssue = { path: string; message: string }

const identity: ComponentTransform = (raw) => raw

function formatPath(path: readonly PropertyKey[]): string {
  let out = ""
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }
  return out
}

/**
 * Fill in defaults and validate codec options.
 *
 * @throws QueryError with code `invalid_options`; `context.issues` lists every
 * problem found.
 */
export function resolveCodecOptions(options: QueryCodecOptions = {}): ResolvedCodecOptions {
  const result = optionsSchema.safeParse({
    strict: options.strict,
    maxPairs: options.maxPairs,
  })

  if (!result.success) {
    const issues: OptionIssue[] = result.error.issues.map((i) => ({
      path: formatPath(i.path),
      message: i.message,
    }))

    throw new QueryError(issues[0]?.message ?? "Invalid codec options", {
      code: "invalid_options",
      context: { issues },
    })
  }

  return {
    logger: options.logger ?? new NullLogger(),
    strict: result.data.strict ?? false,
    maxPairs: result.data.maxPairs ?? DEFAULT_MAX_PAIRS,
    decodeComponent: options.decodeComponent ?? identity,
    encodeComponent: options.encodeComponent ?? identity,
  }
}
