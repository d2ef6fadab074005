import type { ErrorContext, QueryErrorCode, SerializedError } from "../../ports/error"

export type QueryErrorOptions<C extends QueryErrorCode = QueryErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isOperational?: boolean
}>

const NON_OPERATIONAL_CODES: ReadonlySet<QueryErrorCode> = new Set([
  "unsupported_shape",
  "invalid_options",
])

/**
 * The single error type of the codec, raised while encoding or decoding.
 *
 * @remarks
 * `isOperational` is `false` for shape and option problems: those are bugs in
 * the calling code, not bad input, and retrying with other text cannot help.
 */
export class QueryError<C extends QueryErrorCode = QueryErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: QueryErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? !NON_OPERATIONAL_CODES.has(options.code)
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeQueryError(this)
  }
}

/**
 * Factory with less boilerplate.
 *
 * @example
 * ```ts
 * throw createQueryError("no_value", "no value", { context: { key: "age" } })
 * ```
 */
export function createQueryError<C extends QueryErrorCode>(
  code: C,
  message: string,
  options?: Omit<QueryErrorOptions<C>, "code">,
): QueryError<C> {
  return new QueryError(message, { code, ...options })
}

export function isQueryError(err: unknown): err is QueryError {
  return err instanceof QueryError
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any error (or thrown value) to a consistent shape.
 *
 * Causes are serialized recursively, so a failed integer parse shows up as
 * `invalid_literal` with the native `SyntaxError` or `RangeError` beneath it.
 */
export function serializeQueryError(
  err: unknown,
  options?: SerializeOptions,
): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof QueryError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeQueryError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeQueryError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
