import type { QueryError, QueryErrorCode } from "@flatquery/codec"

export const REJECTION_STATUS = 400

export type ErrorResponseBody = {
  status: typeof REJECTION_STATUS
  code: QueryErrorCode
  message: string
  requestId: string
}

export type ErrorResponse = {
  error: ErrorResponseBody
}

/**
 * Shapes a decoding failure into the response body sent to the client.
 *
 * @remarks
 * Only the code and message are exposed; error context (literals, keys) stays
 * in the logs.
 */
export function formatQueryError(error: QueryError, requestId: string): ErrorResponse {
  return {
    error: {
      status: REJECTION_STATUS,
      code: error.code,
      message: error.message,
      requestId,
    },
  }
}
