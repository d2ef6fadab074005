/**
 * Failure categories raised by the encoder and the decoder.
 *
 * - `invalid_pair`: a FlatText piece is not exactly `key=value`
 * - `no_value`: a required key is missing (or empty, for array values)
 * - `invalid_literal`: a value does not parse as the requested scalar kind
 * - `invalid_value`: a value handed to the encoder does not match its shape
 * - `unsupported_shape`: the shape asks for a capability the codec lacks
 * - `array_codec_failed`: the array sub-codec threw
 * - `too_many_pairs`: the input holds more pairs than `maxPairs`
 * - `unknown_field`: strict decoding found keys the shape did not read
 * - `invalid_encoding`: a `decodeComponent` hook rejected a key or value
 * - `invalid_options`: codec options failed validation
 */
export type QueryErrorCode =
  | "invalid_pair"
  | "no_value"
  | "invalid_literal"
  | "invalid_value"
  | "unsupported_shape"
  | "array_codec_failed"
  | "too_many_pairs"
  | "unknown_field"
  | "invalid_encoding"
  | "invalid_options"

/**
 * Structured metadata attached to errors (offending key, literal, scalar kind).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

/**
 * Serialized error shape for logging and HTTP responses.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
