import type { Logger } from "@flatquery/logger"

export type ComponentTransform = (raw: string) => string

export type QueryCodecOptions = {
  /**
   * Receives trace entries per call and debug entries for ignored keys.
   * @default NullLogger
   */
  logger?: Logger

  /**
   * Fail with `unknown_field` when the text holds keys (or extra values) the
   * shape did not read, instead of ignoring them.
   * @default false
   */
  strict?: boolean

  /**
   * Upper bound on the number of `key=value` pairs accepted by the decoder.
   * @default 1000
   */
  maxPairs?: number

  /**
   * Applied to every key and value after the text is split.
   * @default identity (no percent-decoding)
   */
  decodeComponent?: ComponentTransform

  /**
   * Applied to every key and value before they are joined.
   * @default identity (no percent-encoding)
   */
  encodeComponent?: ComponentTransform
}

export type ResolvedCodecOptions = Readonly<Required<QueryCodecOptions>>
