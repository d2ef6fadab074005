import {
  type ComponentTransform,
  percentDecode,
  percentEncode,
  type QueryCodecOptions,
} from "@flatquery/codec"
import { type Logger, NullLogger } from "@flatquery/logger"

export const DEFAULT_REQUEST_ID_HEADER = "x-request-id"

export type QueryAdapterOptions = QueryCodecOptions & {
  /**
   * Header echoed as `requestId` in rejection bodies and logs.
   * @default "x-request-id"
   */
  requestIdHeader?: string
}

export type ResolvedAdapterOptions = Readonly<{
  codec: QueryCodecOptions & {
    decodeComponent: ComponentTransform
    encodeComponent: ComponentTransform
  }
  logger: Logger
  requestIdHeader: string
}>

/**
 * Adapter defaults differ from the codec's: URLs and form bodies arrive
 * percent-encoded, so keys and values go through `percentDecode` /
 * `percentEncode` unless the caller passes its own transforms.
 */
export function resolveAdapterOptions(options: QueryAdapterOptions = {}): ResolvedAdapterOptions {
  const { requestIdHeader, ...codec } = options
  const logger = codec.logger ?? new NullLogger()

  return {
    codec: {
      ...codec,
      logger,
      decodeComponent: codec.decodeComponent ?? percentDecode,
      encodeComponent: codec.encodeComponent ?? percentEncode,
    },
    logger,
    requestIdHeader: (requestIdHeader ?? DEFAULT_REQUEST_ID_HEADER).toLowerCase(),
  }
}
