export { createJsonArrayCodec, type ItemSchema } from "./adapters/json/json-array-codec"
export { createQueryCodec } from "./core/create-query-codec"
export { decodeQuery, safeDecodeQuery } from "./core/decoder/decoder"
export { encodeQuery } from "./core/encoder/encoder"
export { FlatTextWriter } from "./core/encoder/flat-text-writer"
export { errorChain, formatErrorChain } from "./core/errors/error-chain"
export {
  createQueryError,
  isQueryError,
  QueryError,
  type QueryErrorOptions,
  type SerializeOptions,
  serializeQueryError,
} from "./core/errors/query-error"
export {
  DEFAULT_MAX_PAIRS,
  FieldMap,
  type ParseFieldMapOptions,
  parseFieldMap,
} from "./core/field-map/field-map"
export { percentDecode, percentEncode } from "./core/field-map/percent"
export { resolveCodecOptions } from "./core/options/resolve-codec-options"
export { decodeScalar, encodeScalar } from "./core/scalar/scalar-codec"
export { assertSupportedShape } from "./core/shape/assert-supported-shape"
export * as q from "./core/shape/builders"
export type { ArrayCodec } from "./ports/array-codec"
export type {
  ComponentTransform,
  QueryCodecOptions,
  ResolvedCodecOptions,
} from "./ports/codec-options"
export type { ErrorContext, QueryErrorCode, SerializedError } from "./ports/error"
export type { DecodeFailed, DecodeOk, DecodeResult, QueryCodec } from "./ports/query-codec"
export type {
  ArrayShape,
  Fields,
  Infer,
  InferFields,
  OptionalShape,
  RecordShape,
  ScalarKind,
  ScalarShape,
  ScalarValueMap,
  SequenceShape,
  Shape,
  ShapeKind,
} from "./ports/shape"
