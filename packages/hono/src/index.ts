export {
  DEFAULT_REQUEST_ID_HEADER,
  type QueryAdapterOptions,
  type ResolvedAdapterOptions,
  resolveAdapterOptions,
} from "./adapter-options"
export {
  type ErrorResponse,
  type ErrorResponseBody,
  formatQueryError,
  REJECTION_STATUS,
} from "./errors/errors"
export { type RequestSource, rejectRequest } from "./errors/reject-request"
export { type FormEnv, formBody } from "./middleware/form-body"
export { type QueryEnv, queryParams } from "./middleware/query-params"
export { FORM_CONTENT_TYPE, formResponse } from "./response/form-response"
export { isNonEmptyString } from "./utils/is-non-empty-string"
export { rawQuery } from "./utils/raw-query"
