/**
 * Response envelopes shared by the catalog service and its callers.
 */
export type ErrorCode =
  | "VALIDATION_ERROR"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "MISSING_KEY"
  | "MISSING_ARGUMENT"
  | "PARSE_ERROR"
  | "SOURCE_UNAVAILABLE"
  | "INTERNAL_ERROR";

export interface ResponseMeta {
  request_id: string;
  timestamp: string;
}

export interface ErrorDetail {
  field: string;
  reason: string;
}

export interface ApiSuccess<TData> {
  data: TData;
  meta: ResponseMeta;
}

export interface ApiError {
  error: {
    code: ErrorCode;
    message: string;
    details?: ErrorDetail[];
  };
  meta: ResponseMeta;
}

export type ApiResult<TData> = ApiSuccess<TData> | ApiError;

export function createMeta(requestId: string, timestamp = new Date().toISOString()): ResponseMeta {
  return { request_id: requestId, timestamp };
}

export function ok<TData>(requestId: string, data: TData): ApiSuccess<TData> {
  return { data, meta: createMeta(requestId) };
}

export function fail(
  requestId: string,
  code: ErrorCode,
  message: string,
  details?: ErrorDetail[],
): ApiError {
  return { error: { code, message, details }, meta: createMeta(requestId) };
}

export function isApiError(result: ApiResult<unknown>): result is ApiError {
  return "error" in result;
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  VALIDATION_ERROR: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  MISSING_KEY: 404,
  MISSING_ARGUMENT: 422,
  PARSE_ERROR: 422,
  SOURCE_UNAVAILABLE: 502,
  INTERNAL_ERROR: 500,
};

export function statusFor(result: ApiResult<unknown>): number {
  return isApiError(result) ? STATUS_BY_CODE[result.error.code] : 200;
}
