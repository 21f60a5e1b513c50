export enum ErrorCode {
  BadRequest = 'BadRequest',
  NotFound = 'NotFound',
  TooManyRequests = 'TooManyRequests',
  InternalError = 'InternalError',
  ServiceUnavailable = 'ServiceUnavailable',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',
  CACHE_UNAVAILABLE = 'CACHE_UNAVAILABLE',
}

export interface GatewayError {
  code: ErrorCode;
  message: string;
  statusCode: number;
  details?: Record<string, unknown>;
}

const statusCodeMap: Record<ErrorCode, number> = {
  [ErrorCode.BadRequest]: 400,
  [ErrorCode.NotFound]: 404,
  [ErrorCode.TooManyRequests]: 429,
  [ErrorCode.InternalError]: 500,
  [ErrorCode.ServiceUnavailable]: 503,
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.RATE_LIMIT_EXCEEDED]: 429,
  [ErrorCode.CACHE_UNAVAILABLE]: 503,
};

export function createError(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): GatewayError {
  const result: GatewayError = {
    code,
    message,
    statusCode: statusCodeMap[code],
  };

  if (details !== undefined) {
    result.details = details;
  }

  return result;
}
