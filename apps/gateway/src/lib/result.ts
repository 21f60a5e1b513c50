import { type ErrorCode, type GatewayError, createError } from '../core/errors.js';

/**
 * Maps unknown errors to GatewayError with specified error code
 */
export const mapUnknownErrorToGatewayError =
  (code: ErrorCode) =>
  (error: unknown): GatewayError =>
    createError(code, error instanceof Error ? error.message : String(error));
