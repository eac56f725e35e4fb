/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { ActorContext, ErrorCode } from '../types/index.js';

/**
 * Extended Hono context with actor
 */
declare module 'hono' {
  interface ContextVariableMap {
    actor: ActorContext;
    requestId: string;
  }
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta: {
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

export type ErrorStatus = 400 | 401 | 403 | 404 | 500 | 502 | 504;

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Readonly<Record<ErrorCode, ErrorStatus>> = {
  VALIDATION_ERROR: 400,
  UNAUTHORIZED: 401,
  PERMISSION_DENIED: 403,
  NOT_FOUND: 404,
  CLASSIFICATION_FAILED: 502,
  RETRIEVAL_FAILED: 502,
  HANDLER_FAILED: 502,
  TIMEOUT: 504,
  INTERNAL_ERROR: 500,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: ErrorCode): ErrorStatus {
  return ERROR_STATUS_MAP[code];
}
