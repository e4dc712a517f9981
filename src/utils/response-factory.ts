import type { ApiSuccessResponse, ApiErrorResponse } from '../types/api.types';
import type { Persistence } from '../services/checklist.service';

const NOT_PERSISTED_MESSAGE = 'Change applied but could not be saved; it will be retried with the next change';

/**
 * Create a standardized success response
 */
export function createSuccessResponse<T>(data: T, message?: string): ApiSuccessResponse<T> {
  const response: ApiSuccessResponse<T> = { data };

  if (message) {
    response.message = message;
  }

  return response;
}

/**
 * Success response for a mutation; flags a failed save in the message
 */
export function createMutationResponse<T>(
  data: T,
  persistence: Persistence,
  message?: string
): ApiSuccessResponse<T> {
  if (persistence === 'failed') {
    return createSuccessResponse(data, message ? `${message}. ${NOT_PERSISTED_MESSAGE}` : NOT_PERSISTED_MESSAGE);
  }
  return createSuccessResponse(data, message);
}

/**
 * Create a standardized error response
 */
export function createErrorResponse(
  code: string,
  message: string,
  details?: Record<string, unknown>
): ApiErrorResponse {
  return {
    error: {
      code,
      message,
      ...(details && { details }),
    },
  };
}
