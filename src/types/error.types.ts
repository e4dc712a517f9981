/**
 * Error types and codes
 */

// Standard error codes
export enum ErrorCode {
  // Validation errors (400)
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INDEX_OUT_OF_RANGE = 'INDEX_OUT_OF_RANGE',

  // Not found errors (404)
  ITEM_NOT_FOUND = 'ITEM_NOT_FOUND',

  // Server errors (5xx)
  STORE_ERROR = 'STORE_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

// Custom application error class
export class AppError extends Error {
  constructor(
    public code: ErrorCode | string,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raised by an ItemStore when items cannot be loaded or saved
 */
export class StoreError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StoreError';
    Error.captureStackTrace(this, this.constructor);
  }
}
