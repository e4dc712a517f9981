import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError, ErrorCode, StoreError } from '../types/error.types';
import { createErrorResponse } from '../utils/response-factory';
import { logger } from '../config/logger';

// express.json() marks malformed bodies with this type
const isMalformedJson = (err: Error): boolean =>
  err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';

/**
 * Global error handling middleware
 *
 * Catches all errors and returns consistent error responses
 */
export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  // Known application errors are expected; keep them out of the error log
  const level = err instanceof AppError && err.statusCode < 500 ? 'warn' : 'error';
  logger.log(level, 'Error occurred', {
    error: err.message,
    stack: level === 'error' ? err.stack : undefined,
    path: req.path,
    method: req.method,
  });

  if (err instanceof AppError) {
    return res.status(err.statusCode).json(createErrorResponse(err.code, err.message, err.details));
  }

  if (err instanceof ZodError) {
    return res.status(400).json(
      createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Validation failed', {
        errors: err.errors,
      })
    );
  }

  if (isMalformedJson(err)) {
    return res
      .status(400)
      .json(createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Request body is not valid JSON'));
  }

  if (err instanceof StoreError) {
    return res
      .status(503)
      .json(createErrorResponse(ErrorCode.STORE_ERROR, 'Checklist storage is unavailable'));
  }

  // Unknown errors - don't expose internals
  return res
    .status(500)
    .json(createErrorResponse(ErrorCode.INTERNAL_ERROR, 'An unexpected error occurred'));
};

/**
 * 404 Not Found handler
 */
export const notFoundHandler = (req: Request, res: Response) => {
  res
    .status(404)
    .json(createErrorResponse('NOT_FOUND', `Route ${req.method} ${req.path} not found`));
};
