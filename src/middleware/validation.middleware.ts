import type { Request, Response, NextFunction } from 'express';
import { AnyZodObject, ZodError } from 'zod';
import { ErrorCode } from '../types/error.types';
import { createErrorResponse } from '../utils/response-factory';

/**
 * Validation middleware factory
 *
 * Validates request data (body, params, query) against a Zod schema. When the
 * schema describes a body, the parsed body (unknown keys stripped) replaces
 * `req.body` for the handler.
 *
 * Usage:
 * ```typescript
 * router.post('/move', validate(moveItemSchema), itemController.moveItem);
 * ```
 */
export const validate = (schema: AnyZodObject) => {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const parsed = await schema.parseAsync({
        body: req.body,
        params: req.params,
        query: req.query,
      });
      if ('body' in schema.shape) {
        req.body = parsed['body'];
      }
      next();
      return;
    } catch (error) {
      if (error instanceof ZodError) {
        const errorDetails = error.errors.map((err) => ({
          field: err.path.join('.'),
          message: err.message,
        }));

        res.status(400).json(
          createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Validation failed', {
            errors: errorDetails,
          })
        );
        return;
      }
      next(error);
      return;
    }
  };
};
