import type { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Async handler wrapper
 *
 * Wraps an async route handler and forwards rejections to the Express error
 * middleware. `ReqBody` is the body shape the route's `validate()` schema has
 * already checked.
 *
 * Usage:
 * ```typescript
 * addItem = asyncHandler<AddItemRequest['body']>(async (req, res) => {
 *   const outcome = await this.checklistService.addItem(req.body.name);
 *   res.status(201).json(createSuccessResponse(outcome.result));
 * });
 * ```
 */
export const asyncHandler = <ReqBody = unknown>(
  fn: (req: Request<Record<string, string>, unknown, ReqBody>, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
