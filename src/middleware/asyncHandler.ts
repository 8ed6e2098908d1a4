/**
 * Adapter that routes rejections of async middleware to Express's error
 * pipeline. Express 4 does not await handlers on its own.
 *
 * @module middleware/asyncHandler
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';

export type AsyncRequestHandler = (
  req: Request,
  res: Response,
  next: NextFunction,
) => Promise<void>;

export function asyncHandler(handler: AsyncRequestHandler): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}
