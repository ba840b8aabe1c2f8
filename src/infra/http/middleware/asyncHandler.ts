import type { NextFunction, Response } from 'express';
import type { AuthRequest } from './auth.js';

export type AsyncRoute = (req: AuthRequest, res: Response, next: NextFunction) => Promise<void>;

/**
 * Adapt an async route for Express 4, which ignores returned promises:
 * a rejection is handed to the error handler.
 */
export function asyncHandler(route: AsyncRoute) {
  return (req: AuthRequest, res: Response, next: NextFunction): void => {
    void route(req, res, next).catch(next);
  };
}
