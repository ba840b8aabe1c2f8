import { Request, Response, NextFunction } from 'express';
import { ZodSchema } from 'zod';

/**
 * Replace the request body with its parsed value. A ZodError goes to the
 * error handler, which answers 400 VALIDATION_ERROR.
 */
export function validateBody(schema: ZodSchema) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      next(result.error);
      return;
    }
    req.body = result.data;
    next();
  };
}
