import { Request, Response, NextFunction } from 'express';
import type { AuthenticateUseCase, Principal } from '../../../application/auth/authenticate.js';
import { UnauthorizedError } from '../../../application/errors.js';

export interface AuthRequest extends Request {
  principal?: Principal;
}

/**
 * Extract the token from `Authorization: Bearer <token>`. The scheme is
 * case-insensitive and the header must have exactly two parts.
 */
export function extractBearerToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }
  const parts = header.trim().split(/\s+/);
  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
    return null;
  }
  return parts[1];
}

export function authMiddleware(authenticate: AuthenticateUseCase) {
  return (req: AuthRequest, _res: Response, next: NextFunction): void => {
    const token = extractBearerToken(req.headers.authorization);

    if (!token) {
      next(new UnauthorizedError('Missing or invalid authorization header'));
      return;
    }

    authenticate
      .execute(token)
      .then((principal) => {
        req.principal = principal;
        next();
      })
      .catch(next);
  };
}

export function requirePrincipal(req: AuthRequest): Principal {
  if (!req.principal) {
    throw new UnauthorizedError();
  }
  return req.principal;
}
