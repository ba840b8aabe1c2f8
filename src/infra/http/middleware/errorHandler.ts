import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import {
  AuthError,
  DuplicateIdentityError,
  InvalidCredentialError,
} from '../../../domain/auth/errors.js';
import { UnauthorizedError } from '../../../application/errors.js';
import { logger } from '../../logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

function authErrorStatus(err: AuthError): number {
  if (err instanceof DuplicateIdentityError) {
    return 409;
  }
  return 401;
}

/** body-parser marks unparseable JSON with this type. */
function isJsonParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * body-parser flags errors caused by the request itself with `expose` and
 * a 4xx `status` (oversized body, unsupported charset, aborted upload).
 */
function bodyErrorStatus(err: Error): number | null {
  if (!('expose' in err) || err.expose !== true) {
    return null;
  }
  if (!('status' in err) || typeof err.status !== 'number') {
    return null;
  }
  return err.status >= 400 && err.status < 500 ? err.status : null;
}

function bodyErrorResponse(status: number): ErrorResponse {
  switch (status) {
    case 413:
      return { code: 'PAYLOAD_TOO_LARGE', message: 'Request body is too large' };
    case 415:
      return { code: 'UNSUPPORTED_MEDIA_TYPE', message: 'Request body encoding is not supported' };
    default:
      return { code: 'BAD_REQUEST', message: 'Request body could not be read' };
  }
}

function send(res: Response, status: number, body: ErrorResponse): void {
  if (status === 401) {
    res.setHeader('WWW-Authenticate', 'Bearer');
  }
  if (status < 500) {
    logger.warn('Request rejected', { status, code: body.code });
  }
  res.status(status).json(body);
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    send(res, 400, {
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: {
        issues: err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
    });
    return;
  }

  if (err instanceof InvalidCredentialError) {
    send(res, 400, {
      code: err.code,
      message: err.message,
      details: { violations: err.violations },
    });
    return;
  }

  if (err instanceof AuthError) {
    send(res, authErrorStatus(err), { code: err.code, message: err.message });
    return;
  }

  if (err instanceof UnauthorizedError) {
    send(res, 401, { code: 'UNAUTHORIZED', message: err.message });
    return;
  }

  if (isJsonParseError(err)) {
    send(res, 400, { code: 'INVALID_JSON', message: 'Request body is not valid JSON' });
    return;
  }

  const bodyStatus = bodyErrorStatus(err);
  if (bodyStatus !== null) {
    send(res, bodyStatus, bodyErrorResponse(bodyStatus));
    return;
  }

  logger.error('Unhandled error', err);
  send(res, 500, { code: 'INTERNAL_ERROR', message: 'Internal server error' });
}
