import { DomainError } from '../errors.js';

export type AuthErrorCode =
  | 'DUPLICATE_IDENTITY'
  | 'INVALID_CREDENTIAL'
  | 'AUTH_FAILURE'
  | 'TOKEN_MALFORMED'
  | 'TOKEN_EXPIRED'
  | 'TOKEN_BAD_SIGNATURE'
  | 'TOKEN_REVOKED'
  | 'ACCOUNT_REMOVED';

/**
 * Base class for every authentication failure. `code` is stable and is
 * what clients see in the error response.
 */
export abstract class AuthError extends DomainError {
  abstract readonly code: AuthErrorCode;
}

export class DuplicateIdentityError extends AuthError {
  readonly code = 'DUPLICATE_IDENTITY';

  constructor(message = 'Identity is already registered') {
    super(message);
  }
}

export class InvalidCredentialError extends AuthError {
  readonly code = 'INVALID_CREDENTIAL';

  constructor(
    public readonly violations: readonly string[],
    message = 'Password does not meet the password policy'
  ) {
    super(message);
  }
}

/**
 * Login rejection. Deliberately the same for an unknown identity and a
 * wrong password.
 */
export class AuthFailureError extends AuthError {
  readonly code = 'AUTH_FAILURE';

  constructor() {
    super('Invalid identity or password');
  }
}

export abstract class TokenError extends AuthError {}

export class MalformedTokenError extends TokenError {
  readonly code = 'TOKEN_MALFORMED';

  constructor(message = 'Token is malformed') {
    super(message);
  }
}

export class ExpiredTokenError extends TokenError {
  readonly code = 'TOKEN_EXPIRED';

  constructor(message = 'Token has expired') {
    super(message);
  }
}

export class BadSignatureError extends TokenError {
  readonly code = 'TOKEN_BAD_SIGNATURE';

  constructor(message = 'Token signature is invalid') {
    super(message);
  }
}

export class RevokedTokenError extends AuthError {
  readonly code = 'TOKEN_REVOKED';

  constructor(message = 'Token has been revoked') {
    super(message);
  }
}

export class AccountRemovedError extends AuthError {
  readonly code = 'ACCOUNT_REMOVED';

  constructor(message = 'Account no longer exists') {
    super(message);
  }
}
