import jwt, { type JwtPayload } from 'jsonwebtoken';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import {
  BadSignatureError,
  ExpiredTokenError,
  MalformedTokenError,
} from '../../domain/auth/errors.js';
import { systemClock, type Clock } from '../clock.js';

const ALGORITHM = 'HS256';

export interface TokenSubject {
  userId: string;
  identity: string;
}

export interface IssuedToken {
  token: string;
  tokenId: string;
  expiresAt: Date;
}

export interface TokenClaims {
  userId: string;
  identity: string;
  tokenId: string;
  issuedAt: Date;
  expiresAt: Date;
}

const claimsSchema = z.object({
  sub: z.string().min(1),
  identity: z.string().min(1),
  jti: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
});

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Issues and verifies self-contained HS256 JWTs. Verification never
 * touches storage; checking that the user still exists is up to the caller.
 */
export class TokenIssuer {
  constructor(
    private readonly secret: string,
    private readonly clock: Clock = systemClock
  ) {}

  issue(subject: TokenSubject, ttlSeconds: number): IssuedToken {
    if (!Number.isInteger(ttlSeconds) || ttlSeconds < 0) {
      throw new RangeError('Token TTL must be a non-negative whole number of seconds');
    }

    const issuedAt = toEpochSeconds(this.clock());
    const tokenId = randomUUID();

    const token = jwt.sign(
      { identity: subject.identity, iat: issuedAt },
      this.secret,
      {
        algorithm: ALGORITHM,
        subject: subject.userId,
        jwtid: tokenId,
        expiresIn: ttlSeconds,
      }
    );

    return {
      token,
      tokenId,
      expiresAt: new Date((issuedAt + ttlSeconds) * 1000),
    };
  }

  /**
   * A token is expired once the clock reaches `exp`, so a zero TTL never
   * verifies. Times are whole seconds: the TTL runs from the start of the
   * second it was issued in.
   */
  verify(token: string): TokenClaims {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, {
        algorithms: [ALGORITHM],
        clockTimestamp: toEpochSeconds(this.clock()),
      });
    } catch (error) {
      throw mapVerifyError(error);
    }

    const parsed = claimsSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new MalformedTokenError('Token is missing required claims');
    }

    const claims = parsed.data;
    return {
      userId: claims.sub,
      identity: claims.identity,
      tokenId: claims.jti,
      issuedAt: new Date(claims.iat * 1000),
      expiresAt: new Date(claims.exp * 1000),
    };
  }
}

function mapVerifyError(error: unknown): Error {
  // TokenExpiredError extends JsonWebTokenError, so it goes first.
  if (error instanceof jwt.TokenExpiredError) {
    return new ExpiredTokenError();
  }
  if (error instanceof jwt.JsonWebTokenError) {
    if (error.message === 'invalid signature') {
      return new BadSignatureError();
    }
    return new MalformedTokenError();
  }
  if (error instanceof Error) {
    return error;
  }
  return new Error(String(error));
}
