import rateLimit from 'express-rate-limit';

/**
 * General API rate limiter, per client per minute.
 * Each call builds its own in-memory store (resets on restart).
 */
export function createApiRateLimiter(limit: number) {
  return rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit,
    message: { code: 'RATE_LIMITED', message: 'Too many requests, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Stricter limiter for the login endpoint, keyed by IP.
 */
export function createLoginRateLimiter(limit: number) {
  return rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit,
    message: { code: 'RATE_LIMITED', message: 'Too many login attempts, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
    // No user id before login
    keyGenerator: (req) => {
      return req.ip || req.socket.remoteAddress || 'unknown';
    },
  });
}
