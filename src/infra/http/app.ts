import express from 'express';
import type { RateLimitConfig } from '../../config.js';
import type { AuthComponents } from '../container.js';
import { createAuthRoutes } from './routes/auth.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter } from './middleware/rateLimit.js';
import { logger } from '../logger.js';

const HEALTH_TIMEOUT_MS = 2000;

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * @openapi
 * /healthz:
 *   get:
 *     tags: [Health]
 *     summary: Check that the user store answers
 *     responses:
 *       200:
 *         description: OK
 *       500:
 *         description: User store unavailable
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */
export function createApp(components: AuthComponents, rateLimit: RateLimitConfig): express.Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(express.json());
  app.use(createApiRateLimiter(rateLimit.apiPerMinute));

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res, next) => {
    withTimeout(components.healthCheck(), HEALTH_TIMEOUT_MS)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch((error: unknown) => {
        logger.error('Health check failed', error);
        res.status(500).json({
          code: 'STORE_UNAVAILABLE',
          message: 'User store unavailable',
        });
      })
      .catch(next);
  });

  app.use(createSwaggerRoutes());
  app.use('/api/auth', createAuthRoutes(components, rateLimit.loginPerMinute));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
