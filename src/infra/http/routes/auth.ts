import { Router, Response } from 'express';
import { z } from 'zod';
import type { AuthComponents } from '../../container.js';
import { authMiddleware, requirePrincipal, AuthRequest } from '../middleware/auth.js';
import { createLoginRateLimiter } from '../middleware/rateLimit.js';
import { validateBody } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/Credentials'
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/UserSummary'
 *       400:
 *         description: Validation error or password rejected by the password policy
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       409:
 *         description: Identity already registered
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Login and receive a bearer token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/Credentials'
 *     responses:
 *       200:
 *         description: Authenticated
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/LoginResponse'
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       429:
 *         description: Too many login attempts
 *
 * /api/auth/me:
 *   get:
 *     tags: [Auth]
 *     summary: Current user
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/UserSummary'
 *       401:
 *         description: Missing, invalid, expired or revoked token
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/logout:
 *   post:
 *     tags: [Auth]
 *     summary: Revoke the presented token
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: Logged out
 *       401:
 *         description: Missing, invalid, expired or revoked token
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

const identitySchema = z
  .string()
  .trim()
  .min(3)
  .max(254)
  .regex(/^\S+$/, 'Identity must not contain whitespace');

const registerBodySchema = z.object({
  identity: identitySchema,
  // Length and complexity are the password policy's job
  password: z.string().min(1),
});

// Any identity may attempt a login; one that could never have registered
// fails like a wrong password.
const loginBodySchema = z.object({
  identity: z.string().trim().min(1),
  password: z.string().min(1),
});

export function createAuthRoutes(components: AuthComponents, loginRateLimit: number) {
  const router = Router();
  const requireAuth = authMiddleware(components.authenticate);

  router.post(
    '/register',
    validateBody(registerBodySchema),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      const result = await components.register.execute(body);
      res.status(201).json(result);
    })
  );

  router.post(
    '/login',
    createLoginRateLimiter(loginRateLimit),
    validateBody(loginBodySchema),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await components.login.execute(body);
      res.status(200).json(result);
    })
  );

  router.get('/me', requireAuth, (req: AuthRequest, res: Response) => {
    const principal = requirePrincipal(req);
    res.status(200).json({ userId: principal.userId, identity: principal.identity });
  });

  router.post(
    '/logout',
    requireAuth,
    asyncHandler(async (req, res) => {
      await components.logout.execute(requirePrincipal(req));
      res.status(200).json({ status: 'ok' });
    })
  );

  return router;
}
