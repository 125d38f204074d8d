import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { Request, Response, NextFunction } from 'express';
import { config } from '../config.js';

const payloadSchema = z.object({
  role: z.string(),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

export type JWTPayload = z.infer<typeof payloadSchema>;

// Paths that do not require a token (alert intake has its own API key)
const PUBLIC_PATHS = ['/api/health', '/api/auth/login', '/api/alerts'];

/**
 * Generate a JWT token with operator role and 7-day expiry.
 */
export function generateToken(): string {
  return jwt.sign({ role: 'operator' }, config.jwtSecret, { expiresIn: '7d' });
}

/**
 * Verify a JWT token. Returns the decoded payload or null if invalid.
 */
export function verifyJWT(token: string): JWTPayload | null {
  let decoded: unknown;
  try {
    decoded = jwt.verify(token, config.jwtSecret);
  } catch {
    return null;
  }
  const parsed = payloadSchema.safeParse(decoded);
  return parsed.success ? parsed.data : null;
}

/**
 * Express middleware that enforces JWT authentication.
 * Skips public paths (health check, login, alert intake).
 */
export function authMiddleware(req: Request, res: Response, next: NextFunction): void {
  const path = req.baseUrl + req.path;
  if (PUBLIC_PATHS.some((p) => path === p)) {
    next();
    return;
  }

  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    res.status(401).json({ error: 'Authentication required' });
    return;
  }

  const token = authHeader.slice(7);
  const payload = verifyJWT(token);
  if (!payload) {
    res.status(401).json({ error: 'Invalid or expired token' });
    return;
  }

  // Downstream handlers read the operator from res.locals
  res.locals.user = payload;
  next();
}

/**
 * Express middleware for machine-to-machine endpoints (Alertmanager webhook).
 * Validates the X-API-Key header against WARDEN_API_KEY.
 */
export function apiKeyAuth(req: Request, res: Response, next: NextFunction): void {
  if (!config.apiKey) {
    res.status(503).json({ error: 'API key not configured on server' });
    return;
  }

  const provided = req.headers['x-api-key'];
  if (provided !== config.apiKey) {
    res.status(401).json({ error: 'Invalid API key' });
    return;
  }

  next();
}

const loginSchema = z.object({ password: z.string().min(1) });

/**
 * POST /api/auth/login handler.
 * Accepts { password } and returns a JWT token if the password matches.
 */
export function handleLogin(req: Request, res: Response): void {
  const body = loginSchema.safeParse(req.body);

  if (!body.success || body.data.password !== config.operatorPassword) {
    res.status(401).json({ error: 'Invalid password' });
    return;
  }

  const token = generateToken();
  res.json({
    token,
    expiresIn: '7d',
  });
}
