import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { UnauthorizedError } from '../../../application/errors.js';

export interface AuthRequest extends Request {
  userLogin?: string;
}

const BEARER_PREFIX = 'Bearer ';

const tokenClaimsSchema = z.object({
  sub: z.string().min(1),
  auth: z.array(z.string()).default([]),
});

type VerifiedClaims = z.infer<typeof tokenClaimsSchema>;

function readBearerToken(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith(BEARER_PREFIX)) {
    return null;
  }
  const token = authHeader.substring(BEARER_PREFIX.length).trim();
  return token.length > 0 ? token : null;
}

function verifyToken(token: string, jwtSecret: string): VerifiedClaims | null {
  try {
    const decoded = jwt.verify(token, jwtSecret, { algorithms: ['HS256'] });
    const claims = tokenClaimsSchema.safeParse(decoded);
    return claims.success ? claims.data : null;
  } catch (error) {
    if (error instanceof jwt.JsonWebTokenError) {
      return null;
    }
    throw error;
  }
}

/**
 * Requires a valid bearer token and records the caller's login on the request.
 */
export function authMiddleware(jwtSecret: string) {
  return (req: AuthRequest, _res: Response, next: NextFunction): void => {
    const token = readBearerToken(req);
    if (!token) {
      next(new UnauthorizedError('Missing or invalid authorization header'));
      return;
    }

    const claims = verifyToken(token, jwtSecret);
    if (!claims) {
      next(new UnauthorizedError('Invalid or expired token'));
      return;
    }

    req.userLogin = claims.sub;
    next();
  };
}

/**
 * Like authMiddleware, but lets anonymous and badly authenticated requests through.
 */
export function optionalAuthMiddleware(jwtSecret: string) {
  return (req: AuthRequest, _res: Response, next: NextFunction): void => {
    const token = readBearerToken(req);
    const claims = token ? verifyToken(token, jwtSecret) : null;
    if (claims) {
      req.userLogin = claims.sub;
    }
    next();
  };
}

export function getCurrentUserLogin(req: AuthRequest): string | null {
  return req.userLogin ?? null;
}
