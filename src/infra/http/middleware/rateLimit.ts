import rateLimit from 'express-rate-limit';

/**
 * General API rate limiter (60 requests per minute per client).
 * Uses in-memory store (resets on server restart), one per app instance.
 */
export function createApiRateLimiter() {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: 60,
    message: { code: 'RATE_LIMITED', message: 'Too many requests, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Stricter limiter for credential and e-mail driven endpoints
 * (login, registration, reset-password init): 10 requests per minute per IP.
 */
export function createCredentialRateLimiter() {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: 10,
    message: { code: 'RATE_LIMITED', message: 'Too many attempts, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req) => {
      return req.ip || req.socket.remoteAddress || 'unknown';
    },
  });
}
