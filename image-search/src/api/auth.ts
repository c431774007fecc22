import crypto from 'crypto';
import type { RequestHandler } from 'express';

function tokensMatch(a: string, b: string): boolean {
  const left = crypto.createHash('sha256').update(a).digest();
  const right = crypto.createHash('sha256').update(b).digest();
  return crypto.timingSafeEqual(left, right);
}

/**
 * Requires `Authorization: Bearer <token>` matching the pre-shared API token.
 * Identity is established upstream; this only checks the token is present and right.
 */
export function requireBearerToken(expected: string): RequestHandler {
  return (req, res, next) => {
    const header = req.headers.authorization;
    if (!header) {
      res.status(401).json({ error: 'Missing Authorization header' });
      return;
    }
    if (!header.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Authorization header must use Bearer scheme' });
      return;
    }
    if (!tokensMatch(header.slice('Bearer '.length), expected)) {
      res.status(403).json({ error: 'Invalid API token' });
      return;
    }
    next();
  };
}
