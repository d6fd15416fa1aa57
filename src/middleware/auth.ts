import { timingSafeEqual } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';

/**
 * Bearer-token check. With no configured token every request passes.
 */
export function createAuthMiddleware(accessToken: string | null) {
  const expectedBuf = accessToken ? Buffer.from(accessToken, 'utf-8') : null;

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!expectedBuf) {
      next();
      return;
    }

    const header = req.headers.authorization;
    if (!header) {
      res.status(401).json({ error: 'Authorization header is required' });
      return;
    }

    if (!header.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Invalid authorization scheme; use Bearer' });
      return;
    }

    const tokenBuf = Buffer.from(header.slice(7), 'utf-8');

    // timingSafeEqual requires same-length buffers
    const valid =
      tokenBuf.length === expectedBuf.length &&
      timingSafeEqual(tokenBuf, expectedBuf);

    if (!valid) {
      res.status(401).json({ error: 'Invalid token' });
      return;
    }

    next();
  };
}
