import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { IncomingMessage } from 'http';

/**
 * Checks a presented token against the configured one.
 * With no token configured, every request passes.
 */
export function validateToken(token: string | undefined, expectedToken: string | undefined): boolean {
  if (!expectedToken) {
    return true;
  }
  return token === expectedToken;
}

/**
 * Extracts token from Authorization header (Bearer) or query parameter 'token'.
 */
export function extractToken(req: Request | IncomingMessage): string | undefined {
  const authHeader = req.headers['authorization'];
  if (authHeader) {
    const headerValue = Array.isArray(authHeader) ? authHeader[0] : authHeader;
    if (headerValue && headerValue.startsWith('Bearer ')) {
      return headerValue.substring(7);
    }
  }

  // WebSocket upgrades only carry the token in the URL
  if (req.url) {
    const url = new URL(req.url, 'http://localhost');
    const queryToken = url.searchParams.get('token');
    if (queryToken) {
      return queryToken;
    }
  }

  return undefined;
}

/**
 * Express middleware rejecting requests without the configured token.
 */
export function createAuthMiddleware(expectedToken: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!expectedToken) {
      next();
      return;
    }

    const token = extractToken(req);
    if (!validateToken(token, expectedToken)) {
      console.warn(`[auth] Unauthorized access attempt from ${req.ip}`);
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }

    next();
  };
}
