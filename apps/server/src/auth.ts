import type { Request, Response, NextFunction, RequestHandler } from 'express';

/** The credential of a `Bearer` Authorization header, or null for any other header */
export function parseBearer(header: string | undefined): string | null {
  if (!header) return null;
  const [scheme, credentials] = header.trim().split(/\s+/, 2);
  if (scheme?.toLowerCase() !== 'bearer' || !credentials) return null;
  return credentials;
}

/**
 * Express middleware that admits requests carrying one of `tokens`.
 * No usable header is 403; an unknown token is 401.
 */
export function createAuthMiddleware(tokens: ReadonlySet<string>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const token = parseBearer(req.headers.authorization);
    if (token === null) {
      res.status(403).json({ code: 'not_authenticated', message: 'Not authenticated' });
      return;
    }

    if (!tokens.has(token)) {
      res.setHeader('WWW-Authenticate', 'Bearer');
      res.status(401).json({ code: 'invalid_token', message: 'Invalid authentication credentials' });
      return;
    }

    next();
  };
}
