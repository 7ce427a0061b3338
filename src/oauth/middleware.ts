/**
 * Bearer Token Middleware for resources protected by this server's
 * access tokens (RFC 6750).
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import type { GrantStore } from './grant-store.js';
import type { TokenRecord } from './types.js';

const WWW_AUTHENTICATE_REALM = 'Bearer realm="oauth"';

/**
 * Extended request with OAuth info
 */
declare global {
  namespace Express {
    interface Request {
      oauthToken?: TokenRecord;
    }
  }
}

/**
 * Extract Bearer token from Authorization header
 */
export function extractBearerToken(req: Request): string | null {
  const authHeader = req.headers.authorization;

  if (!authHeader || !/^bearer /i.test(authHeader)) {
    return null;
  }

  const token = authHeader.slice(7).trim();
  return token || null;
}

/**
 * Require a live access token. Sets req.oauthToken on success.
 */
export function createBearerAuth(store: GrantStore): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const token = extractBearerToken(req);

    if (!token) {
      res.setHeader('WWW-Authenticate', WWW_AUTHENTICATE_REALM);
      res.status(401).json({
        error: 'invalid_request',
        error_description: 'Bearer token required',
      });
      return;
    }

    store
      .findToken(token, 'access_token')
      .then((record) => {
        if (!record) {
          res.setHeader('WWW-Authenticate', `${WWW_AUTHENTICATE_REALM}, error="invalid_token"`);
          res.status(401).json({
            error: 'invalid_token',
            error_description: 'Bearer token is invalid or expired',
          });
          return;
        }

        req.oauthToken = record;
        req.log.debug({ userId: record.userId, clientId: record.clientId }, 'Bearer token authenticated');
        next();
      })
      .catch(next);
  };
}

/**
 * Scope validation middleware factory. Must run after the bearer auth.
 */
export function requireScope(requiredScope: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!req.oauthToken?.scopes.includes(requiredScope)) {
      res.setHeader('WWW-Authenticate', `${WWW_AUTHENTICATE_REALM}, error="insufficient_scope", scope="${requiredScope}"`);
      res.status(403).json({
        error: 'insufficient_scope',
        error_description: `Required scope: ${requiredScope}`,
      });
      return;
    }

    next();
  };
}
