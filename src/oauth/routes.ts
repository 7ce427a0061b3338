/**
 * OAuth 2.0 Authorization Server Routes
 *
 * Thin Express adapter: requests are turned into transport records, handed
 * to the endpoints, and the resulting records written back verbatim.
 */

import { Router, Request, Response, NextFunction } from 'express';
import type { OAuthEndpoints } from './endpoints.js';
import type { OAuthRequest, OAuthResponse } from './types.js';

export interface OAuthRouterOptions {
  /** Header an upstream authenticator sets to the logged-in resource owner */
  resourceOwnerHeader: string;
}

type Handler = (req: Request, res: Response) => Promise<void>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Build the transport-neutral record. Repeated headers are joined the way
 * Node joins them; repeated parameters stay arrays for the parser to reject.
 */
export function toOAuthRequest(req: Request): OAuthRequest {
  const headers: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    headers[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }

  return {
    method: req.method,
    headers,
    query: isRecord(req.query) ? req.query : {},
    body: isRecord(req.body) ? req.body : {},
  };
}

export function sendOAuthResponse(res: Response, response: OAuthResponse): void {
  res.status(response.statusCode);
  for (const [name, value] of Object.entries(response.headers)) {
    res.setHeader(name, value);
  }

  if (response.body === null) {
    res.end();
    return;
  }
  res.json(response.body);
}

function handle(handler: Handler): (req: Request, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function createOAuthRouter(endpoints: OAuthEndpoints, options: OAuthRouterOptions): Router {
  const router = Router();

  /**
   * The resource owner must already be logged in; this server does not
   * authenticate users itself.
   */
  function resourceOwnerOf(req: Request, res: Response): string | null {
    const owner = req.get(options.resourceOwnerHeader);
    if (owner) {
      return owner;
    }

    req.log.info({ header: options.resourceOwnerHeader }, 'Authorization request without resource owner');
    res.status(401).json({
      error: 'login_required',
      error_description: 'The resource owner must be authenticated',
    });
    return null;
  }

  // ===========================================================================
  // Authorization Endpoint
  // ===========================================================================

  router.get(
    '/authorize',
    handle(async (req, res) => {
      if (!resourceOwnerOf(req, res)) return;
      sendOAuthResponse(res, await endpoints.describeAuthorization(toOAuthRequest(req)));
    })
  );

  router.post(
    '/authorize',
    handle(async (req, res) => {
      const owner = resourceOwnerOf(req, res);
      if (!owner) return;
      sendOAuthResponse(res, await endpoints.authorize(toOAuthRequest(req), owner));
    })
  );

  // ===========================================================================
  // Token, Revocation and Introspection Endpoints
  // ===========================================================================

  router.post(
    '/token',
    handle(async (req, res) => {
      sendOAuthResponse(res, await endpoints.token(toOAuthRequest(req)));
    })
  );

  router.post(
    '/revoke',
    handle(async (req, res) => {
      sendOAuthResponse(res, await endpoints.revoke(toOAuthRequest(req)));
    })
  );

  router.post(
    '/introspect',
    handle(async (req, res) => {
      sendOAuthResponse(res, await endpoints.introspect(toOAuthRequest(req)));
    })
  );

  return router;
}
