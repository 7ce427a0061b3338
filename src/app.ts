import express, { Express, Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import { v4 as uuidv4 } from 'uuid';
import { config } from './utils/config.js';
import { logger, createRequestLogger } from './utils/logger.js';
import { pingRedis } from './utils/redis.js';
import { createOAuthRouter } from './oauth/routes.js';
import { createBearerAuth, requireScope } from './oauth/middleware.js';
import { formatScope } from './oauth/scope.js';
import type { OAuthServer } from './oauth/server.js';

// =============================================================================
// Type augmentation
// =============================================================================

declare global {
  namespace Express {
    interface Request {
      correlationId: string;
      log: typeof logger;
    }
  }
}

export interface AppOptions {
  resourceOwnerHeader: string;
}

const TOKEN_ENDPOINTS = ['/token', '/revoke', '/introspect'];

export function createApp(server: OAuthServer, options: AppOptions): Express {
  const app = express();

  // ===========================================================================
  // Middleware
  // ===========================================================================

  // Security headers
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'none'"],
          frameAncestors: ["'none'"],
          formAction: ["'self'"],
        },
      },
      hsts: config.nodeEnv === 'production',
      // CORS on the token endpoint is decided per request by the origin policy
      crossOriginResourcePolicy: false,
    })
  );

  // Cache-Control for endpoints that return credentials
  app.use((req: Request, res: Response, next: NextFunction) => {
    if (TOKEN_ENDPOINTS.includes(req.path) || req.path === '/authorize') {
      res.setHeader('Cache-Control', 'no-store');
      res.setHeader('Pragma', 'no-cache');
    }
    next();
  });

  // Body parsing (token endpoints take application/x-www-form-urlencoded)
  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: false, limit: '100kb' }));

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.get('x-correlation-id') || uuidv4();
    req.correlationId = correlationId;
    res.setHeader('X-Correlation-Id', correlationId);
    req.log = createRequestLogger(correlationId);
    next();
  });

  // Request logging
  app.use((req: Request, _res: Response, next: NextFunction) => {
    req.log.info({ method: req.method, path: req.path }, 'Request received');
    next();
  });

  // ===========================================================================
  // OAuth 2.0 Authorization Server
  // ===========================================================================

  app.use(createOAuthRouter(server.endpoints, { resourceOwnerHeader: options.resourceOwnerHeader }));

  // ===========================================================================
  // Protected resource
  // ===========================================================================

  app.get('/me', createBearerAuth(server.store), requireScope('read'), (req: Request, res: Response) => {
    const token = req.oauthToken;
    if (!token) {
      res.status(401).json({ error: 'invalid_token' });
      return;
    }

    res.json({
      client_id: token.clientId,
      user: token.userId,
      scope: formatScope(token.scopes),
    });
  });

  // ===========================================================================
  // Health check
  // ===========================================================================

  app.get('/health', async (_req: Request, res: Response) => {
    const checks: Record<string, { status: string; latencyMs?: number }> = {};

    // Check Redis connectivity if configured
    if (config.redisUrl) {
      const redisHealth = await pingRedis();
      checks['redis'] = {
        status: redisHealth.ok ? 'up' : 'down',
        latencyMs: redisHealth.latencyMs,
      };
    }

    const allUp = Object.values(checks).every((c) => c.status === 'up');

    res.status(allUp ? 200 : 503).json({
      status: allUp ? 'healthy' : 'degraded',
      uptime: Math.floor(process.uptime()),
      checks,
    });
  });

  // ===========================================================================
  // Error handling
  // ===========================================================================

  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    const log = req.log ?? logger;
    log.error({ err }, 'Unhandled error');

    const status = 'status' in err && typeof err.status === 'number' && err.status < 500 ? err.status : 500;
    res.status(status).json({
      error: status === 500 ? 'server_error' : 'invalid_request',
      correlationId: req.correlationId,
    });
  });

  return app;
}
