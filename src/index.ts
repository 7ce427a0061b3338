#!/usr/bin/env node

import { createApp } from './app.js';
import { createOAuthServerFromConfig } from './oauth/server.js';
import { config } from './utils/config.js';
import { logger } from './utils/logger.js';
import { pingRedis, closeRedis } from './utils/redis.js';

// =============================================================================
// Start server
// =============================================================================

// Startup checks
async function runStartupChecks(): Promise<void> {
  logger.info('Running startup checks...');

  if (config.redisUrl) {
    const redisHealth = await pingRedis();
    if (redisHealth.ok) {
      logger.info({ latencyMs: redisHealth.latencyMs }, 'Redis connectivity: OK');
    } else {
      throw new Error('Cannot connect to Redis - required for grant storage');
    }
  } else if (config.nodeEnv === 'production') {
    // This should be caught by config validation, but double-check
    throw new Error('Redis is required in production');
  } else {
    logger.warn('Using in-memory client and grant storage (not suitable for production)');
  }

  logger.info('Startup checks passed');
}

async function start(): Promise<void> {
  await runStartupChecks();

  const oauthServer = await createOAuthServerFromConfig(config);
  const app = createApp(oauthServer, { resourceOwnerHeader: config.oauthResourceOwnerHeader });

  const server = app.listen(config.port, () => {
    logger.info(
      {
        port: config.port,
        nodeEnv: config.nodeEnv,
        originPolicy: config.oauthOriginPolicy,
      },
      'oauth2-grant-server started'
    );
  });

  // Graceful shutdown
  const SHUTDOWN_TIMEOUT_MS = 30000;
  let shuttingDown = false;

  function gracefulShutdown(signal: string): void {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info({ signal }, 'Received shutdown signal, closing gracefully');

    // Force exit after timeout
    const forceTimer = setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceTimer.unref();

    server.close(() => {
      closeRedis()
        .then(() => {
          logger.info('Server and connections closed');
          clearTimeout(forceTimer);
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        });
    });
  }

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

start().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
