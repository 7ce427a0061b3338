/**
 * Wires the registry, store, origin policy, validator and orchestrator into
 * one authorization server.
 */

import { audit } from '../utils/audit.js';
import type { Config } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { createClientStore, seedClientsFromFile, type ClientStore } from './client-store.js';
import { OAuthEndpoints } from './endpoints.js';
import { createGrantStore, type GrantStore } from './grant-store.js';
import { GrantOrchestrator } from './orchestrator.js';
import { createOriginPolicy, denyAllOriginPolicy, type OriginPolicy } from './origin-policy.js';
import { settingsFromConfig, type OAuthSettings } from './settings.js';
import { RequestValidator } from './validator.js';

export interface OAuthServer {
  settings: OAuthSettings;
  clients: ClientStore;
  store: GrantStore;
  validator: RequestValidator;
  orchestrator: GrantOrchestrator;
  endpoints: OAuthEndpoints;
}

export interface OAuthServerOptions {
  settings: OAuthSettings;
  clients: ClientStore;
  store: GrantStore;
  /** Defaults to deny-all */
  originPolicy?: OriginPolicy;
}

export function createOAuthServer(options: OAuthServerOptions): OAuthServer {
  const { settings, clients, store } = options;

  const validator = new RequestValidator({
    settings,
    clients,
    store,
    originPolicy: options.originPolicy ?? denyAllOriginPolicy,
  });
  const orchestrator = new GrantOrchestrator({ settings, validator, store });

  return {
    settings,
    clients,
    store,
    validator,
    orchestrator,
    endpoints: new OAuthEndpoints(orchestrator),
  };
}

/**
 * Build the server described by the configuration: Redis-backed stores when
 * REDIS_URL is set, and clients seeded from OAUTH_CLIENTS_FILE if given.
 */
export async function createOAuthServerFromConfig(config: Config): Promise<OAuthServer> {
  const settings = settingsFromConfig(config);
  const clients = createClientStore();

  if (config.oauthClientsFile) {
    const count = await seedClientsFromFile(clients, config.oauthClientsFile, settings.allowedRedirectUriSchemes);
    audit({ event: 'oauth.clients_seeded', count, file: config.oauthClientsFile }, 'OAuth clients seeded');
  }

  logger.info(
    {
      originPolicy: config.oauthOriginPolicy,
      pkceRequired: settings.pkceRequired,
      redirectSchemes: settings.allowedRedirectUriSchemes,
    },
    'OAuth server configured'
  );

  return createOAuthServer({
    settings,
    clients,
    store: createGrantStore(),
    originPolicy: createOriginPolicy(config.oauthOriginPolicy, clients),
  });
}
