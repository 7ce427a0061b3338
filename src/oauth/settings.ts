/**
 * Per-deployment validator settings. Built once at startup and handed to
 * the validator and orchestrator; frozen so no request can alter them.
 */

import type { Config } from '../utils/config.js';
import type { CodeChallengeMethod } from './types.js';

export interface OAuthSettings {
  readonly allowedRedirectUriSchemes: readonly string[];
  readonly pkceRequired: boolean;
  readonly codeChallengeMethods: readonly CodeChallengeMethod[];
  /** Every scope the server knows about; the default permitted set for clients */
  readonly scopes: readonly string[];
  /** Granted when an authorization or client-credentials request names no scope */
  readonly defaultScopes: readonly string[];
  readonly authorizationCodeLifetimeSecs: number;
  readonly accessTokenLifetimeSecs: number;
  readonly refreshTokenLifetimeSecs: number;
}

export const DEFAULT_SETTINGS: OAuthSettings = Object.freeze({
  allowedRedirectUriSchemes: Object.freeze(['http', 'https']),
  pkceRequired: true,
  codeChallengeMethods: Object.freeze<CodeChallengeMethod[]>(['plain', 'S256']),
  scopes: Object.freeze(['read', 'write']),
  defaultScopes: Object.freeze(['read', 'write']),
  authorizationCodeLifetimeSecs: 60,
  accessTokenLifetimeSecs: 36000,
  refreshTokenLifetimeSecs: 1209600,
});

export function createOAuthSettings(overrides: Partial<OAuthSettings> = {}): OAuthSettings {
  const merged: OAuthSettings = { ...DEFAULT_SETTINGS, ...overrides };

  return Object.freeze({
    ...merged,
    allowedRedirectUriSchemes: Object.freeze([...merged.allowedRedirectUriSchemes]),
    codeChallengeMethods: Object.freeze([...merged.codeChallengeMethods]),
    scopes: Object.freeze([...merged.scopes]),
    defaultScopes: Object.freeze([...merged.defaultScopes]),
  });
}

export function settingsFromConfig(config: Config): OAuthSettings {
  return createOAuthSettings({
    allowedRedirectUriSchemes: config.oauthAllowedRedirectSchemes,
    pkceRequired: config.oauthPkceRequired,
    codeChallengeMethods: config.oauthCodeChallengeMethods,
    scopes: config.oauthScopes,
    defaultScopes: config.oauthDefaultScopes,
    authorizationCodeLifetimeSecs: config.oauthAuthCodeLifetimeSecs,
    accessTokenLifetimeSecs: config.oauthAccessTokenLifetimeSecs,
    refreshTokenLifetimeSecs: config.oauthRefreshTokenLifetimeSecs,
  });
}
