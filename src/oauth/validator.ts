/**
 * Request Validator
 *
 * Decides whether an authorization or token request may proceed. Reads the
 * client registry and the grant store but never writes; consuming codes and
 * issuing tokens is the orchestrator's job.
 */

import { logger } from '../utils/logger.js';
import { verifyClientSecret, type ClientRegistry } from './client-store.js';
import { deny, rejected, type Denial, type Result } from './errors.js';
import type { GrantStore } from './grant-store.js';
import type { OriginPolicy } from './origin-policy.js';
import { isCodeChallengeMethod, verifyCodeChallenge } from './pkce.js';
import { hasAllowedScheme, isRegisteredRedirectUri } from './redirect-uri.js';
import { parseScope, scopesOutside } from './scope.js';
import type { OAuthSettings } from './settings.js';
import type {
  AuthorizationCode,
  AuthorizationRequest,
  ClientCredentials,
  CodeChallengeMethod,
  GrantType,
  OAuthClient,
  TokenRecord,
  TokenRequest,
} from './types.js';
import { GRANT_TYPES } from './types.js';

export interface RequestValidatorDeps {
  settings: OAuthSettings;
  clients: ClientRegistry;
  store: GrantStore;
  originPolicy: OriginPolicy;
}

export interface AuthorizationDecision {
  client: OAuthClient;
  redirectUri: string;
  redirectUriExplicit: boolean;
  scopes: string[];
  state: string | null;
  codeChallenge?: string;
  codeChallengeMethod?: CodeChallengeMethod;
}

/**
 * `redirectUri` is set once the redirect URI has been verified; only then
 * may the error be reported by redirecting back to the client.
 */
export interface AuthorizationDenial extends Denial {
  redirectUri: string | null;
  state: string | null;
}

export type TokenDecision =
  | { grantType: 'authorization_code'; client: OAuthClient; scopes: string[]; code: AuthorizationCode }
  | {
      grantType: 'refresh_token';
      client: OAuthClient;
      scopes: string[];
      refreshToken: TokenRecord;
      presentedToken: string;
    }
  | { grantType: 'client_credentials'; client: OAuthClient; scopes: string[] };

function isGrantType(value: string): value is GrantType {
  return GRANT_TYPES.some((grantType) => grantType === value);
}

export class RequestValidator {
  private readonly settings: OAuthSettings;
  private readonly clients: ClientRegistry;
  private readonly store: GrantStore;
  private readonly originPolicy: OriginPolicy;

  constructor(deps: RequestValidatorDeps) {
    this.settings = deps.settings;
    this.clients = deps.clients;
    this.store = deps.store;
    this.originPolicy = deps.originPolicy;
  }

  // ===========================================================================
  // Authorization endpoint
  // ===========================================================================

  async validateAuthorizationRequest(
    request: AuthorizationRequest
  ): Promise<Result<AuthorizationDecision, AuthorizationDenial>> {
    const state = request.state;
    const fail = (
      denial: Denial,
      redirectUri: string | null
    ): Result<AuthorizationDecision, AuthorizationDenial> => ({
      ok: false,
      error: { ...denial, redirectUri, state },
    });

    // Errors before the redirect URI is verified are shown to the user agent, never redirected
    if (!request.clientId) {
      return fail(deny('InvalidRequest', 'missing_client_id'), null);
    }

    const client = await this.clients.findClient(request.clientId);
    if (!client) {
      return fail(deny('InvalidClient', 'unknown_client', request.clientId), null);
    }
    const clientId = client.clientId;

    let redirectUri: string;
    const redirectUriExplicit = request.redirectUri !== null;
    if (request.redirectUri === null) {
      const [onlyUri] = client.redirectUris;
      if (client.redirectUris.length !== 1 || onlyUri === undefined) {
        return fail(deny('InvalidRequest', 'missing_redirect_uri', clientId), null);
      }
      redirectUri = onlyUri;
    } else {
      if (!isRegisteredRedirectUri(request.redirectUri, client.redirectUris)) {
        return fail(deny('InvalidRedirectURI', 'redirect_uri_not_registered', clientId), null);
      }
      redirectUri = request.redirectUri;
    }

    if (!hasAllowedScheme(redirectUri, this.settings.allowedRedirectUriSchemes)) {
      return fail(deny('InvalidRedirectURI', 'redirect_uri_scheme_not_allowed', clientId), null);
    }

    // From here on errors go back to the client through the redirect URI
    if (!request.responseType) {
      return fail(deny('InvalidRequest', 'missing_response_type', clientId), redirectUri);
    }
    if (request.responseType !== 'code') {
      return fail(deny('UnsupportedResponseType', 'unsupported_response_type', clientId), redirectUri);
    }
    if (!client.grantTypes.includes('authorization_code')) {
      return fail(deny('UnauthorizedClient', 'authorization_code_not_allowed', clientId), redirectUri);
    }

    const scopes = this.resolveRequestedScopes(client, request.scope);
    if (!scopes.ok) {
      return fail(scopes.error, redirectUri);
    }

    const decision: AuthorizationDecision = {
      client,
      redirectUri,
      redirectUriExplicit,
      scopes: scopes.value,
      state,
    };

    if (request.codeChallenge) {
      const method = request.codeChallengeMethod ?? 'plain';
      if (!isCodeChallengeMethod(method) || !this.settings.codeChallengeMethods.includes(method)) {
        return fail(deny('InvalidRequest', 'unsupported_code_challenge_method', clientId), redirectUri);
      }
      decision.codeChallenge = request.codeChallenge;
      decision.codeChallengeMethod = method;
    } else if (this.settings.pkceRequired) {
      return fail(deny('InvalidRequest', 'missing_code_challenge', clientId), redirectUri);
    }

    return { ok: true, value: decision };
  }

  // ===========================================================================
  // Token endpoint
  // ===========================================================================

  async validateTokenRequest(request: TokenRequest): Promise<Result<TokenDecision>> {
    if (!request.grantType) {
      return rejected('InvalidRequest', 'missing_grant_type', request.credentials.clientId ?? undefined);
    }
    const grantType = request.grantType;
    if (!isGrantType(grantType)) {
      return rejected('UnsupportedGrantType', 'unsupported_grant_type', request.credentials.clientId ?? undefined);
    }

    const authenticated = await this.authenticateClient(request.credentials);
    if (!authenticated.ok) {
      return authenticated;
    }
    const client = authenticated.value;

    if (!client.grantTypes.includes(grantType)) {
      return rejected('UnauthorizedGrant', `${grantType}_not_allowed`, client.clientId);
    }

    switch (grantType) {
      case 'authorization_code':
        return this.validateAuthorizationCodeGrant(request, client);
      case 'refresh_token':
        return this.validateRefreshTokenGrant(request, client);
      case 'client_credentials':
        return this.validateClientCredentialsGrant(request, client);
    }
  }

  /**
   * Confidential clients must present their secret, public clients must not
   * present one. Every failure is reported as the same `InvalidClient`.
   */
  async authenticateClient(credentials: ClientCredentials): Promise<Result<OAuthClient>> {
    if (!credentials.clientId) {
      return rejected('InvalidClient', 'missing_client_id');
    }

    const client = await this.clients.findClient(credentials.clientId);
    if (!client) {
      return rejected('InvalidClient', 'unknown_client', credentials.clientId);
    }

    if (client.clientType === 'public') {
      if (credentials.clientSecret) {
        return rejected('InvalidClient', 'public_client_presented_secret', client.clientId);
      }
      return { ok: true, value: client };
    }

    if (!credentials.clientSecret) {
      return rejected('InvalidClient', 'missing_client_secret', client.clientId);
    }
    if (!client.clientSecretHash || !verifyClientSecret(credentials.clientSecret, client.clientSecretHash)) {
      return rejected('InvalidClient', 'bad_client_secret', client.clientId);
    }

    return { ok: true, value: client };
  }

  private async validateAuthorizationCodeGrant(
    request: TokenRequest,
    client: OAuthClient
  ): Promise<Result<TokenDecision>> {
    const clientId = client.clientId;
    if (!request.code) {
      return rejected('InvalidRequest', 'missing_code', clientId);
    }

    const code = await this.store.findCode(request.code);
    if (!code) {
      return rejected('InvalidGrant', 'code_not_found', clientId);
    }
    if (code.consumed) {
      return rejected('InvalidGrant', 'code_consumed', clientId);
    }
    if (Date.now() > code.expiresAt) {
      return rejected('InvalidGrant', 'code_expired', clientId);
    }
    if (code.clientId !== clientId) {
      return rejected('InvalidGrant', 'code_client_mismatch', clientId);
    }

    if (code.redirectUriExplicit || request.redirectUri !== null) {
      if (request.redirectUri !== code.redirectUri) {
        return rejected('InvalidGrant', 'redirect_uri_mismatch', clientId);
      }
    }

    if (code.codeChallenge && code.codeChallengeMethod) {
      if (!request.codeVerifier) {
        return rejected('InvalidRequest', 'missing_code_verifier', clientId);
      }
      if (!verifyCodeChallenge(request.codeVerifier, code.codeChallenge, code.codeChallengeMethod)) {
        return rejected('InvalidGrant', 'code_verifier_mismatch', clientId);
      }
    } else if (request.codeVerifier) {
      return rejected('InvalidGrant', 'unexpected_code_verifier', clientId);
    }

    const scopes = this.narrowScopes(request.scope, code.scopes, clientId);
    if (!scopes.ok) return scopes;

    return {
      ok: true,
      value: { grantType: 'authorization_code', client, scopes: scopes.value, code },
    };
  }

  private async validateRefreshTokenGrant(
    request: TokenRequest,
    client: OAuthClient
  ): Promise<Result<TokenDecision>> {
    const clientId = client.clientId;
    if (!request.refreshToken) {
      return rejected('InvalidRequest', 'missing_refresh_token', clientId);
    }

    const refreshToken = await this.store.findToken(request.refreshToken, 'refresh_token');
    if (!refreshToken) {
      return rejected('InvalidGrant', 'refresh_token_not_found', clientId);
    }
    if (refreshToken.clientId !== clientId) {
      return rejected('InvalidGrant', 'refresh_token_client_mismatch', clientId);
    }

    const scopes = this.narrowScopes(request.scope, refreshToken.scopes, clientId);
    if (!scopes.ok) return scopes;

    return {
      ok: true,
      value: {
        grantType: 'refresh_token',
        client,
        scopes: scopes.value,
        refreshToken,
        presentedToken: request.refreshToken,
      },
    };
  }

  private async validateClientCredentialsGrant(
    request: TokenRequest,
    client: OAuthClient
  ): Promise<Result<TokenDecision>> {
    if (client.clientType !== 'confidential') {
      return rejected('UnauthorizedClient', 'public_client_credentials_grant', client.clientId);
    }

    const scopes = this.resolveRequestedScopes(client, request.scope);
    if (!scopes.ok) return scopes;

    return {
      ok: true,
      value: { grantType: 'client_credentials', client, scopes: scopes.value },
    };
  }

  // ===========================================================================
  // Scopes
  // ===========================================================================

  /**
   * Requested scopes (or the server defaults) checked against what the
   * client may ask for.
   */
  private resolveRequestedScopes(client: OAuthClient, scope: string | null): Result<string[]> {
    const requested = parseScope(scope);
    const scopes = requested.length > 0 ? requested : [...this.settings.defaultScopes];
    const permitted = client.allowedScopes ?? this.settings.scopes;

    const outside = scopesOutside(scopes, permitted);
    if (outside.length > 0) {
      logger.debug({ clientId: client.clientId, outside }, 'Requested scopes exceed permitted set');
      return rejected('InvalidScope', 'scope_not_permitted', client.clientId);
    }

    return { ok: true, value: scopes };
  }

  /**
   * At exchange time a scope may only narrow what was authorized. A
   * superset is rejected, not silently trimmed.
   */
  private narrowScopes(scope: string | null, granted: string[], clientId: string): Result<string[]> {
    const requested = parseScope(scope);
    if (requested.length === 0) {
      return { ok: true, value: granted };
    }
    if (scopesOutside(requested, granted).length > 0) {
      return rejected('InvalidScope', 'scope_exceeds_grant', clientId);
    }
    return { ok: true, value: requested };
  }

  // ===========================================================================
  // CORS
  // ===========================================================================

  /**
   * Whether a token response may carry `Access-Control-Allow-Origin` for
   * this origin. Absent origin is never allowed and the policy is not asked.
   */
  async isOriginAllowed(clientId: string, origin: string | null | undefined): Promise<boolean> {
    if (!origin) {
      return false;
    }
    return this.originPolicy.isOriginAllowed(clientId, origin);
  }
}
