/**
 * Grant Orchestrator
 *
 * Runs one grant attempt end-to-end:
 *
 *   START -> VALIDATED -> ISSUED -> RESPONDED
 *     |          |
 *     v          v
 *   REJECTED   STORE_FAILURE
 *
 * Every call resolves with the terminal state and the response to send.
 * Nothing here throws; store and registry errors become `ServerError`.
 */

import { audit } from '../utils/audit.js';
import { logger } from '../utils/logger.js';
import { deny, httpStatus, toErrorBody, wireError, type Denial, type Result } from './errors.js';
import { generateOpaqueToken, hashToken, type CodeConsumeFailure, type GrantStore } from './grant-store.js';
import { corsHeaders } from './origin-policy.js';
import { appendQueryParams } from './redirect-uri.js';
import { formatScope } from './scope.js';
import type { OAuthSettings } from './settings.js';
import type {
  AuthorizationApproval,
  AuthorizationCode,
  AuthorizationRequest,
  IntrospectionResponse,
  OAuthClient,
  OAuthResponse,
  TokenLookupRequest,
  TokenRecord,
  TokenRequest,
  TokenResponse,
} from './types.js';
import type {
  AuthorizationDecision,
  AuthorizationDenial,
  RequestValidator,
  TokenDecision,
} from './validator.js';

export type GrantState = 'START' | 'VALIDATED' | 'REJECTED' | 'ISSUED' | 'STORE_FAILURE' | 'RESPONDED';

export type TerminalState = Extract<GrantState, 'REJECTED' | 'STORE_FAILURE' | 'RESPONDED'>;

export interface GrantOutcome {
  state: TerminalState;
  response: OAuthResponse;
  denial?: Denial;
}

export interface GrantOrchestratorDeps {
  settings: OAuthSettings;
  validator: RequestValidator;
  store: GrantStore;
}

const TOKEN_HEADERS = {
  'Content-Type': 'application/json',
  'Cache-Control': 'no-store',
  Pragma: 'no-cache',
} as const;

const CODE_CONSUME_REASONS: Record<CodeConsumeFailure, string> = {
  not_found: 'code_not_found',
  consumed: 'code_consumed',
  expired: 'code_expired',
};

function jsonResponse(statusCode: number, body: object, headers: Record<string, string> = {}): OAuthResponse {
  return { statusCode, headers: { ...TOKEN_HEADERS, ...headers }, body };
}

function redirectResponse(location: string): OAuthResponse {
  return { statusCode: 302, headers: { Location: location }, body: null };
}

/**
 * Token endpoint error. `invalid_client` for a client that tried HTTP
 * Basic carries the RFC 6749 5.2 challenge.
 */
export function tokenErrorResponse(denial: Denial, usedBasicAuth = false): OAuthResponse {
  const headers: Record<string, string> = {};
  if (denial.kind === 'InvalidClient' && usedBasicAuth) {
    headers['WWW-Authenticate'] = 'Basic realm="oauth"';
  }
  return jsonResponse(httpStatus(denial.kind), toErrorBody(denial), headers);
}

function logDenial(denial: Denial, context: Record<string, unknown>): void {
  const entry = { ...context, kind: denial.kind, reason: denial.reason, clientId: denial.clientId };
  if (denial.kind === 'ServerError') {
    logger.error(entry, 'OAuth request failed');
  } else {
    logger.warn(entry, 'OAuth request denied');
  }
  audit({ event: 'oauth.grant_denied', clientId: denial.clientId, reason: denial.reason }, 'Grant denied');
}

export class GrantOrchestrator {
  private readonly settings: OAuthSettings;
  private readonly validator: RequestValidator;
  private readonly store: GrantStore;

  constructor(deps: GrantOrchestratorDeps) {
    this.settings = deps.settings;
    this.validator = deps.validator;
    this.store = deps.store;
  }

  // ===========================================================================
  // Authorization endpoint
  // ===========================================================================

  /**
   * Validate an authorization request before the resource owner is asked.
   * On success the body describes the request for an external consent UI;
   * nothing is persisted.
   */
  async prepareAuthorization(request: AuthorizationRequest): Promise<GrantOutcome> {
    const validation = await this.validateAuthorization(request);
    if (!validation.ok) {
      return this.rejectAuthorization(validation.error);
    }

    const decision = validation.value;
    const body: Record<string, string> = {
      client_id: decision.client.clientId,
      client_name: decision.client.clientName,
      redirect_uri: decision.redirectUri,
      response_type: 'code',
      scope: formatScope(decision.scopes),
    };
    if (decision.state !== null) body['state'] = decision.state;
    if (decision.codeChallenge && decision.codeChallengeMethod) {
      body['code_challenge'] = decision.codeChallenge;
      body['code_challenge_method'] = decision.codeChallengeMethod;
    }

    return { state: 'RESPONDED', response: jsonResponse(200, body) };
  }

  async authorize(request: AuthorizationApproval): Promise<GrantOutcome> {
    const validation = await this.validateAuthorization(request);
    if (!validation.ok) {
      return this.rejectAuthorization(validation.error);
    }

    const decision = validation.value;
    const clientId = decision.client.clientId;

    if (!request.allow) {
      return this.rejectAuthorization({
        ...deny('AccessDenied', 'resource_owner_denied', clientId),
        redirectUri: decision.redirectUri,
        state: decision.state,
      });
    }

    // VALIDATED
    const now = Date.now();
    const authCode: AuthorizationCode = {
      code: generateOpaqueToken(),
      clientId,
      userId: request.resourceOwner,
      scopes: decision.scopes,
      redirectUri: decision.redirectUri,
      redirectUriExplicit: decision.redirectUriExplicit,
      createdAt: now,
      expiresAt: now + this.settings.authorizationCodeLifetimeSecs * 1000,
      consumed: false,
    };
    if (decision.codeChallenge && decision.codeChallengeMethod) {
      authCode.codeChallenge = decision.codeChallenge;
      authCode.codeChallengeMethod = decision.codeChallengeMethod;
    }

    try {
      await this.store.putCode(authCode);
    } catch (err) {
      const denial = deny('ServerError', 'store_put_code_failed', clientId);
      logger.error({ err, clientId }, 'Failed to persist authorization code');
      return {
        state: 'STORE_FAILURE',
        denial,
        response: this.errorRedirect(decision.redirectUri, denial, decision.state),
      };
    }

    // ISSUED
    audit(
      { event: 'oauth.code_issued', clientId, userId: request.resourceOwner, scope: formatScope(decision.scopes) },
      'Authorization code issued'
    );

    return {
      state: 'RESPONDED',
      response: redirectResponse(
        appendQueryParams(decision.redirectUri, { code: authCode.code, state: decision.state })
      ),
    };
  }

  private async validateAuthorization(
    request: AuthorizationRequest
  ): Promise<Result<AuthorizationDecision, AuthorizationDenial>> {
    try {
      return await this.validator.validateAuthorizationRequest(request);
    } catch (err) {
      logger.error({ err, clientId: request.clientId }, 'Authorization validation failed unexpectedly');
      return {
        ok: false,
        error: { ...deny('ServerError', 'validator_exception'), redirectUri: null, state: request.state },
      };
    }
  }

  private rejectAuthorization(denial: AuthorizationDenial): GrantOutcome {
    logDenial(denial, { endpoint: 'authorize' });

    const response = denial.redirectUri
      ? this.errorRedirect(denial.redirectUri, denial, denial.state)
      : jsonResponse(httpStatus(denial.kind), toErrorBody(denial));

    return { state: 'REJECTED', denial, response };
  }

  private errorRedirect(redirectUri: string, denial: Denial, state: string | null): OAuthResponse {
    return redirectResponse(
      appendQueryParams(redirectUri, {
        error: wireError(denial.kind),
        error_description: denial.description,
        state,
      })
    );
  }

  // ===========================================================================
  // Token endpoint
  // ===========================================================================

  async exchangeToken(request: TokenRequest): Promise<GrantOutcome> {
    const usedBasicAuth = request.credentials.method === 'client_secret_basic';
    const reject = (denial: Denial, state: TerminalState = 'REJECTED'): GrantOutcome => {
      logDenial(denial, { endpoint: 'token', grantType: request.grantType });
      return { state, denial, response: tokenErrorResponse(denial, usedBasicAuth) };
    };

    let validation: Result<TokenDecision>;
    try {
      validation = await this.validator.validateTokenRequest(request);
    } catch (err) {
      logger.error({ err, clientId: request.credentials.clientId }, 'Token validation failed unexpectedly');
      return reject(deny('ServerError', 'validator_exception', request.credentials.clientId ?? undefined));
    }
    if (!validation.ok) {
      return reject(validation.error);
    }

    // VALIDATED
    const decision = validation.value;
    const clientId = decision.client.clientId;

    let issued: { response: TokenResponse; records: TokenRecord[] };
    try {
      const claimed = await this.claimGrant(decision);
      if (claimed) {
        return reject(claimed);
      }
      issued = this.mintTokens(decision);
      await this.store.putTokens(issued.records);
    } catch (err) {
      logger.error({ err, clientId, grantType: decision.grantType }, 'Failed to issue tokens');
      return reject(deny('ServerError', 'store_failure', clientId), 'STORE_FAILURE');
    }

    // ISSUED
    audit(
      {
        event: decision.grantType === 'refresh_token' ? 'oauth.token_refreshed' : 'oauth.token_issued',
        clientId,
        userId: this.grantUserId(decision),
        grantType: decision.grantType,
        scope: issued.response.scope,
      },
      'Tokens issued'
    );

    const allowed = await this.originAllowed(clientId, request.origin);
    return {
      state: 'RESPONDED',
      response: jsonResponse(200, issued.response, corsHeaders(request.origin, allowed)),
    };
  }

  /**
   * Atomically take ownership of the code or refresh token being exchanged.
   * Returns a denial when a concurrent request got there first.
   */
  private async claimGrant(decision: TokenDecision): Promise<Denial | null> {
    const clientId = decision.client.clientId;

    switch (decision.grantType) {
      case 'authorization_code': {
        const consumed = await this.store.consumeCodeAtomic(decision.code.code);
        return consumed.ok ? null : deny('InvalidGrant', CODE_CONSUME_REASONS[consumed.error], clientId);
      }
      case 'refresh_token': {
        // The validator saw the token, but only the caller that removes it may rotate it
        const revoked = await this.store.revoke(decision.presentedToken);
        return revoked ? null : deny('InvalidGrant', 'refresh_token_already_used', clientId);
      }
      case 'client_credentials':
        return null;
    }
  }

  private grantUserId(decision: TokenDecision): string | null {
    switch (decision.grantType) {
      case 'authorization_code':
        return decision.code.userId;
      case 'refresh_token':
        return decision.refreshToken.userId;
      case 'client_credentials':
        return null;
    }
  }

  private mintTokens(decision: TokenDecision): { response: TokenResponse; records: TokenRecord[] } {
    const now = Date.now();
    const client = decision.client;
    const userId = this.grantUserId(decision);

    const accessToken = generateOpaqueToken();
    const access: TokenRecord = {
      tokenHash: hashToken(accessToken),
      kind: 'access_token',
      clientId: client.clientId,
      userId,
      scopes: decision.scopes,
      createdAt: now,
      expiresAt: now + this.settings.accessTokenLifetimeSecs * 1000,
    };

    const response: TokenResponse = {
      access_token: accessToken,
      token_type: 'Bearer',
      expires_in: this.settings.accessTokenLifetimeSecs,
      scope: formatScope(decision.scopes),
    };

    if (!this.issuesRefreshToken(decision, client)) {
      return { response, records: [access] };
    }

    const refreshToken = generateOpaqueToken(48);
    const refresh: TokenRecord = {
      tokenHash: hashToken(refreshToken),
      kind: 'refresh_token',
      clientId: client.clientId,
      userId,
      scopes: decision.grantType === 'refresh_token' ? decision.refreshToken.scopes : decision.scopes,
      createdAt: now,
      expiresAt: now + this.settings.refreshTokenLifetimeSecs * 1000,
      linkedTokenHash: access.tokenHash,
    };
    if (decision.grantType === 'refresh_token') {
      refresh.rotatedFrom = decision.refreshToken.tokenHash;
      access.rotatedFrom = decision.refreshToken.tokenHash;
    }
    access.linkedTokenHash = refresh.tokenHash;
    response.refresh_token = refreshToken;

    return { response, records: [access, refresh] };
  }

  private issuesRefreshToken(decision: TokenDecision, client: OAuthClient): boolean {
    return decision.grantType !== 'client_credentials' && client.grantTypes.includes('refresh_token');
  }

  private async originAllowed(clientId: string, origin: string | null): Promise<boolean> {
    try {
      return await this.validator.isOriginAllowed(clientId, origin);
    } catch (err) {
      // The tokens are already issued; a broken policy only costs the CORS header
      logger.error({ err, clientId }, 'Origin policy failed, omitting CORS header');
      return false;
    }
  }

  // ===========================================================================
  // Revocation (RFC 7009)
  // ===========================================================================

  async revoke(request: TokenLookupRequest): Promise<GrantOutcome> {
    const authenticated = await this.authenticateLookup(request);
    if (!authenticated.ok) {
      return authenticated.outcome;
    }
    const { client, token } = authenticated;

    try {
      const record = await this.store.findToken(token);
      if (record && record.clientId === client.clientId) {
        await this.store.revoke(token);
        audit({ event: 'oauth.token_revoked', clientId: client.clientId, kind: record.kind }, 'Token revoked');
      } else if (record) {
        logger.warn({ clientId: client.clientId, owner: record.clientId }, 'Refusing to revoke another client\'s token');
      }
    } catch (err) {
      logger.error({ err, clientId: client.clientId }, 'Token revocation failed');
      const denial = deny('ServerError', 'store_failure', client.clientId);
      return { state: 'STORE_FAILURE', denial, response: tokenErrorResponse(denial) };
    }

    // Unknown tokens are not an error (RFC 7009 2.2)
    return {
      state: 'RESPONDED',
      response: { statusCode: 200, headers: { 'Cache-Control': 'no-store', Pragma: 'no-cache' }, body: null },
    };
  }

  // ===========================================================================
  // Introspection (RFC 7662)
  // ===========================================================================

  async introspect(request: TokenLookupRequest): Promise<GrantOutcome> {
    const authenticated = await this.authenticateLookup(request);
    if (!authenticated.ok) {
      return authenticated.outcome;
    }
    const { client, token } = authenticated;

    let record: TokenRecord | null;
    try {
      record = await this.store.findToken(token);
    } catch (err) {
      logger.error({ err, clientId: client.clientId }, 'Token introspection failed');
      const denial = deny('ServerError', 'store_failure', client.clientId);
      return { state: 'STORE_FAILURE', denial, response: tokenErrorResponse(denial) };
    }

    let body: IntrospectionResponse = { active: false };
    if (record && record.clientId === client.clientId) {
      body = {
        active: true,
        scope: formatScope(record.scopes),
        client_id: record.clientId,
        token_type: record.kind === 'access_token' ? 'Bearer' : 'refresh_token',
        exp: Math.floor(record.expiresAt / 1000),
        iat: Math.floor(record.createdAt / 1000),
      };
      if (record.userId) {
        body.username = record.userId;
      }
    }

    return { state: 'RESPONDED', response: jsonResponse(200, body) };
  }

  private async authenticateLookup(
    request: TokenLookupRequest
  ): Promise<{ ok: true; client: OAuthClient; token: string } | { ok: false; outcome: GrantOutcome }> {
    const usedBasicAuth = request.credentials.method === 'client_secret_basic';
    const reject = (denial: Denial): { ok: false; outcome: GrantOutcome } => {
      logDenial(denial, { endpoint: 'token_lookup' });
      return { ok: false, outcome: { state: 'REJECTED', denial, response: tokenErrorResponse(denial, usedBasicAuth) } };
    };

    let authenticated: Result<OAuthClient>;
    try {
      authenticated = await this.validator.authenticateClient(request.credentials);
    } catch (err) {
      logger.error({ err, clientId: request.credentials.clientId }, 'Client authentication failed unexpectedly');
      return reject(deny('ServerError', 'validator_exception'));
    }
    if (!authenticated.ok) {
      return reject(authenticated.error);
    }
    if (!request.token) {
      return reject(deny('InvalidRequest', 'missing_token', authenticated.value.clientId));
    }

    return { ok: true, client: authenticated.value, token: request.token };
  }
}
