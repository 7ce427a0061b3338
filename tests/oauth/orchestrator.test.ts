import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryGrantStore, hashToken } from '../../src/oauth/grant-store.js';
import type { OAuthServer } from '../../src/oauth/server.js';
import type { AuthorizationCode, TokenRecord, TokenLookupRequest } from '../../src/oauth/types.js';
import {
  CHALLENGE,
  approval,
  basicCredentials,
  codeExchange,
  createTestServer,
  obtainCode,
  refreshExchange,
  stringField,
} from '../helpers/oauth.js';

class FailingGrantStore extends MemoryGrantStore {
  failPutCode = false;
  failPutTokens = false;

  override async putCode(code: AuthorizationCode): Promise<void> {
    if (this.failPutCode) throw new Error('store unavailable');
    return super.putCode(code);
  }

  override async putTokens(records: TokenRecord[]): Promise<void> {
    if (this.failPutTokens) throw new Error('store unavailable');
    return super.putTokens(records);
  }
}

function lookup(token: string | null, clientId = 'web-app'): TokenLookupRequest {
  return { credentials: basicCredentials(clientId), token, tokenTypeHint: null };
}

describe('GrantOrchestrator', () => {
  let store: FailingGrantStore;
  let server: OAuthServer;

  beforeEach(async () => {
    store = new FailingGrantStore();
    server = await createTestServer({ store });
  });

  describe('prepareAuthorization', () => {
    it('should describe a valid request without storing anything', async () => {
      const outcome = await server.orchestrator.prepareAuthorization(approval());

      expect(outcome.state).toBe('RESPONDED');
      expect(outcome.response.statusCode).toBe(200);
      expect(outcome.response.body).toEqual({
        client_id: 'web-app',
        client_name: 'Web App',
        redirect_uri: 'https://app.example.com/callback',
        response_type: 'code',
        scope: 'read write',
        state: 'xyz',
        code_challenge: CHALLENGE,
        code_challenge_method: 'S256',
      });
    });
  });

  describe('authorize', () => {
    it('should redirect with a code and the state', async () => {
      const outcome = await server.orchestrator.authorize(approval());

      expect(outcome.state).toBe('RESPONDED');
      expect(outcome.response.statusCode).toBe(302);
      expect(outcome.response.body).toBeNull();

      const location = new URL(outcome.response.headers['Location'] ?? '');
      expect(location.origin + location.pathname).toBe('https://app.example.com/callback');
      expect(location.searchParams.get('state')).toBe('xyz');

      const code = await store.findCode(location.searchParams.get('code') ?? '');
      expect(code).toMatchObject({
        clientId: 'web-app',
        userId: 'alice',
        scopes: ['read', 'write'],
        codeChallenge: CHALLENGE,
        codeChallengeMethod: 'S256',
        redirectUriExplicit: true,
        consumed: false,
      });
    });

    it('should redirect access_denied when the resource owner declines', async () => {
      const outcome = await server.orchestrator.authorize(approval({ allow: false }));

      expect(outcome.state).toBe('REJECTED');
      expect(outcome.denial?.kind).toBe('AccessDenied');
      const location = new URL(outcome.response.headers['Location'] ?? '');
      expect(location.searchParams.get('error')).toBe('access_denied');
      expect(location.searchParams.get('state')).toBe('xyz');
      expect(location.searchParams.get('code')).toBeNull();
    });

    it('should answer directly when the redirect URI is not registered', async () => {
      const outcome = await server.orchestrator.authorize(
        approval({ redirectUri: 'https://evil.example.com/callback' })
      );

      expect(outcome.state).toBe('REJECTED');
      expect(outcome.response.statusCode).toBe(400);
      expect(outcome.response.headers['Location']).toBeUndefined();
      expect(outcome.response.body).toEqual({
        error: 'invalid_redirect_uri',
        error_description: 'The redirect URI is not registered for this client.',
      });
    });

    it('should redirect server_error when the code cannot be stored', async () => {
      store.failPutCode = true;

      const outcome = await server.orchestrator.authorize(approval());

      expect(outcome.state).toBe('STORE_FAILURE');
      const location = new URL(outcome.response.headers['Location'] ?? '');
      expect(location.searchParams.get('error')).toBe('server_error');
    });
  });

  describe('exchangeToken (authorization_code)', () => {
    it('should issue an access and refresh token', async () => {
      const code = await obtainCode(server);

      const outcome = await server.orchestrator.exchangeToken(codeExchange(code));

      expect(outcome.state).toBe('RESPONDED');
      expect(outcome.response.statusCode).toBe(200);
      expect(outcome.response.headers).toEqual({
        'Content-Type': 'application/json',
        'Cache-Control': 'no-store',
        Pragma: 'no-cache',
      });
      expect(outcome.response.body).toMatchObject({
        token_type: 'Bearer',
        expires_in: 36000,
        scope: 'read write',
      });

      const accessToken = stringField(outcome.response.body, 'access_token');
      const record = await store.findToken(accessToken, 'access_token');
      expect(record).toMatchObject({ clientId: 'web-app', userId: 'alice', scopes: ['read', 'write'] });
      expect(record?.tokenHash).toBe(hashToken(accessToken));

      const refreshToken = stringField(outcome.response.body, 'refresh_token');
      expect(await store.findToken(refreshToken, 'refresh_token')).not.toBeNull();
    });

    it('should not issue a refresh token to a client without the refresh grant', async () => {
      const code = await obtainCode(server, {
        clientId: 'spa',
        redirectUri: 'https://spa.example.com/cb',
        scope: 'read',
      });

      const outcome = await server.orchestrator.exchangeToken(
        codeExchange(code, {
          credentials: { clientId: 'spa', clientSecret: null, method: 'none' },
          redirectUri: 'https://spa.example.com/cb',
        })
      );

      expect(outcome.response.statusCode).toBe(200);
      expect(outcome.response.body).not.toHaveProperty('refresh_token');
    });

    it('should reject a replayed code', async () => {
      const code = await obtainCode(server);
      await server.orchestrator.exchangeToken(codeExchange(code));

      const replay = await server.orchestrator.exchangeToken(codeExchange(code));

      expect(replay.state).toBe('REJECTED');
      expect(replay.response.statusCode).toBe(400);
      expect(replay.response.body).toMatchObject({ error: 'invalid_grant' });
    });

    it('should issue tokens to exactly one of two concurrent exchanges', async () => {
      const code = await obtainCode(server);

      const outcomes = await Promise.all([
        server.orchestrator.exchangeToken(codeExchange(code)),
        server.orchestrator.exchangeToken(codeExchange(code)),
      ]);

      const statuses = outcomes.map((outcome) => outcome.response.statusCode).sort();
      expect(statuses).toEqual([200, 400]);
      const loser = outcomes.find((outcome) => outcome.response.statusCode === 400);
      expect(loser?.denial?.kind).toBe('InvalidGrant');
    });

    it('should challenge Basic clients that fail authentication', async () => {
      const code = await obtainCode(server);

      const outcome = await server.orchestrator.exchangeToken(
        codeExchange(code, { credentials: basicCredentials('web-app', 'wrong-secret') })
      );

      expect(outcome.response.statusCode).toBe(401);
      expect(outcome.response.headers['WWW-Authenticate']).toBe('Basic realm="oauth"');
      expect(outcome.response.body).toMatchObject({ error: 'invalid_client' });
    });

    it('should not challenge clients that authenticated in the body', async () => {
      const code = await obtainCode(server);

      const outcome = await server.orchestrator.exchangeToken(
        codeExchange(code, {
          credentials: { clientId: 'web-app', clientSecret: 'wrong-secret', method: 'client_secret_post' },
        })
      );

      expect(outcome.response.statusCode).toBe(401);
      expect(outcome.response.headers['WWW-Authenticate']).toBeUndefined();
    });

    it('should report a store failure and leave the code consumed', async () => {
      const code = await obtainCode(server);
      store.failPutTokens = true;

      const outcome = await server.orchestrator.exchangeToken(codeExchange(code));

      expect(outcome.state).toBe('STORE_FAILURE');
      expect(outcome.response.statusCode).toBe(500);
      expect(outcome.response.body).toMatchObject({ error: 'server_error' });
      expect((await store.findCode(code))?.consumed).toBe(true);
    });
  });

  describe('exchangeToken (refresh_token)', () => {
    async function issueTokens(): Promise<{ accessToken: string; refreshToken: string }> {
      const code = await obtainCode(server);
      const outcome = await server.orchestrator.exchangeToken(codeExchange(code));
      return {
        accessToken: stringField(outcome.response.body, 'access_token'),
        refreshToken: stringField(outcome.response.body, 'refresh_token'),
      };
    }

    it('should rotate the refresh token and retire the old pair', async () => {
      const first = await issueTokens();

      const outcome = await server.orchestrator.exchangeToken(refreshExchange(first.refreshToken));

      expect(outcome.state).toBe('RESPONDED');
      const rotated = stringField(outcome.response.body, 'refresh_token');
      expect(rotated).not.toBe(first.refreshToken);
      expect(await store.findToken(first.accessToken)).toBeNull();
      expect(await store.findToken(first.refreshToken)).toBeNull();

      const record = await store.findToken(rotated, 'refresh_token');
      expect(record?.rotatedFrom).toBe(hashToken(first.refreshToken));
      expect(record?.userId).toBe('alice');
    });

    it('should reject a refresh token that was already rotated', async () => {
      const { refreshToken } = await issueTokens();
      await server.orchestrator.exchangeToken(refreshExchange(refreshToken));

      const replay = await server.orchestrator.exchangeToken(refreshExchange(refreshToken));

      expect(replay.response.statusCode).toBe(400);
      expect(replay.response.body).toMatchObject({ error: 'invalid_grant' });
    });

    it('should narrow the access token but keep the refresh token scopes', async () => {
      const { refreshToken } = await issueTokens();

      const outcome = await server.orchestrator.exchangeToken(refreshExchange(refreshToken, { scope: 'read' }));

      expect(outcome.response.body).toMatchObject({ scope: 'read' });
      const rotated = await store.findToken(stringField(outcome.response.body, 'refresh_token'));
      expect(rotated?.scopes).toEqual(['read', 'write']);
    });

    it('should reject a scope beyond the original grant', async () => {
      const code = await obtainCode(server, { scope: 'read' });
      const issued = await server.orchestrator.exchangeToken(codeExchange(code));

      const outcome = await server.orchestrator.exchangeToken(
        refreshExchange(stringField(issued.response.body, 'refresh_token'), { scope: 'read write' })
      );

      expect(outcome.response.statusCode).toBe(400);
      expect(outcome.response.body).toMatchObject({ error: 'invalid_scope' });
    });
  });

  describe('exchangeToken (client_credentials)', () => {
    it('should issue an access token without a user or refresh token', async () => {
      const outcome = await server.orchestrator.exchangeToken(
        refreshExchange('', {
          grantType: 'client_credentials',
          refreshToken: null,
          credentials: basicCredentials('service'),
          scope: 'read',
        })
      );

      expect(outcome.response.statusCode).toBe(200);
      expect(outcome.response.body).not.toHaveProperty('refresh_token');
      const record = await store.findToken(stringField(outcome.response.body, 'access_token'));
      expect(record).toMatchObject({ clientId: 'service', userId: null, scopes: ['read'] });
    });
  });

  describe('CORS', () => {
    it('should echo an allowed origin on success', async () => {
      server = await createTestServer({ store, originPolicy: { isOriginAllowed: () => true } });
      const code = await obtainCode(server);

      const outcome = await server.orchestrator.exchangeToken(
        codeExchange(code, { origin: 'https://App.Example.com' })
      );

      expect(outcome.response.headers['Access-Control-Allow-Origin']).toBe('https://App.Example.com');
    });

    it('should omit the header when the policy refuses', async () => {
      const code = await obtainCode(server);

      const outcome = await server.orchestrator.exchangeToken(
        codeExchange(code, { origin: 'https://app.example.com' })
      );

      expect(outcome.response.statusCode).toBe(200);
      expect(outcome.response.headers).not.toHaveProperty('Access-Control-Allow-Origin');
    });

    it('should omit the header on errors even for allowed origins', async () => {
      server = await createTestServer({ store, originPolicy: { isOriginAllowed: () => true } });

      const outcome = await server.orchestrator.exchangeToken(
        codeExchange('no-such-code', { origin: 'https://app.example.com' })
      );

      expect(outcome.response.statusCode).toBe(400);
      expect(outcome.response.headers).not.toHaveProperty('Access-Control-Allow-Origin');
    });

    it('should still issue tokens when the policy throws', async () => {
      server = await createTestServer({
        store,
        originPolicy: {
          isOriginAllowed: () => {
            throw new Error('policy backend down');
          },
        },
      });
      const code = await obtainCode(server);

      const outcome = await server.orchestrator.exchangeToken(
        codeExchange(code, { origin: 'https://app.example.com' })
      );

      expect(outcome.state).toBe('RESPONDED');
      expect(outcome.response.headers).not.toHaveProperty('Access-Control-Allow-Origin');
    });
  });

  describe('revoke', () => {
    it('should revoke a token the caller owns', async () => {
      const code = await obtainCode(server);
      const issued = await server.orchestrator.exchangeToken(codeExchange(code));
      const accessToken = stringField(issued.response.body, 'access_token');

      const outcome = await server.orchestrator.revoke(lookup(accessToken));

      expect(outcome.response.statusCode).toBe(200);
      expect(outcome.response.body).toBeNull();
      expect(outcome.response.headers).toEqual({ 'Cache-Control': 'no-store', Pragma: 'no-cache' });
      expect(await store.findToken(accessToken)).toBeNull();
    });

    it('should leave a token of another client active', async () => {
      const issued = await server.orchestrator.exchangeToken(
        refreshExchange('', { grantType: 'client_credentials', refreshToken: null, credentials: basicCredentials('service') })
      );
      const accessToken = stringField(issued.response.body, 'access_token');

      const outcome = await server.orchestrator.revoke(lookup(accessToken, 'web-app'));

      expect(outcome.response.statusCode).toBe(200);
      expect(await store.findToken(accessToken)).not.toBeNull();
    });

    it('should answer 200 for unknown tokens', async () => {
      const outcome = await server.orchestrator.revoke(lookup('unknown-token'));
      expect(outcome.response.statusCode).toBe(200);
    });

    it('should require the token parameter', async () => {
      const outcome = await server.orchestrator.revoke(lookup(null));

      expect(outcome.response.statusCode).toBe(400);
      expect(outcome.response.body).toMatchObject({ error: 'invalid_request' });
    });
  });

  describe('introspect', () => {
    it('should describe an active token', async () => {
      const code = await obtainCode(server, { scope: 'read' });
      const issued = await server.orchestrator.exchangeToken(codeExchange(code));

      const outcome = await server.orchestrator.introspect(
        lookup(stringField(issued.response.body, 'access_token'))
      );

      expect(outcome.response.body).toMatchObject({
        active: true,
        scope: 'read',
        client_id: 'web-app',
        username: 'alice',
        token_type: 'Bearer',
      });
    });

    it('should report unknown tokens as inactive', async () => {
      const outcome = await server.orchestrator.introspect(lookup('unknown-token'));
      expect(outcome.response.body).toEqual({ active: false });
    });

    it('should not describe a token of another client', async () => {
      const issued = await server.orchestrator.exchangeToken(
        refreshExchange('', { grantType: 'client_credentials', refreshToken: null, credentials: basicCredentials('service') })
      );

      const outcome = await server.orchestrator.introspect(
        lookup(stringField(issued.response.body, 'access_token'), 'web-app')
      );

      expect(outcome.response.body).toEqual({ active: false });
    });

    it('should reject unauthenticated callers', async () => {
      const outcome = await server.orchestrator.introspect(lookup('unknown-token', 'nobody'));
      expect(outcome.response.statusCode).toBe(401);
    });
  });
});
