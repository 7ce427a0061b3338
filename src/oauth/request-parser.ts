/**
 * Parse transport records into typed grant requests.
 *
 * Every parameter must appear at most once (RFC 6749 3.1, 3.2); a repeated
 * parameter arrives from the body parser as an array and is rejected.
 * Empty values count as absent.
 */

import { z } from 'zod';
import { deny, type Result } from './errors.js';
import type {
  AuthorizationApproval,
  AuthorizationRequest,
  ClientCredentials,
  OAuthRequest,
  TokenLookupRequest,
  TokenRequest,
} from './types.js';

const param = z
  .string()
  .optional()
  .transform((value) => (value ? value : null));

const authorizationParamsSchema = z.object({
  client_id: param,
  redirect_uri: param,
  response_type: param,
  scope: param,
  state: param,
  code_challenge: param,
  code_challenge_method: param,
  allow: param,
});

const tokenParamsSchema = z.object({
  grant_type: param,
  code: param,
  redirect_uri: param,
  code_verifier: param,
  refresh_token: param,
  scope: param,
  client_id: param,
  client_secret: param,
});

const lookupParamsSchema = z.object({
  token: param,
  token_type_hint: param,
  client_id: param,
  client_secret: param,
});

function parseParams<T extends z.ZodTypeAny>(schema: T, source: Record<string, unknown>): Result<z.output<T>> {
  const parsed = schema.safeParse(source);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(',');
    return { ok: false, error: deny('InvalidRequest', `malformed_parameter:${fields}`) };
  }
  return { ok: true, value: parsed.data };
}

/**
 * application/x-www-form-urlencoded decoding, as required for the
 * client_id and client_secret inside HTTP Basic (RFC 6749 2.3.1).
 */
function formDecode(value: string): string | null {
  try {
    return decodeURIComponent(value.replace(/\+/g, ' '));
  } catch {
    return null;
  }
}

/**
 * Decode `Authorization: Basic ...`. Returns null when the header is not
 * Basic; malformed Basic credentials yield a null client id, which the
 * validator rejects as `invalid_client`.
 */
export function parseBasicAuth(header: string | undefined): { clientId: string | null; clientSecret: string | null } | null {
  if (!header || !/^basic /i.test(header)) {
    return null;
  }

  const decoded = Buffer.from(header.slice(6).trim(), 'base64').toString('utf-8');
  const separator = decoded.indexOf(':');
  if (separator < 0) {
    return { clientId: null, clientSecret: null };
  }

  const clientId = formDecode(decoded.slice(0, separator));
  const clientSecret = formDecode(decoded.slice(separator + 1));
  return {
    clientId: clientId || null,
    clientSecret: clientId ? clientSecret || null : null,
  };
}

/**
 * Client credentials from HTTP Basic, else from the body. A client may use
 * only one authentication method per request.
 */
export function extractClientCredentials(
  headers: OAuthRequest['headers'],
  body: { client_id: string | null; client_secret: string | null }
): Result<ClientCredentials> {
  const basic = parseBasicAuth(headers['authorization']);

  if (basic) {
    if (body.client_secret) {
      return { ok: false, error: deny('InvalidRequest', 'multiple_client_auth_methods') };
    }
    if (body.client_id && basic.clientId && body.client_id !== basic.clientId) {
      return { ok: false, error: deny('InvalidRequest', 'client_id_mismatch', basic.clientId) };
    }
    return { ok: true, value: { ...basic, method: 'client_secret_basic' } };
  }

  return {
    ok: true,
    value: {
      clientId: body.client_id,
      clientSecret: body.client_secret,
      method: body.client_secret ? 'client_secret_post' : 'none',
    },
  };
}

function originOf(headers: OAuthRequest['headers']): string | null {
  const origin = headers['origin'];
  return origin ? origin : null;
}

export function parseAuthorizationRequest(record: OAuthRequest): Result<AuthorizationRequest> {
  const source = record.method === 'POST' ? record.body : record.query;
  const params = parseParams(authorizationParamsSchema, source);
  if (!params.ok) return params;

  const p = params.value;
  return {
    ok: true,
    value: {
      clientId: p.client_id,
      redirectUri: p.redirect_uri,
      responseType: p.response_type,
      scope: p.scope,
      state: p.state,
      codeChallenge: p.code_challenge,
      codeChallengeMethod: p.code_challenge_method,
    },
  };
}

/**
 * The consent form posts the authorization parameters back together with
 * `allow`; anything but an affirmative value is a denial.
 */
export function parseAuthorizationApproval(record: OAuthRequest, resourceOwner: string): Result<AuthorizationApproval> {
  const request = parseAuthorizationRequest(record);
  if (!request.ok) return request;

  const allow = parseParams(authorizationParamsSchema.pick({ allow: true }), record.body);
  if (!allow.ok) return allow;

  return {
    ok: true,
    value: {
      ...request.value,
      resourceOwner,
      allow: /^(true|1|on|yes)$/i.test(allow.value.allow ?? ''),
    },
  };
}

export function parseTokenRequest(record: OAuthRequest): Result<TokenRequest> {
  const params = parseParams(tokenParamsSchema, record.body);
  if (!params.ok) return params;

  const p = params.value;
  const credentials = extractClientCredentials(record.headers, p);
  if (!credentials.ok) return credentials;

  return {
    ok: true,
    value: {
      grantType: p.grant_type,
      credentials: credentials.value,
      code: p.code,
      redirectUri: p.redirect_uri,
      codeVerifier: p.code_verifier,
      refreshToken: p.refresh_token,
      scope: p.scope,
      origin: originOf(record.headers),
    },
  };
}

export function parseTokenLookupRequest(record: OAuthRequest): Result<TokenLookupRequest> {
  const params = parseParams(lookupParamsSchema, record.body);
  if (!params.ok) return params;

  const p = params.value;
  const credentials = extractClientCredentials(record.headers, p);
  if (!credentials.ok) return credentials;

  return {
    ok: true,
    value: {
      credentials: credentials.value,
      token: p.token,
      tokenTypeHint: p.token_type_hint,
    },
  };
}
