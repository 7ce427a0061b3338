/**
 * OAuth2 Authorization Server Types
 */

// Enums as string literal types

export type ClientType = 'confidential' | 'public';
export type GrantType = 'authorization_code' | 'refresh_token' | 'client_credentials';
export type ResponseType = 'code';
export type CodeChallengeMethod = 'plain' | 'S256';
export type TokenKind = 'access_token' | 'refresh_token';
export type ClientAuthMethod = 'client_secret_basic' | 'client_secret_post' | 'none';

export const GRANT_TYPES: readonly GrantType[] = ['authorization_code', 'refresh_token', 'client_credentials'];

/**
 * Registered OAuth client
 */
export interface OAuthClient {
  clientId: string;
  clientName: string;
  clientType: ClientType;
  clientSecretHash: string | null; // SHA-256 hex, null for public clients
  redirectUris: string[];
  grantTypes: GrantType[];
  allowedScopes?: string[]; // Server scopes when absent
  allowedOrigins?: string[]; // Consulted by the registered-origins policy only
  ownerId: string;
  createdAt: number;
}

/**
 * Authorization code, bound to the request that produced it
 */
export interface AuthorizationCode {
  code: string;
  clientId: string;
  userId: string;
  scopes: string[];
  redirectUri: string;
  redirectUriExplicit: boolean; // redirect_uri was sent, so the token request must repeat it
  codeChallenge?: string;
  codeChallengeMethod?: CodeChallengeMethod;
  createdAt: number;
  expiresAt: number;
  consumed: boolean;
}

/**
 * Access or refresh token as persisted. The token itself is never stored.
 */
export interface TokenRecord {
  tokenHash: string;
  kind: TokenKind;
  clientId: string;
  userId: string | null; // null for client_credentials
  scopes: string[];
  createdAt: number;
  expiresAt: number;
  linkedTokenHash?: string; // The other half of an access/refresh pair
  rotatedFrom?: string; // Hash of the refresh token this grant was refreshed from
}

/**
 * Credentials as presented at the token, revocation or introspection endpoint
 */
export interface ClientCredentials {
  clientId: string | null;
  clientSecret: string | null;
  method: ClientAuthMethod;
}

/**
 * Authorization request parameters (query or form)
 */
export interface AuthorizationRequest {
  clientId: string | null;
  redirectUri: string | null;
  responseType: string | null;
  scope: string | null;
  state: string | null;
  codeChallenge: string | null;
  codeChallengeMethod: string | null;
}

/**
 * Authorization request together with the resource owner's decision
 */
export interface AuthorizationApproval extends AuthorizationRequest {
  resourceOwner: string;
  allow: boolean;
}

/**
 * Token request (all grant types)
 */
export interface TokenRequest {
  grantType: string | null;
  credentials: ClientCredentials;
  code: string | null;
  redirectUri: string | null;
  codeVerifier: string | null;
  refreshToken: string | null;
  scope: string | null;
  origin: string | null;
}

/**
 * Revocation (RFC 7009) and introspection (RFC 7662) requests
 */
export interface TokenLookupRequest {
  credentials: ClientCredentials;
  token: string | null;
  tokenTypeHint: string | null;
}

/**
 * Token Response (RFC 6749)
 */
export interface TokenResponse {
  access_token: string;
  token_type: 'Bearer';
  expires_in: number;
  scope: string;
  refresh_token?: string;
}

/**
 * Token Error Response (RFC 6749)
 */
export interface TokenErrorResponse {
  error: string;
  error_description: string;
}

/**
 * Introspection Response (RFC 7662)
 */
export type IntrospectionResponse =
  | { active: false }
  | {
      active: true;
      scope: string;
      client_id: string;
      username?: string;
      token_type: 'Bearer' | 'refresh_token';
      exp: number;
      iat: number;
    };

/**
 * Transport-neutral inbound request. Header names are lower-case.
 */
export interface OAuthRequest {
  method: string;
  headers: Record<string, string | undefined>;
  query: Record<string, unknown>;
  body: Record<string, unknown>;
}

/**
 * Transport-neutral response. Header names are unique and kept in insertion order.
 */
export interface OAuthResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: object | null;
}
