/**
 * OAuth 2.0 Authorization Server Module
 *
 * Implements RFC 6749 (authorization code, refresh token and client
 * credentials grants), RFC 7636 (PKCE), RFC 7009 (revocation) and
 * RFC 7662 (introspection), with a pluggable CORS origin policy.
 */

// Types
export type {
  OAuthClient,
  ClientType,
  GrantType,
  ResponseType,
  CodeChallengeMethod,
  TokenKind,
  ClientAuthMethod,
  ClientCredentials,
  AuthorizationCode,
  TokenRecord,
  AuthorizationRequest,
  AuthorizationApproval,
  TokenRequest,
  TokenLookupRequest,
  TokenResponse,
  TokenErrorResponse,
  IntrospectionResponse,
  OAuthRequest,
  OAuthResponse,
} from './types.js';

// Errors
export { deny, rejected, wireError, httpStatus, toErrorBody } from './errors.js';
export type { Denial, DenialKind, Result } from './errors.js';

// Settings
export { DEFAULT_SETTINGS, createOAuthSettings, settingsFromConfig } from './settings.js';
export type { OAuthSettings } from './settings.js';

// Client registry
export {
  MemoryClientStore,
  RedisClientStore,
  createClientStore,
  generateClientId,
  generateClientSecret,
  hashClientSecret,
  verifyClientSecret,
  buildClient,
  seedClientsFromFile,
} from './client-store.js';
export type { ClientRegistry, ClientStore, ClientSeed } from './client-store.js';

// Grant store
export { MemoryGrantStore, RedisGrantStore, createGrantStore, generateOpaqueToken, hashToken } from './grant-store.js';
export type { GrantStore, CodeConsumeResult, CodeConsumeFailure } from './grant-store.js';

// Origin policy
export { denyAllOriginPolicy, RegisteredOriginPolicy, createOriginPolicy, corsHeaders } from './origin-policy.js';
export type { OriginPolicy, OriginPolicyName } from './origin-policy.js';

// Validator and orchestrator
export { RequestValidator } from './validator.js';
export type { AuthorizationDecision, AuthorizationDenial, TokenDecision } from './validator.js';
export { GrantOrchestrator, tokenErrorResponse } from './orchestrator.js';
export type { GrantOutcome, GrantState, TerminalState } from './orchestrator.js';

// Endpoints, composition and Express adapter
export { OAuthEndpoints } from './endpoints.js';
export { createOAuthServer, createOAuthServerFromConfig } from './server.js';
export type { OAuthServer, OAuthServerOptions } from './server.js';
export { createOAuthRouter, toOAuthRequest, sendOAuthResponse } from './routes.js';
export { createBearerAuth, requireScope, extractBearerToken } from './middleware.js';
