/**
 * Denial taxonomy shared by the validator and the orchestrator, and its
 * mapping onto RFC 6749 error bodies.
 *
 * A denial carries two levels of detail: `kind` and `description` go on the
 * wire and are deliberately generic, `reason` names the exact check that
 * failed and only ever reaches the server log.
 */

import type { TokenErrorResponse } from './types.js';

export type DenialKind =
  | 'InvalidRequest'
  | 'InvalidClient'
  | 'InvalidGrant'
  | 'UnauthorizedClient'
  | 'UnauthorizedGrant'
  | 'UnsupportedGrantType'
  | 'UnsupportedResponseType'
  | 'InvalidScope'
  | 'InvalidRedirectURI'
  | 'AccessDenied'
  | 'ServerError';

export interface Denial {
  kind: DenialKind;
  /** Machine-readable sub-check, e.g. `code_consumed` */
  reason: string;
  /** Wire text for this kind */
  description: string;
  clientId?: string;
}

/**
 * Discriminated union returned by every validator and orchestrator step.
 */
export type Result<T, E = Denial> = { ok: true; value: T } | { ok: false; error: E };

interface WireError {
  error: string;
  status: number;
  description: string;
}

const WIRE_ERRORS: Record<DenialKind, WireError> = {
  InvalidRequest: {
    error: 'invalid_request',
    status: 400,
    description: 'The request is missing a required parameter or is otherwise malformed.',
  },
  InvalidClient: {
    error: 'invalid_client',
    status: 401,
    description: 'Client authentication failed.',
  },
  InvalidGrant: {
    error: 'invalid_grant',
    status: 400,
    description: 'The provided authorization grant is invalid, expired, revoked, or was issued to another client.',
  },
  UnauthorizedClient: {
    error: 'unauthorized_client',
    status: 400,
    description: 'The client is not authorized to use this authorization method.',
  },
  UnauthorizedGrant: {
    error: 'unauthorized_client',
    status: 400,
    description: 'The client is not authorized to use this grant type.',
  },
  UnsupportedGrantType: {
    error: 'unsupported_grant_type',
    status: 400,
    description: 'The authorization grant type is not supported.',
  },
  UnsupportedResponseType: {
    error: 'unsupported_response_type',
    status: 400,
    description: 'The response type is not supported.',
  },
  InvalidScope: {
    error: 'invalid_scope',
    status: 400,
    description: 'The requested scope is invalid, unknown, or exceeds the granted scope.',
  },
  InvalidRedirectURI: {
    error: 'invalid_redirect_uri',
    status: 400,
    description: 'The redirect URI is not registered for this client.',
  },
  AccessDenied: {
    error: 'access_denied',
    status: 403,
    description: 'The resource owner denied the request.',
  },
  ServerError: {
    error: 'server_error',
    status: 500,
    description: 'The authorization server encountered an unexpected condition.',
  },
};

export function deny(kind: DenialKind, reason: string, clientId?: string): Denial {
  const denial: Denial = { kind, reason, description: WIRE_ERRORS[kind].description };
  if (clientId !== undefined) {
    denial.clientId = clientId;
  }
  return denial;
}

/**
 * Shorthand for `{ ok: false, error: deny(...) }`.
 */
export function rejected<T>(kind: DenialKind, reason: string, clientId?: string): Result<T> {
  return { ok: false, error: deny(kind, reason, clientId) };
}

export function wireError(kind: DenialKind): string {
  return WIRE_ERRORS[kind].error;
}

export function httpStatus(kind: DenialKind): number {
  return WIRE_ERRORS[kind].status;
}

export function toErrorBody(denial: Denial): TokenErrorResponse {
  return {
    error: wireError(denial.kind),
    error_description: denial.description,
  };
}
