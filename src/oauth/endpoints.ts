/**
 * OAuth endpoints over transport records: one method per endpoint, each
 * taking an `OAuthRequest` and resolving with the `OAuthResponse` to send.
 */

import { logger } from '../utils/logger.js';
import { httpStatus, toErrorBody, type Denial } from './errors.js';
import { tokenErrorResponse, type GrantOrchestrator, type GrantOutcome } from './orchestrator.js';
import {
  parseAuthorizationApproval,
  parseAuthorizationRequest,
  parseTokenLookupRequest,
  parseTokenRequest,
} from './request-parser.js';
import type { OAuthRequest, OAuthResponse } from './types.js';

function malformed(endpoint: string, denial: Denial): void {
  logger.warn({ endpoint, reason: denial.reason }, 'Malformed OAuth request');
}

// Parameters could not be read, so neither redirect_uri nor state can be trusted
function authorizationParseError(denial: Denial): OAuthResponse {
  return {
    statusCode: httpStatus(denial.kind),
    headers: { 'Content-Type': 'application/json' },
    body: toErrorBody(denial),
  };
}

export class OAuthEndpoints {
  constructor(private readonly orchestrator: GrantOrchestrator) {}

  /** GET /authorize */
  async describeAuthorization(record: OAuthRequest): Promise<OAuthResponse> {
    const request = parseAuthorizationRequest(record);
    if (!request.ok) {
      malformed('authorize', request.error);
      return authorizationParseError(request.error);
    }
    return this.respond(this.orchestrator.prepareAuthorization(request.value));
  }

  /** POST /authorize, with the authenticated resource owner */
  async authorize(record: OAuthRequest, resourceOwner: string): Promise<OAuthResponse> {
    const approval = parseAuthorizationApproval(record, resourceOwner);
    if (!approval.ok) {
      malformed('authorize', approval.error);
      return authorizationParseError(approval.error);
    }
    return this.respond(this.orchestrator.authorize(approval.value));
  }

  /** POST /token */
  async token(record: OAuthRequest): Promise<OAuthResponse> {
    const request = parseTokenRequest(record);
    if (!request.ok) {
      malformed('token', request.error);
      return tokenErrorResponse(request.error);
    }
    return this.respond(this.orchestrator.exchangeToken(request.value));
  }

  /** POST /revoke */
  async revoke(record: OAuthRequest): Promise<OAuthResponse> {
    const request = parseTokenLookupRequest(record);
    if (!request.ok) {
      malformed('revoke', request.error);
      return tokenErrorResponse(request.error);
    }
    return this.respond(this.orchestrator.revoke(request.value));
  }

  /** POST /introspect */
  async introspect(record: OAuthRequest): Promise<OAuthResponse> {
    const request = parseTokenLookupRequest(record);
    if (!request.ok) {
      malformed('introspect', request.error);
      return tokenErrorResponse(request.error);
    }
    return this.respond(this.orchestrator.introspect(request.value));
  }

  private async respond(outcome: Promise<GrantOutcome>): Promise<OAuthResponse> {
    const { state, response } = await outcome;
    logger.debug({ state, statusCode: response.statusCode }, 'Grant attempt finished');
    return response;
  }
}
