/**
 * Origin policy: the single customization point for CORS on the token
 * endpoint. Chosen once at startup and injected into the validator.
 */

import type { ClientRegistry } from './client-store.js';

export interface OriginPolicy {
  isOriginAllowed(clientId: string, origin: string): boolean | Promise<boolean>;
}

export type OriginPolicyName = 'deny-all' | 'registered';

/**
 * Default: no origin is ever allowed, so no CORS header is ever emitted.
 */
export const denyAllOriginPolicy: OriginPolicy = {
  isOriginAllowed: () => false,
};

/**
 * Allow an origin when it is listed verbatim in the client's
 * `allowedOrigins` and uses https.
 */
export class RegisteredOriginPolicy implements OriginPolicy {
  constructor(private readonly clients: ClientRegistry) {}

  async isOriginAllowed(clientId: string, origin: string): Promise<boolean> {
    if (!origin.startsWith('https://')) {
      return false;
    }
    const client = await this.clients.findClient(clientId);
    return client?.allowedOrigins?.includes(origin) ?? false;
  }
}

export function createOriginPolicy(name: OriginPolicyName, clients: ClientRegistry): OriginPolicy {
  switch (name) {
    case 'registered':
      return new RegisteredOriginPolicy(clients);
    case 'deny-all':
      return denyAllOriginPolicy;
  }
}

/**
 * CORS headers for a successful token response. Empty unless an origin
 * was sent and the policy allowed it; the origin is echoed unchanged.
 */
export function corsHeaders(origin: string | null, allowed: boolean): Record<string, string> {
  if (!origin || !allowed) {
    return {};
  }
  return { 'Access-Control-Allow-Origin': origin };
}
