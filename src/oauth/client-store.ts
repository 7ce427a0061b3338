/**
 * OAuth Client Registry
 *
 * Clients are created by an external management surface. This module only
 * looks them up, and seeds them from a JSON file at startup.
 */

import crypto from 'crypto';
import { readFile } from 'fs/promises';
import type { Redis } from 'ioredis';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { getRedisClient, redisKey } from '../utils/redis.js';
import { isValidRedirectUri } from './redirect-uri.js';
import type { OAuthClient } from './types.js';

/**
 * Read side consumed by the validator
 */
export interface ClientRegistry {
  findClient(clientId: string): Promise<OAuthClient | null>;
}

export interface ClientStore extends ClientRegistry {
  saveClient(client: OAuthClient): Promise<void>;
  deleteClient(clientId: string): Promise<void>;
}

// In-memory store (development/single instance)
export class MemoryClientStore implements ClientStore {
  private clients = new Map<string, OAuthClient>();

  async findClient(clientId: string): Promise<OAuthClient | null> {
    return this.clients.get(clientId) ?? null;
  }

  async saveClient(client: OAuthClient): Promise<void> {
    this.clients.set(client.clientId, client);
  }

  async deleteClient(clientId: string): Promise<void> {
    this.clients.delete(clientId);
  }
}

// Redis store (production/distributed)
export class RedisClientStore implements ClientStore {
  constructor(private readonly client: Redis) {}

  async findClient(clientId: string): Promise<OAuthClient | null> {
    const data = await this.client.get(redisKey('client', clientId));
    if (!data) return null;

    const parsed = storedClientSchema.safeParse(JSON.parse(data));
    if (!parsed.success) {
      logger.error({ clientId, issues: parsed.error.issues }, 'Stored client record is malformed');
      return null;
    }
    return parsed.data;
  }

  async saveClient(client: OAuthClient): Promise<void> {
    await this.client.set(redisKey('client', client.clientId), JSON.stringify(client));
  }

  async deleteClient(clientId: string): Promise<void> {
    await this.client.del(redisKey('client', clientId));
  }
}

export function createClientStore(): ClientStore {
  const redisClient = getRedisClient();
  return redisClient ? new RedisClientStore(redisClient) : new MemoryClientStore();
}

// =============================================================================
// Secrets
// =============================================================================

export function generateClientId(): string {
  return crypto.randomBytes(16).toString('hex');
}

export function generateClientSecret(): string {
  return crypto.randomBytes(32).toString('base64url');
}

export function hashClientSecret(secret: string): string {
  return crypto.createHash('sha256').update(secret).digest('hex');
}

/**
 * Constant-time comparison of a presented secret against the stored hash.
 * Both sides are fixed-length hex digests.
 */
export function verifyClientSecret(secret: string, hash: string): boolean {
  const inputHash = Buffer.from(hashClientSecret(secret));
  const storedHash = Buffer.from(hash);
  if (inputHash.length !== storedHash.length) {
    return false;
  }
  return crypto.timingSafeEqual(inputHash, storedHash);
}

// =============================================================================
// Seeding
// =============================================================================

const grantTypeSchema = z.enum(['authorization_code', 'refresh_token', 'client_credentials']);

const storedClientSchema = z.object({
  clientId: z.string().min(1),
  clientName: z.string(),
  clientType: z.enum(['confidential', 'public']),
  clientSecretHash: z.string().nullable(),
  redirectUris: z.array(z.string()),
  grantTypes: z.array(grantTypeSchema),
  allowedScopes: z.array(z.string()).optional(),
  allowedOrigins: z.array(z.string()).optional(),
  ownerId: z.string(),
  createdAt: z.number(),
});

export const clientSeedSchema = z
  .object({
    clientId: z.string().min(1).optional(),
    clientName: z.string().min(1),
    clientType: z.enum(['confidential', 'public']),
    clientSecret: z.string().min(1).optional(),
    redirectUris: z.array(z.string()).min(1),
    grantTypes: z.array(grantTypeSchema).min(1).default(['authorization_code']),
    allowedScopes: z.array(z.string()).optional(),
    allowedOrigins: z.array(z.string()).optional(),
    ownerId: z.string().min(1),
  })
  .superRefine((seed, ctx) => {
    if (seed.clientType === 'confidential' && !seed.clientSecret) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['clientSecret'],
        message: 'confidential clients require a clientSecret',
      });
    }
    if (seed.clientType === 'public' && seed.clientSecret) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['clientSecret'],
        message: 'public clients must not have a clientSecret',
      });
    }
  });

export type ClientSeed = z.input<typeof clientSeedSchema>;

/**
 * Turn a seed entry into a client record, hashing its secret.
 * Throws when a redirect URI is not absolute, carries a fragment, or uses
 * a scheme outside `allowedSchemes`.
 */
export function buildClient(input: ClientSeed, allowedSchemes: readonly string[]): OAuthClient {
  const seed = clientSeedSchema.parse(input);

  for (const uri of seed.redirectUris) {
    if (!isValidRedirectUri(uri, allowedSchemes)) {
      throw new Error(`Invalid redirect URI: ${uri}`);
    }
  }

  const client: OAuthClient = {
    clientId: seed.clientId ?? generateClientId(),
    clientName: seed.clientName,
    clientType: seed.clientType,
    clientSecretHash: seed.clientSecret ? hashClientSecret(seed.clientSecret) : null,
    redirectUris: seed.redirectUris,
    grantTypes: seed.grantTypes,
    ownerId: seed.ownerId,
    createdAt: Date.now(),
  };
  if (seed.allowedScopes) client.allowedScopes = seed.allowedScopes;
  if (seed.allowedOrigins) client.allowedOrigins = seed.allowedOrigins;

  return client;
}

/**
 * Load a JSON array of client seeds into the store. Returns the number of
 * clients written.
 */
export async function seedClientsFromFile(
  store: ClientStore,
  filePath: string,
  allowedSchemes: readonly string[]
): Promise<number> {
  const raw: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
  const seeds = z.array(z.unknown()).parse(raw);

  for (const [index, entry] of seeds.entries()) {
    const parsed = clientSeedSchema.safeParse(entry);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new Error(`Invalid client at index ${index} in ${filePath}: ${issues}`);
    }
    const client = buildClient(parsed.data, allowedSchemes);
    await store.saveClient(client);
    logger.info({ clientId: client.clientId, clientName: client.clientName }, 'Seeded OAuth client');
  }

  return seeds.length;
}
