/**
 * Token/Grant Store: authorization codes, access tokens and refresh tokens.
 *
 * Contract every implementation must honour:
 * - `consumeCodeAtomic` is a check-and-mark. Of any number of concurrent
 *   calls for the same code, at most one returns `ok: true`.
 * - `putTokens` writes all records or none.
 * - `revoke` removes a token (and its linked pair) and returns the removed
 *   record only to the caller that actually removed it.
 * - Expiry is enforced on read. The memory store also prunes expired
 *   entries whenever a code is stored; Redis drops them through TTLs.
 */

import crypto from 'crypto';
import type { Redis } from 'ioredis';
import { logger } from '../utils/logger.js';
import { getRedisClient, redisKey } from '../utils/redis.js';
import type { AuthorizationCode, TokenKind, TokenRecord } from './types.js';

export type CodeConsumeFailure = 'not_found' | 'consumed' | 'expired';

export type CodeConsumeResult =
  | { ok: true; value: AuthorizationCode }
  | { ok: false; error: CodeConsumeFailure };

export interface GrantStore {
  putCode(code: AuthorizationCode): Promise<void>;
  /** Read without consuming. Consumed codes are returned with `consumed: true` */
  findCode(code: string): Promise<AuthorizationCode | null>;
  consumeCodeAtomic(code: string): Promise<CodeConsumeResult>;
  putTokens(records: TokenRecord[]): Promise<void>;
  findToken(token: string, kind?: TokenKind): Promise<TokenRecord | null>;
  revoke(token: string): Promise<TokenRecord | null>;
}

/**
 * Generate an opaque token or code
 */
export function generateOpaqueToken(bytes = 32): string {
  return crypto.randomBytes(bytes).toString('base64url');
}

/**
 * Tokens are stored and looked up by their SHA-256 hash
 */
export function hashToken(token: string): string {
  return crypto.createHash('sha256').update(token).digest('hex');
}

function secondsUntil(expiresAt: number): number {
  return Math.max(1, Math.ceil((expiresAt - Date.now()) / 1000));
}

// =============================================================================
// In-memory store
// =============================================================================

// Records never share their scopes array with a caller
function copyCode(code: AuthorizationCode): AuthorizationCode {
  return { ...code, scopes: [...code.scopes] };
}

function copyToken(record: TokenRecord): TokenRecord {
  return { ...record, scopes: [...record.scopes] };
}

export class MemoryGrantStore implements GrantStore {
  private codes = new Map<string, AuthorizationCode>();
  private tokens = new Map<string, TokenRecord>();

  async putCode(code: AuthorizationCode): Promise<void> {
    this.pruneExpired();
    this.codes.set(code.code, copyCode(code));
  }

  async findCode(code: string): Promise<AuthorizationCode | null> {
    const entry = this.codes.get(code);
    return entry ? copyCode(entry) : null;
  }

  async consumeCodeAtomic(code: string): Promise<CodeConsumeResult> {
    // No await between the check and the mark
    const entry = this.codes.get(code);
    if (!entry) {
      return { ok: false, error: 'not_found' };
    }
    if (Date.now() > entry.expiresAt) {
      this.codes.delete(code);
      return { ok: false, error: entry.consumed ? 'consumed' : 'expired' };
    }
    if (entry.consumed) {
      return { ok: false, error: 'consumed' };
    }

    entry.consumed = true;
    return { ok: true, value: copyCode(entry) };
  }

  async putTokens(records: TokenRecord[]): Promise<void> {
    for (const record of records) {
      this.tokens.set(record.tokenHash, copyToken(record));
    }
  }

  async findToken(token: string, kind?: TokenKind): Promise<TokenRecord | null> {
    const tokenHash = hashToken(token);
    const record = this.tokens.get(tokenHash);
    if (!record) return null;

    if (Date.now() > record.expiresAt) {
      this.tokens.delete(tokenHash);
      return null;
    }
    if (kind && record.kind !== kind) {
      return null;
    }

    return copyToken(record);
  }

  async revoke(token: string): Promise<TokenRecord | null> {
    const tokenHash = hashToken(token);
    const record = this.tokens.get(tokenHash);
    if (!record) return null;

    this.tokens.delete(tokenHash);
    // Revoking a refresh token takes its access token with it
    if (record.kind === 'refresh_token' && record.linkedTokenHash) {
      this.tokens.delete(record.linkedTokenHash);
    }

    return Date.now() > record.expiresAt ? null : copyToken(record);
  }

  /** Number of codes and tokens held, expired or not */
  get size(): { codes: number; tokens: number } {
    return { codes: this.codes.size, tokens: this.tokens.size };
  }

  private pruneExpired(): void {
    const now = Date.now();
    for (const [code, entry] of this.codes) {
      if (now > entry.expiresAt) this.codes.delete(code);
    }
    for (const [tokenHash, record] of this.tokens) {
      if (now > record.expiresAt) this.tokens.delete(tokenHash);
    }
  }
}

// =============================================================================
// Redis store
// =============================================================================

export class RedisGrantStore implements GrantStore {
  constructor(private readonly client: Redis) {}

  async putCode(code: AuthorizationCode): Promise<void> {
    await this.client.set(
      redisKey('code', code.code),
      JSON.stringify(code),
      'EX',
      secondsUntil(code.expiresAt)
    );
  }

  async findCode(code: string): Promise<AuthorizationCode | null> {
    const data = await this.client.get(redisKey('code', code));
    if (!data) return null;

    const authCode = JSON.parse(data) as AuthorizationCode;
    const consumed = await this.client.get(redisKey('code-consumed', code));
    return { ...authCode, consumed: consumed !== null };
  }

  async consumeCodeAtomic(code: string): Promise<CodeConsumeResult> {
    const authCode = await this.findCode(code);
    if (!authCode) {
      return { ok: false, error: 'not_found' };
    }
    if (Date.now() > authCode.expiresAt) {
      return { ok: false, error: 'expired' };
    }

    // SET NX decides the single winner across all server instances
    const marked = await this.client.set(
      redisKey('code-consumed', code),
      '1',
      'EX',
      secondsUntil(authCode.expiresAt),
      'NX'
    );
    if (marked !== 'OK') {
      logger.warn({ clientId: authCode.clientId }, 'Authorization code replay detected');
      return { ok: false, error: 'consumed' };
    }

    return { ok: true, value: { ...authCode, consumed: true } };
  }

  async putTokens(records: TokenRecord[]): Promise<void> {
    const transaction = this.client.multi();
    for (const record of records) {
      transaction.set(
        redisKey('token', record.tokenHash),
        JSON.stringify(record),
        'EX',
        secondsUntil(record.expiresAt)
      );
    }

    const results = await transaction.exec();
    const failed = results?.find(([err]) => err !== null);
    if (!results || failed) {
      throw failed?.[0] ?? new Error('Token transaction was aborted');
    }
  }

  async findToken(token: string, kind?: TokenKind): Promise<TokenRecord | null> {
    const data = await this.client.get(redisKey('token', hashToken(token)));
    if (!data) return null;

    const record = JSON.parse(data) as TokenRecord;
    if (Date.now() > record.expiresAt) return null;
    if (kind && record.kind !== kind) return null;

    return record;
  }

  async revoke(token: string): Promise<TokenRecord | null> {
    const data = await this.client.getdel(redisKey('token', hashToken(token)));
    if (!data) return null;

    const record = JSON.parse(data) as TokenRecord;
    if (record.kind === 'refresh_token' && record.linkedTokenHash) {
      await this.client.del(redisKey('token', record.linkedTokenHash));
    }

    return Date.now() > record.expiresAt ? null : record;
  }
}

export function createGrantStore(): GrantStore {
  const redisClient = getRedisClient();
  return redisClient ? new RedisGrantStore(redisClient) : new MemoryGrantStore();
}
