import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Request, Response } from 'express';
import { MemoryGrantStore, hashToken } from '../../src/oauth/grant-store.js';
import { createBearerAuth, extractBearerToken, requireScope } from '../../src/oauth/middleware.js';
import type { TokenRecord } from '../../src/oauth/types.js';

function mockReq(overrides: Partial<Request> = {}): Request {
  return {
    headers: {},
    log: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
    ...overrides,
  } as unknown as Request;
}

function mockRes(): Response {
  const headers: Record<string, string> = {};
  const res = {
    status: vi.fn().mockReturnThis(),
    json: vi.fn().mockReturnThis(),
    setHeader: vi.fn((key: string, val: string) => { headers[key] = val; }),
    getHeader: (key: string) => headers[key],
  };
  return res as unknown as Response;
}

function accessRecord(token: string, overrides: Partial<TokenRecord> = {}): TokenRecord {
  const now = Date.now();
  return {
    tokenHash: hashToken(token),
    kind: 'access_token',
    clientId: 'web-app',
    userId: 'alice',
    scopes: ['read'],
    createdAt: now,
    expiresAt: now + 60_000,
    ...overrides,
  };
}

/**
 * Run the middleware and wait until it either calls next or answers.
 */
async function run(
  middleware: ReturnType<typeof createBearerAuth>,
  req: Request,
  res: Response
): Promise<ReturnType<typeof vi.fn>> {
  const next = vi.fn();
  await new Promise<void>((resolve) => {
    next.mockImplementation(() => resolve());
    vi.mocked(res.json).mockImplementation(() => {
      resolve();
      return res;
    });
    middleware(req, res, next);
  });
  return next;
}

describe('OAuth bearer middleware', () => {
  let store: MemoryGrantStore;
  let bearerAuth: ReturnType<typeof createBearerAuth>;

  beforeEach(async () => {
    store = new MemoryGrantStore();
    await store.putTokens([
      accessRecord('access-1'),
      accessRecord('refresh-1', { kind: 'refresh_token' }),
    ]);
    bearerAuth = createBearerAuth(store);
  });

  describe('extractBearerToken', () => {
    it('should accept the scheme case-insensitively', () => {
      expect(extractBearerToken(mockReq({ headers: { authorization: 'bearer abc' } }))).toBe('abc');
      expect(extractBearerToken(mockReq({ headers: { authorization: 'Basic abc' } }))).toBeNull();
      expect(extractBearerToken(mockReq({ headers: { authorization: 'Bearer ' } }))).toBeNull();
    });
  });

  describe('createBearerAuth', () => {
    it('should attach the token record and continue', async () => {
      const req = mockReq({ headers: { authorization: 'Bearer access-1' } });
      const res = mockRes();

      const next = await run(bearerAuth, req, res);

      expect(next).toHaveBeenCalledWith();
      expect(req.oauthToken).toMatchObject({ clientId: 'web-app', userId: 'alice' });
    });

    it('should ask for a token when none is sent', async () => {
      const res = mockRes();

      const next = await run(bearerAuth, mockReq(), res);

      expect(next).not.toHaveBeenCalled();
      expect(res.status).toHaveBeenCalledWith(401);
      expect(res.getHeader('WWW-Authenticate')).toBe('Bearer realm="oauth"');
      expect(res.json).toHaveBeenCalledWith({ error: 'invalid_request', error_description: 'Bearer token required' });
    });

    it.each([
      ['an unknown token', 'Bearer nope'],
      ['a refresh token', 'Bearer refresh-1'],
    ])('should reject %s', async (_label, authorization) => {
      const res = mockRes();

      const next = await run(bearerAuth, mockReq({ headers: { authorization } }), res);

      expect(next).not.toHaveBeenCalled();
      expect(res.status).toHaveBeenCalledWith(401);
      expect(res.getHeader('WWW-Authenticate')).toBe('Bearer realm="oauth", error="invalid_token"');
    });

    it('should pass store errors to the error handler', async () => {
      vi.spyOn(store, 'findToken').mockRejectedValue(new Error('store unavailable'));
      const res = mockRes();

      const next = await run(bearerAuth, mockReq({ headers: { authorization: 'Bearer access-1' } }), res);

      expect(next).toHaveBeenCalledWith(expect.objectContaining({ message: 'store unavailable' }));
    });
  });

  describe('requireScope', () => {
    it('should continue when the scope was granted', () => {
      const next = vi.fn();
      requireScope('read')(mockReq({ oauthToken: accessRecord('access-1') }), mockRes(), next);

      expect(next).toHaveBeenCalled();
    });

    it('should answer 403 insufficient_scope otherwise', () => {
      const res = mockRes();
      const next = vi.fn();

      requireScope('write')(mockReq({ oauthToken: accessRecord('access-1') }), res, next);

      expect(next).not.toHaveBeenCalled();
      expect(res.status).toHaveBeenCalledWith(403);
      expect(res.getHeader('WWW-Authenticate')).toBe(
        'Bearer realm="oauth", error="insufficient_scope", scope="write"'
      );
    });
  });
});
