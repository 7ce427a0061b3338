import { describe, it, expect } from 'vitest';
import crypto from 'crypto';
import {
  generateCodeVerifier,
  generateCodeChallenge,
  isCodeChallengeMethod,
  verifyCodeChallenge,
} from '../../src/oauth/pkce.js';

describe('PKCE', () => {
  describe('generateCodeVerifier', () => {
    it('should generate a string of valid length (43-128 chars)', () => {
      const verifier = generateCodeVerifier();
      expect(verifier.length).toBeGreaterThanOrEqual(43);
      expect(verifier.length).toBeLessThanOrEqual(128);
    });

    it('should generate only base64url characters', () => {
      expect(generateCodeVerifier()).toMatch(/^[A-Za-z0-9\-_]+$/);
    });

    it('should generate unique values', () => {
      const verifiers = new Set<string>();
      for (let i = 0; i < 100; i++) {
        verifiers.add(generateCodeVerifier());
      }
      expect(verifiers.size).toBe(100);
    });
  });

  describe('generateCodeChallenge', () => {
    it('should generate a valid S256 challenge', () => {
      const verifier = 'test-verifier-12345678901234567890123456789012';

      const expected = crypto.createHash('sha256').update(verifier, 'ascii').digest('base64url');

      expect(generateCodeChallenge(verifier)).toBe(expected);
      expect(generateCodeChallenge(verifier, 'S256')).toBe(expected);
    });

    it('should return the verifier itself for plain', () => {
      expect(generateCodeChallenge('some-verifier', 'plain')).toBe('some-verifier');
    });
  });

  describe('verifyCodeChallenge', () => {
    const verifier = generateCodeVerifier();

    it('should accept the matching verifier for both methods', () => {
      expect(verifyCodeChallenge(verifier, generateCodeChallenge(verifier, 'S256'), 'S256')).toBe(true);
      expect(verifyCodeChallenge(verifier, verifier, 'plain')).toBe(true);
    });

    it('should reject a different verifier', () => {
      const challenge = generateCodeChallenge(verifier, 'S256');
      expect(verifyCodeChallenge(generateCodeVerifier(), challenge, 'S256')).toBe(false);
    });

    it('should not accept an S256 challenge checked as plain', () => {
      const challenge = generateCodeChallenge(verifier, 'S256');
      expect(verifyCodeChallenge(verifier, challenge, 'plain')).toBe(false);
    });

    it.each([
      ['too short', 'a'.repeat(42)],
      ['too long', 'a'.repeat(129)],
      ['outside the unreserved set', `${'a'.repeat(43)}+`],
    ])('should reject a verifier that is %s', (_label, candidate) => {
      expect(verifyCodeChallenge(candidate, candidate, 'plain')).toBe(false);
    });
  });

  describe('isCodeChallengeMethod', () => {
    it('should only know plain and S256', () => {
      expect(isCodeChallengeMethod('plain')).toBe(true);
      expect(isCodeChallengeMethod('S256')).toBe(true);
      expect(isCodeChallengeMethod('s256')).toBe(false);
    });
  });
});
