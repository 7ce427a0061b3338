import crypto from 'crypto';
import type { CodeChallengeMethod } from './types.js';

/**
 * PKCE (Proof Key for Code Exchange) per RFC 7636
 */

// code_verifier = 43*128unreserved
const VERIFIER_PATTERN = /^[A-Za-z0-9\-._~]{43,128}$/;

/**
 * Generate a cryptographically random code verifier
 */
export function generateCodeVerifier(): string {
  // 48 bytes = 64 base64url characters
  return crypto.randomBytes(48).toString('base64url');
}

/**
 * Derive the challenge for a verifier. `plain` is the verifier itself,
 * `S256` is BASE64URL(SHA256(ASCII(code_verifier))).
 */
export function generateCodeChallenge(codeVerifier: string, method: CodeChallengeMethod = 'S256'): string {
  if (method === 'plain') {
    return codeVerifier;
  }

  return crypto
    .createHash('sha256')
    .update(codeVerifier, 'ascii')
    .digest('base64url');
}

export function isCodeChallengeMethod(value: string): value is CodeChallengeMethod {
  return value === 'plain' || value === 'S256';
}

/**
 * Check a verifier against the stored challenge using the stored method
 */
export function verifyCodeChallenge(
  codeVerifier: string,
  codeChallenge: string,
  method: CodeChallengeMethod
): boolean {
  if (!VERIFIER_PATTERN.test(codeVerifier)) {
    return false;
  }

  const computed = Buffer.from(generateCodeChallenge(codeVerifier, method));
  const expected = Buffer.from(codeChallenge);

  // timingSafeEqual throws on length mismatch
  if (computed.length !== expected.length) {
    return false;
  }

  return crypto.timingSafeEqual(computed, expected);
}
