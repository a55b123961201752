/**
 * Bypass Token Verifiers
 *
 * Two strategies for checking a bypass token:
 * - StaticSecretVerifier: compares against a shared secret
 * - SignedTokenVerifier: accepts `v1.<expiresAt>.<hmac>` tokens signed with a
 *   shared key, rejecting them once `expiresAt` (epoch seconds) has passed
 *
 * All comparisons are constant-time. An empty secret never verifies.
 *
 * @module bypass/verifier
 */

import { createHash, createHmac, timingSafeEqual } from 'crypto';

import type { BypassMode, TokenCheck, TokenVerifier } from './types';

const SIGNED_TOKEN_VERSION = 'v1';

const SIGNED_TOKEN_PATTERN = /^v1\.(\d{1,12})\.([0-9a-f]{64})$/;

/**
 * Compare two strings in constant time.
 * Both sides are hashed first so the comparison does not leak length.
 */
export function constantTimeEquals(a: string, b: string): boolean {
  const left = createHash('sha256').update(a, 'utf8').digest();
  const right = createHash('sha256').update(b, 'utf8').digest();
  return timingSafeEqual(left, right);
}

export class StaticSecretVerifier implements TokenVerifier {
  readonly mode = 'static';

  constructor(private readonly secret: string) {}

  verify(token: string): TokenCheck {
    if (!this.secret || !token) {
      return 'invalid';
    }
    return constantTimeEquals(token, this.secret) ? 'valid' : 'invalid';
  }
}

function sign(signingKey: string, payload: string): string {
  return createHmac('sha256', signingKey).update(payload, 'utf8').digest('hex');
}

/**
 * Whether a token lifetime is a positive whole number of seconds.
 */
export function isValidTokenLifetime(ttlSeconds: number): boolean {
  return Number.isInteger(ttlSeconds) && ttlSeconds > 0;
}

/**
 * Mint a short-lived signed bypass token.
 *
 * @param signingKey - Shared signing key
 * @param ttlSeconds - Lifetime in seconds
 * @param now - Issue time
 *
 * @example
 * createSignedToken('test-signing-key', 900, new Date('2026-01-01T00:00:00Z'))
 * // 'v1.1767226500.<64 hex chars>'
 */
export function createSignedToken(signingKey: string, ttlSeconds: number, now: Date = new Date()): string {
  if (!signingKey) {
    throw new Error('A signing key is required to create a bypass token');
  }
  if (!isValidTokenLifetime(ttlSeconds)) {
    throw new Error(`Token lifetime must be a positive number of seconds, got ${ttlSeconds}`);
  }

  const expiresAt = Math.floor(now.getTime() / 1000) + ttlSeconds;
  const payload = `${SIGNED_TOKEN_VERSION}.${expiresAt}`;
  return `${payload}.${sign(signingKey, payload)}`;
}

export class SignedTokenVerifier implements TokenVerifier {
  readonly mode = 'signed';

  constructor(
    private readonly signingKey: string,
    private readonly now: () => Date = (): Date => new Date()
  ) {}

  verify(token: string): TokenCheck {
    if (!this.signingKey) {
      return 'invalid';
    }

    const match = SIGNED_TOKEN_PATTERN.exec(token);
    if (!match) {
      return 'invalid';
    }

    const [, expiresAt, signature] = match;
    const expected = sign(this.signingKey, `${SIGNED_TOKEN_VERSION}.${expiresAt}`);
    if (!constantTimeEquals(signature, expected)) {
      return 'invalid';
    }

    // Expiry is only reported for correctly signed tokens
    if (Number(expiresAt) * 1000 <= this.now().getTime()) {
      return 'expired';
    }

    return 'valid';
  }
}

/**
 * Build the verifier for a bypass mode.
 */
export function createVerifier(mode: BypassMode, secret: string): TokenVerifier {
  switch (mode) {
    case 'static':
      return new StaticSecretVerifier(secret);
    case 'signed':
      return new SignedTokenVerifier(secret);
  }
}
