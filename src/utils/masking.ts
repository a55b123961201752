/**
 * Secret masking utilities
 *
 * Keeps bypass tokens and secrets out of logs, reports and audit entries.
 * Tokens are only ever recorded as a short one-way fingerprint.
 *
 * @module utils/masking
 */

import * as core from '@actions/core';
import { createHash } from 'crypto';

/** Number of hex characters of the digest kept in a fingerprint */
const FINGERPRINT_HEX_LENGTH = 12;

/**
 * Produce a redacted, stable fingerprint of a token.
 * Identical tokens share a fingerprint so audit entries can be correlated,
 * but the token cannot be recovered from it.
 *
 * @param token - Raw token value
 * @returns `sha256:<first 12 hex chars>`, or an empty string for an empty token
 *
 * @example
 * tokenFingerprint('test-token') // 'sha256:' followed by 12 hex characters
 */
export function tokenFingerprint(token: string): string {
  if (!token) {
    return '';
  }

  const digest = createHash('sha256').update(token, 'utf8').digest('hex');
  return `sha256:${digest.substring(0, FINGERPRINT_HEX_LENGTH)}`;
}

/**
 * Register secrets with GitHub Actions to prevent them from appearing in logs.
 * Filters out empty and duplicate values.
 *
 * @param values - Secret values to register
 */
export function registerSecrets(values: readonly string[]): void {
  const uniqueSecrets = new Set<string>();

  for (const value of values) {
    // Skip empty or whitespace-only values
    if (!value || value.trim().length === 0) {
      continue;
    }

    if (uniqueSecrets.has(value)) {
      continue;
    }

    uniqueSecrets.add(value);
    core.setSecret(value);
  }
}
