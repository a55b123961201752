/**
 * Bypass request parsing
 *
 * Turns raw bypass inputs (CLI flags, environment, action inputs) into an
 * explicit BypassRequest at the entry point. Nothing downstream reads the
 * environment.
 *
 * @module bypass/request
 */

import type { BypassRequest } from './types';

/** Environment variable carrying the bypass token */
export const BYPASS_TOKEN_ENV = 'GATE_BYPASS_TOKEN';

/** Environment variable carrying the bypass reason */
export const BYPASS_REASON_ENV = 'GATE_BYPASS_REASON';

/** Raw, unvalidated bypass inputs */
export interface RawBypassInput {
  token?: string;
  reason?: string;
}

/**
 * Build a bypass request from raw inputs.
 * A request exists only when a non-empty token is supplied; the reason is
 * carried as given so the authority can reject an empty one.
 *
 * @returns The request, or null when no token was supplied
 */
export function parseBypassRequest(input: RawBypassInput): BypassRequest | null {
  const token = input.token ?? '';
  if (token.trim().length === 0) {
    return null;
  }

  return {
    token,
    reason: input.reason ?? '',
  };
}
