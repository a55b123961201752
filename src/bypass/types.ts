/**
 * Bypass type definitions
 *
 * @module bypass/types
 */

import type { Finding } from '../findings/types';

/**
 * An explicit request to override a failing gate.
 */
export interface BypassRequest {
  readonly token: string;
  /** Free-text justification supplied by a human */
  readonly reason: string;
}

/**
 * Why a bypass request was refused.
 */
export type RejectionReason =
  | 'invalid token'
  | 'missing reason'
  | 'bypass disabled'
  | 'token expired'
  | 'audit write failed';

export interface NotRequestedDecision {
  status: 'not_requested';
}

export interface RejectedDecision {
  status: 'rejected';
  reason: RejectionReason;
}

export interface GrantedDecision {
  status: 'granted';
  /** Trimmed human-supplied reason */
  reason: string;
}

export type BypassDecision = NotRequestedDecision | RejectedDecision | GrantedDecision;

/**
 * Outcome of checking a token against the configured secret.
 */
export type TokenCheck = 'valid' | 'invalid' | 'expired';

/**
 * Token verification strategy.
 * - static: token must equal a shared secret
 * - signed: token is a short-lived HMAC-signed value
 */
export type BypassMode = 'static' | 'signed';

export interface TokenVerifier {
  readonly mode: BypassMode;

  verify(token: string): TokenCheck;
}

/**
 * Validated bypass configuration handed to the authority.
 */
export interface BypassSettings {
  /** When false every request is rejected */
  readonly enabled: boolean;
  readonly verifier: TokenVerifier;
}

/**
 * Details about the run a bypass decision applies to, recorded in the audit log.
 */
export interface AuthorizationContext {
  tool?: string;
  target?: string;
  /** Findings a granted bypass would override */
  findings?: readonly Finding[];
}
