/**
 * Bypass module
 *
 * @module bypass
 */

export type {
  AuthorizationContext,
  BypassDecision,
  BypassMode,
  BypassRequest,
  BypassSettings,
  GrantedDecision,
  NotRequestedDecision,
  RejectedDecision,
  RejectionReason,
  TokenCheck,
  TokenVerifier,
} from './types';
export { BypassAuthority } from './authority';
export type { BypassAuthorityOptions } from './authority';
export {
  SignedTokenVerifier,
  StaticSecretVerifier,
  constantTimeEquals,
  createSignedToken,
  createVerifier,
  isValidTokenLifetime,
} from './verifier';
export {
  BYPASS_REASON_ENV,
  BYPASS_TOKEN_ENV,
  parseBypassRequest,
} from './request';
export type { RawBypassInput } from './request';
