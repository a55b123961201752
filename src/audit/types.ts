/**
 * Audit type definitions
 *
 * @module audit/types
 */

import type { Severity } from '../findings/types';

/**
 * Kind of audited event.
 * - bypass_decision: a bypass request was granted or rejected
 * - bypass_unused: a bypass request arrived for a run with nothing to bypass
 */
export type AuditEvent = 'bypass_decision' | 'bypass_unused';

/**
 * Summary of a finding overridden by a granted bypass.
 */
export interface OverriddenFinding {
  id: string;
  severity: Severity;
  package: string;
}

/**
 * One append-only audit record.
 */
export interface AuditEntry {
  /** ISO 8601 timestamp */
  timestamp: string;

  event: AuditEvent;

  decision: 'granted' | 'rejected' | 'ignored';

  /** Human-supplied bypass reason, when one was given */
  reason?: string;

  /** Why the request was rejected */
  rejectionReason?: string;

  /** Redacted token fingerprint; never the raw token */
  tokenFingerprint: string;

  /** Scan target the decision applies to */
  target?: string;

  /** Scanner that produced the findings */
  tool?: string;

  /** Findings overridden by a granted bypass */
  overriddenFindings?: OverriddenFinding[];
}

/**
 * Append-only sink for audit entries.
 * Implementations must write each entry atomically and throw when the entry
 * could not be recorded.
 */
export interface AuditLog {
  /** Location of the log, for reporting */
  readonly location: string;

  append(entry: AuditEntry): void;
}

/**
 * Error thrown when an audit entry could not be recorded.
 */
export class AuditWriteError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'AuditWriteError';
  }
}
