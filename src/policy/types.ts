/**
 * Policy type definitions
 *
 * Defines the severity policy and the outcome of evaluating a findings
 * report against it.
 *
 * @module policy/types
 */

import type { Finding, Severity } from '../findings/types';

/**
 * Severity policy applied to a findings report.
 */
export interface Policy {
  /** Minimum severity that causes a gate failure */
  readonly threshold: Severity;

  /**
   * Package names exempt from the policy.
   * A trailing `*` matches any package with that prefix.
   */
  readonly exceptions: readonly string[];
}

/**
 * Counts of considered (non-exempt) findings by severity level.
 */
export type SeverityCounts = Record<Severity, number> & {
  /** Total number of considered findings */
  total: number;
};

interface OutcomeBase {
  /** Highest severity among considered findings, null when there are none */
  maxSeverity: Severity | null;

  /** Counts of considered findings */
  counts: SeverityCounts;

  /** Findings skipped because their package is exempt */
  exempted: Finding[];

  /** The threshold used for evaluation */
  threshold: Severity;
}

/**
 * No considered finding reaches the threshold.
 */
export interface CleanOutcome extends OutcomeBase {
  kind: 'clean';
}

/**
 * At least one considered finding is at or above the threshold.
 */
export interface ViolationOutcome extends OutcomeBase {
  kind: 'violation';

  /** Violating findings in original scanner order */
  findings: Finding[];
}

export type EvaluationOutcome = CleanOutcome | ViolationOutcome;
