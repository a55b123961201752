/**
 * Policy Evaluator
 *
 * Evaluates a findings report against a severity policy.
 *
 * Decision matrix (threshold HIGH):
 * | Considered findings          | Outcome                     |
 * |------------------------------|-----------------------------|
 * | none                         | clean                       |
 * | only LOW / MEDIUM            | clean                       |
 * | any HIGH or CRITICAL         | violation (those findings)  |
 * | CRITICAL in exempt package   | clean                       |
 *
 * @module policy/evaluator
 */

import type { Finding, FindingsReport, Severity } from '../findings/types';
import { compareSeverity, isAtOrAbove } from '../findings/types';
import { applyExceptions } from './exceptions';
import type { EvaluationOutcome, Policy, SeverityCounts } from './types';

/**
 * Count findings by severity level.
 *
 * @param findings - Findings to count
 * @returns Severity counts including total
 */
export function countFindings(findings: readonly Finding[]): SeverityCounts {
  const counts: SeverityCounts = {
    CRITICAL: 0,
    HIGH: 0,
    MEDIUM: 0,
    LOW: 0,
    total: 0,
  };

  for (const finding of findings) {
    counts[finding.severity]++;
    counts.total++;
  }

  return counts;
}

/**
 * Highest severity present, or null for an empty list.
 */
export function maxSeverity(findings: readonly Finding[]): Severity | null {
  let max: Severity | null = null;
  for (const finding of findings) {
    if (max === null || compareSeverity(finding.severity, max) > 0) {
      max = finding.severity;
    }
  }
  return max;
}

/**
 * Evaluate a findings report against a policy.
 * Pure: reads its inputs, never mutates them.
 *
 * @param report - Loaded findings report
 * @param policy - Severity policy
 * @returns `violation` with the offending findings in scanner order, or `clean`
 */
export function evaluatePolicy(report: FindingsReport, policy: Policy): EvaluationOutcome {
  const { considered, exempted } = applyExceptions(report.findings, policy.exceptions);

  const base = {
    maxSeverity: maxSeverity(considered),
    counts: countFindings(considered),
    exempted,
    threshold: policy.threshold,
  };

  const violations = considered.filter((finding) =>
    isAtOrAbove(finding.severity, policy.threshold)
  );

  if (violations.length === 0) {
    return { kind: 'clean', ...base };
  }

  return { kind: 'violation', findings: violations, ...base };
}

/**
 * Format a human-readable summary of a violation.
 *
 * @example
 * // 'Policy check failed: 1 finding(s) at or above HIGH (1 critical)'
 */
export function formatViolationReason(outcome: EvaluationOutcome): string {
  if (outcome.kind === 'clean') {
    return `No findings at or above ${outcome.threshold}`;
  }

  const byLevel = countFindings(outcome.findings);
  const parts: string[] = [];
  for (const level of ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW'] as const) {
    if (byLevel[level] > 0) {
      parts.push(`${byLevel[level]} ${level.toLowerCase()}`);
    }
  }

  return (
    `Policy check failed: ${outcome.findings.length} finding(s) at or above ` +
    `${outcome.threshold} (${parts.join(', ')})`
  );
}
