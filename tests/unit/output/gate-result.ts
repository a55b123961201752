/**
 * Builders for completed gate results used by the output tests.
 */

import type { Finding, FindingsReport, Severity } from '../../../src/findings/types';
import { ExitCode, type CompletedGateResult, type Verdict } from '../../../src/gate/types';
import { evaluatePolicy } from '../../../src/policy/evaluator';
import type { Policy } from '../../../src/policy/types';

export const OPENSSL_CRITICAL: Finding = {
  id: 'CVE-2026-0001',
  severity: 'CRITICAL',
  package: 'openssl',
  installedVersion: '3.0.1',
  fixedVersion: '3.0.2',
  title: 'TLS flaw',
};

export const ZLIB_LOW: Finding = {
  id: 'CVE-2026-1101',
  severity: 'LOW',
  package: 'zlib',
};

export function createReport(findings: Finding[]): FindingsReport {
  return {
    tool: 'trivy',
    target: 'app:1.0',
    timestamp: '2026-10-01T12:00:00Z',
    findings,
    source: '/tmp/trivy-results.json',
  };
}

/**
 * Evaluate findings and wrap them in a completed result with the verdict the
 * gate would reach for the given bypass reason.
 */
export function createResult(
  findings: Finding[],
  threshold: Severity = 'HIGH',
  options: { exceptions?: string[]; bypassReason?: string; rejected?: boolean } = {}
): CompletedGateResult {
  const policy: Policy = { threshold, exceptions: options.exceptions ?? [] };
  const report = createReport(findings);
  const outcome = evaluatePolicy(report, policy);

  let verdict: Verdict;
  if (outcome.kind === 'clean') {
    verdict = { status: 'PASS' };
  } else if (options.bypassReason !== undefined) {
    verdict = { status: 'BYPASSED', reason: options.bypassReason, overridden: outcome.findings };
  } else {
    verdict = {
      status: 'FAIL',
      violations: outcome.findings,
      ...(options.rejected && { bypassRejection: 'invalid token' as const }),
    };
  }

  return {
    kind: 'completed',
    verdict,
    report,
    policy,
    outcome,
    bypass:
      verdict.status === 'BYPASSED'
        ? { status: 'granted', reason: verdict.reason }
        : options.rejected
          ? { status: 'rejected', reason: 'invalid token' }
          : { status: 'not_requested' },
    states: [],
    exitCode: verdict.status === 'FAIL' ? ExitCode.PolicyViolation : ExitCode.Success,
  };
}
