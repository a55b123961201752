/**
 * Gate Orchestrator
 *
 * Drives a single gate run through its states:
 * load the findings, evaluate the policy, consult the bypass authority when
 * the policy is violated, and settle on a verdict and exit code.
 *
 * @module gate/orchestrator
 */

import type { BypassAuthority } from '../bypass/authority';
import type { BypassDecision, BypassRequest } from '../bypass/types';
import { LoadError, loadFindings } from '../findings/loader';
import type { Finding, FindingsReport } from '../findings/types';
import { type EvaluationOutcome, type Policy, evaluatePolicy, formatViolationReason } from '../policy';
import { Logger } from '../utils/logger';
import {
  type CompletedGateResult,
  ExitCode,
  type FailVerdict,
  type GateResult,
  type GateState,
  type Verdict,
} from './types';

/**
 * Inputs for one gate run. Everything the run depends on is passed in.
 */
export interface GateOptions {
  /** Path to the normalised findings document */
  findingsPath: string;
  policy: Policy;
  /** Explicit bypass request, or null */
  bypassRequest: BypassRequest | null;
  authority: BypassAuthority;
  logger?: Logger;
}

function describeFinding(finding: Finding): string {
  const fix = finding.fixedVersion ? `, fixed in ${finding.fixedVersion}` : '';
  return `${finding.id} (${finding.severity}, ${finding.package}${fix})`;
}

/**
 * Run the gate.
 *
 * Never throws for load failures: they come back as a `load_failed` result
 * with the input-error exit code.
 */
export function runGate(options: GateOptions): GateResult {
  const { findingsPath, policy, bypassRequest, authority } = options;
  const logger = options.logger ?? new Logger();
  const states: GateState[] = ['Loading'];

  let report: FindingsReport;
  try {
    report = loadFindings(findingsPath);
  } catch (error) {
    if (error instanceof LoadError) {
      states.push('LoadFailed');
      logger.error(`Could not load findings (${error.kind}): ${error.message}`);
      return { kind: 'load_failed', error, states, exitCode: ExitCode.InputError };
    }
    throw error;
  }

  logger.debug(`Loaded ${report.findings.length} finding(s) from ${report.source}`);
  states.push('Evaluating');

  const outcome = evaluatePolicy(report, policy);
  const { counts } = outcome;
  logger.info(
    `Vulnerability counts - Critical: ${counts.CRITICAL}, High: ${counts.HIGH}, ` +
      `Medium: ${counts.MEDIUM}, Low: ${counts.LOW}`
  );
  if (outcome.exempted.length > 0) {
    logger.info(`${outcome.exempted.length} finding(s) exempt by package exception`);
  }

  if (outcome.kind === 'clean') {
    states.push('Clean', 'FinalPass');

    if (bypassRequest) {
      logger.info('Bypass request ignored: no policy violation to bypass');
      authority.recordUnused(bypassRequest, { tool: report.tool, target: report.target });
    }

    return complete(report, policy, outcome, { status: 'not_requested' }, { status: 'PASS' }, states);
  }

  states.push('Violated');
  logger.debug(formatViolationReason(outcome));

  const decision = authority.authorize(bypassRequest, {
    tool: report.tool,
    target: report.target,
    findings: outcome.findings,
  });

  if (decision.status === 'granted') {
    states.push('FinalBypassed');
    logger.warn(
      `Security gate bypassed, overriding ${outcome.findings.length} violation(s): ` +
        outcome.findings.map(describeFinding).join(', ')
    );
    logger.warn(`Bypass reason: ${decision.reason}`);

    return complete(
      report,
      policy,
      outcome,
      decision,
      { status: 'BYPASSED', reason: decision.reason, overridden: outcome.findings },
      states
    );
  }

  states.push('FinalFail');
  const verdict: FailVerdict = { status: 'FAIL', violations: outcome.findings };
  if (decision.status === 'rejected') {
    verdict.bypassRejection = decision.reason;
    logger.warn(`Bypass rejected: ${decision.reason}`);
  }

  return complete(report, policy, outcome, decision, verdict, states);
}

function complete(
  report: FindingsReport,
  policy: Policy,
  outcome: EvaluationOutcome,
  bypass: BypassDecision,
  verdict: Verdict,
  states: GateState[]
): CompletedGateResult {
  return {
    kind: 'completed',
    verdict,
    report,
    policy,
    outcome,
    bypass,
    states,
    exitCode: verdict.status === 'FAIL' ? ExitCode.PolicyViolation : ExitCode.Success,
  };
}
