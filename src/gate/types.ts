/**
 * Gate type definitions
 *
 * @module gate/types
 */

import type { BypassDecision, RejectionReason } from '../bypass/types';
import type { Finding, FindingsReport } from '../findings/types';
import type { LoadError } from '../findings/loader';
import type { EvaluationOutcome, Policy } from '../policy/types';

/**
 * Process exit codes.
 * Input errors are kept apart from policy failures so callers can tell
 * "broken input" from "vulnerable artifact".
 */
export const ExitCode = {
  /** Gate passed or was bypassed */
  Success: 0,
  /** Findings at or above the threshold, no valid bypass */
  PolicyViolation: 1,
  /** Findings or configuration could not be loaded */
  InputError: 2,
  /** Unexpected internal error */
  InternalError: 3,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * States of a gate run.
 * Loading -> Evaluating -> Clean | Violated -> FinalPass | FinalFail | FinalBypassed,
 * or Loading -> LoadFailed.
 */
export type GateState =
  | 'Loading'
  | 'Evaluating'
  | 'Clean'
  | 'Violated'
  | 'FinalPass'
  | 'FinalFail'
  | 'FinalBypassed'
  | 'LoadFailed';

export interface PassVerdict {
  status: 'PASS';
}

export interface FailVerdict {
  status: 'FAIL';
  /** Violating findings in scanner order */
  violations: Finding[];
  /** Why a bypass attempt was refused, when one was made */
  bypassRejection?: RejectionReason;
}

export interface BypassedVerdict {
  status: 'BYPASSED';
  /** Human-supplied bypass reason */
  reason: string;
  /** Violations the bypass overrode */
  overridden: Finding[];
}

export type Verdict = PassVerdict | FailVerdict | BypassedVerdict;

export type VerdictStatus = Verdict['status'];

/**
 * A run that loaded its findings and reached a verdict.
 */
export interface CompletedGateResult {
  kind: 'completed';
  verdict: Verdict;
  report: FindingsReport;
  policy: Policy;
  outcome: EvaluationOutcome;
  bypass: BypassDecision;
  /** States visited, in order */
  states: GateState[];
  exitCode: ExitCodeValue;
}

/**
 * A run that stopped because the findings could not be loaded.
 */
export interface LoadFailedGateResult {
  kind: 'load_failed';
  error: LoadError;
  states: GateState[];
  exitCode: typeof ExitCode.InputError;
}

export type GateResult = CompletedGateResult | LoadFailedGateResult;
