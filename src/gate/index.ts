/**
 * Gate module
 *
 * @module gate
 */

export type {
  BypassedVerdict,
  CompletedGateResult,
  ExitCodeValue,
  FailVerdict,
  GateResult,
  GateState,
  LoadFailedGateResult,
  PassVerdict,
  Verdict,
  VerdictStatus,
} from './types';
export { ExitCode } from './types';
export { runGate } from './orchestrator';
export type { GateOptions } from './orchestrator';
export { bypassSettingsFromConfig, policyFromConfig } from './settings';
export { executeGate } from './pipeline';
export type { GateInvocation, GateInvocationResult } from './pipeline';
