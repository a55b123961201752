/**
 * Policy module
 *
 * Exports policy evaluation functionality.
 *
 * @module policy
 */

export type {
  CleanOutcome,
  EvaluationOutcome,
  Policy,
  SeverityCounts,
  ViolationOutcome,
} from './types';
export { countFindings, evaluatePolicy, formatViolationReason, maxSeverity } from './evaluator';
export { applyExceptions, isExempt, matchesException } from './exceptions';
export type { ExceptionResult } from './exceptions';
