/**
 * Package Exceptions
 *
 * Splits findings into those the policy considers and those whose package
 * is on the exception list.
 *
 * @module policy/exceptions
 */

import type { Finding } from '../findings/types';

/**
 * Result of applying package exceptions to findings.
 */
export interface ExceptionResult {
  /** Findings the policy applies to, in original order */
  considered: Finding[];
  /** Findings whose package is exempt, in original order */
  exempted: Finding[];
}

/**
 * Check whether a package name matches an exception entry.
 * Exact match, or prefix match when the entry ends with `*`.
 *
 * @example
 * matchesException('openssl', 'openssl') // true
 * matchesException('libssl3', 'libssl*') // true
 * matchesException('zlib', 'libssl*') // false
 */
export function matchesException(packageName: string, exception: string): boolean {
  const entry = exception.trim();
  if (entry.length === 0) {
    return false;
  }

  if (entry.endsWith('*')) {
    return packageName.startsWith(entry.slice(0, -1));
  }

  return packageName === entry;
}

/**
 * Whether a finding's package is covered by any exception.
 */
export function isExempt(finding: Finding, exceptions: readonly string[]): boolean {
  return exceptions.some((exception) => matchesException(finding.package, exception));
}

/**
 * Apply the exception list to findings.
 *
 * @param findings - Findings in scanner order
 * @param exceptions - Package exceptions from the policy
 */
export function applyExceptions(
  findings: readonly Finding[],
  exceptions: readonly string[]
): ExceptionResult {
  const result: ExceptionResult = { considered: [], exempted: [] };

  if (exceptions.length === 0) {
    result.considered = [...findings];
    return result;
  }

  for (const finding of findings) {
    if (isExempt(finding, exceptions)) {
      result.exempted.push(finding);
    } else {
      result.considered.push(finding);
    }
  }

  return result;
}
