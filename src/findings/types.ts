/**
 * Findings type definitions
 *
 * Defines the normalised vulnerability finding model shared by the loader,
 * the policy evaluator and the reporting layer.
 *
 * @module findings/types
 */

/**
 * Severity levels for findings.
 */
export type Severity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

/**
 * All severity levels in ascending order (least severe first).
 */
export const SEVERITY_ORDER: readonly Severity[] = ['LOW', 'MEDIUM', 'HIGH', 'CRITICAL'];

/**
 * Scanners whose normalised output the gate knows where to find.
 */
export type ScannerName = 'trivy' | 'grype';

export const SUPPORTED_SCANNERS: readonly ScannerName[] = ['trivy', 'grype'];

/**
 * A single reported vulnerability.
 */
export interface Finding {
  /** Vulnerability identifier (e.g., CVE-2023-1234, GHSA-xxxx) */
  readonly id: string;

  /** Normalised severity */
  readonly severity: Severity;

  /** Affected package or component */
  readonly package: string;

  /** Version that fixes the vulnerability, when the scanner knows one */
  readonly fixedVersion?: string;

  /** Installed version of the affected package */
  readonly installedVersion?: string;

  /** Short human-readable title */
  readonly title?: string;
}

/**
 * Findings produced by one scanner run against one target.
 */
export interface FindingsReport {
  /** Scanner that produced the report (e.g., trivy) */
  readonly tool: string;

  /** Scan target (image reference, directory, ...) */
  readonly target: string;

  /** ISO 8601 timestamp of the scan */
  readonly timestamp: string;

  /** Findings in scanner order */
  readonly findings: readonly Finding[];

  /** Path the report was loaded from */
  readonly source: string;
}

/**
 * Numeric rank of a severity (LOW = 0 ... CRITICAL = 3).
 */
export function severityRank(severity: Severity): number {
  return SEVERITY_ORDER.indexOf(severity);
}

/**
 * Compare two severities.
 *
 * @returns Negative if a < b, zero if equal, positive if a > b
 */
export function compareSeverity(a: Severity, b: Severity): number {
  return severityRank(a) - severityRank(b);
}

/**
 * Whether `severity` is at or above `threshold`.
 */
export function isAtOrAbove(severity: Severity, threshold: Severity): boolean {
  return compareSeverity(severity, threshold) >= 0;
}

/**
 * Parse a severity string case-insensitively.
 *
 * @param value - Raw severity from the scanner
 * @returns The severity, or null if the value is not a known level
 */
export function parseSeverity(value: string): Severity | null {
  const upper = value.trim().toUpperCase();
  return SEVERITY_ORDER.find((level) => level === upper) ?? null;
}

export function isSupportedScanner(value: string): value is ScannerName {
  return value === 'trivy' || value === 'grype';
}
