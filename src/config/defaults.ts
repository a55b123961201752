/**
 * Default configuration values
 *
 * Provides the default configuration used when no config file exists
 * or when fields are omitted from the user's configuration.
 *
 * @module config/defaults
 */

import type { Config } from './schema';

/**
 * Default configuration.
 *
 * - severity_threshold: HIGH (HIGH and CRITICAL findings fail the gate)
 * - no package exceptions
 * - bypass enabled with a static secret read from GATE_BYPASS_SECRET
 */
export const DEFAULT_CONFIG: Config = {
  version: '1',
  severity_threshold: 'HIGH',
  exceptions: [],
  results_dir: 'scan-results',
  bypass: {
    enabled: true,
    mode: 'static',
    secret_env: 'GATE_BYPASS_SECRET',
  },
  audit: {
    log_dir: 'logs/audit',
    max_attempts: 3,
  },
  report: {
    enabled: true,
    dir: 'reports',
  },
};

/**
 * Default configuration file name.
 */
export const DEFAULT_CONFIG_FILENAME = '.policy-gate.yml';

/**
 * Alternative configuration file names (checked in order).
 */
export const ALTERNATIVE_CONFIG_FILENAMES = [
  '.policy-gate.yaml',
  'policy-gate.yml',
  'policy-gate.yaml',
];

/**
 * Environment variables that override file settings.
 */
export const ENV_OVERRIDES = {
  /** LOW | MEDIUM | HIGH | CRITICAL, case-insensitive */
  severityThreshold: 'GATE_SEVERITY_THRESHOLD',
  /** Comma-separated package exceptions (replaces the file's list) */
  exceptions: 'GATE_EXCEPTIONS',
  /** true | false */
  bypassEnabled: 'GATE_BYPASS_ENABLED',
} as const;

/**
 * Get a fresh copy of the default configuration.
 *
 * @returns Deep copy of default configuration
 */
export function getDefaultConfig(): Config {
  return structuredClone(DEFAULT_CONFIG);
}
