/**
 * Configuration schema definitions using Zod
 *
 * Defines the validation schemas for the policy gate configuration file.
 * All configuration is validated against these schemas at runtime.
 *
 * @module config/schema
 */

import { z } from 'zod';

/**
 * Severity threshold schema.
 * Findings at or above this level fail the gate.
 */
export const SeverityThresholdSchema = z.enum(['LOW', 'MEDIUM', 'HIGH', 'CRITICAL']);
export type SeverityThreshold = z.infer<typeof SeverityThresholdSchema>;

/**
 * Limits on configuration collections.
 */
export const CONFIG_LIMITS = {
  /** Maximum number of package exceptions */
  MAX_EXCEPTIONS: 500,
  /** Maximum package name length (npm's limit, generous for OS packages) */
  MAX_PACKAGE_NAME_LENGTH: 214,
  /** Maximum audit append attempts */
  MAX_AUDIT_ATTEMPTS: 10,
} as const;

/**
 * Environment variable names must be upper snake case.
 */
const ENV_NAME_PATTERN = /^[A-Z_][A-Z0-9_]*$/;

/**
 * Bypass configuration.
 * The secret itself is never part of the file; only the name of the
 * environment variable holding it.
 */
export const BypassConfigSchema = z
  .object({
    /** Whether bypass requests are considered at all */
    enabled: z.boolean().default(true),

    /** Token strategy: static shared secret or short-lived signed token */
    mode: z.enum(['static', 'signed']).default('static'),

    /** Environment variable holding the secret or signing key */
    secret_env: z
      .string()
      .regex(ENV_NAME_PATTERN, {
        message: `secret_env must match pattern ${ENV_NAME_PATTERN.source}`,
      })
      .default('GATE_BYPASS_SECRET'),
  })
  .strict();
export type BypassConfig = z.infer<typeof BypassConfigSchema>;

/**
 * Audit log configuration.
 */
export const AuditConfigSchema = z
  .object({
    /** Directory holding the daily audit files */
    log_dir: z.string().min(1).default('logs/audit'),

    /** Append attempts before a write is treated as failed */
    max_attempts: z.number().int().min(1).max(CONFIG_LIMITS.MAX_AUDIT_ATTEMPTS).default(3),
  })
  .strict();
export type AuditConfig = z.infer<typeof AuditConfigSchema>;

/**
 * Markdown report configuration.
 */
export const ReportConfigSchema = z
  .object({
    /** Whether a Markdown report file is written */
    enabled: z.boolean().default(true),

    /** Directory for report files */
    dir: z.string().min(1).default('reports'),
  })
  .strict();
export type ReportConfig = z.infer<typeof ReportConfigSchema>;

/**
 * Root configuration schema.
 * This is the complete schema for .policy-gate.yml
 */
export const RootConfigSchema = z
  .object({
    /** Schema version (currently only "1" is supported) */
    version: z.literal('1').default('1'),

    /** Minimum severity that fails the gate */
    severity_threshold: SeverityThresholdSchema.default('HIGH'),

    /** Package names exempt from the policy (trailing * for prefix match) */
    exceptions: z
      .array(z.string().min(1).max(CONFIG_LIMITS.MAX_PACKAGE_NAME_LENGTH))
      .max(CONFIG_LIMITS.MAX_EXCEPTIONS)
      .default([]),

    /** Directory holding `<scanner>-results.json` files */
    results_dir: z.string().min(1).default('scan-results'),

    bypass: BypassConfigSchema.default({}),

    audit: AuditConfigSchema.default({}),

    report: ReportConfigSchema.default({}),
  })
  .strict();

/**
 * Fully resolved configuration type (after defaults applied).
 */
export type Config = z.infer<typeof RootConfigSchema>;

/**
 * Partial configuration type (as provided by user before defaults).
 */
export type PartialConfig = z.input<typeof RootConfigSchema>;

/**
 * Configuration validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: z.ZodError['errors']
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format validation errors as a human-readable string.
   */
  formatErrors(): string {
    return this.errors
      .map((err) => {
        const path = err.path.join('.');
        return path ? `  - ${path}: ${err.message}` : `  - ${err.message}`;
      })
      .join('\n');
  }
}

/**
 * Validate and parse configuration object.
 *
 * @param data - Raw configuration data to validate
 * @returns Validated and typed configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(data: unknown): Config {
  const result = RootConfigSchema.safeParse(data);

  if (!result.success) {
    throw new ConfigValidationError('Configuration validation failed', result.error.errors);
  }

  return result.data;
}
