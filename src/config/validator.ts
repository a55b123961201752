/**
 * Configuration validator
 *
 * Additional validation beyond schema validation.
 * Checks semantic constraints like "an exception may not exempt everything".
 *
 * @module config/validator
 */

import * as core from '@actions/core';

import type { Config } from './schema';

/**
 * Error thrown when configuration fails semantic validation.
 */
export class ConfigSemanticError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigSemanticError';
  }
}

/**
 * Options for configuration validation.
 */
export interface ValidateConfigOptions {
  /** Environment the bypass secret is read from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Reject exceptions that would exempt every package, warn on duplicates.
 *
 * @param config - Configuration to validate
 * @throws ConfigSemanticError if an exception matches every package
 */
function validateExceptions(config: Config): void {
  const seen = new Set<string>();

  for (const exception of config.exceptions) {
    const entry = exception.trim();

    if (entry === '*' || entry === '') {
      throw new ConfigSemanticError(
        `Exception '${exception}' would exempt every package. ` +
          'List package names explicitly, or use a prefix such as "libssl*".'
      );
    }

    if (seen.has(entry)) {
      core.warning(`Duplicate exception '${entry}' in configuration`);
    }
    seen.add(entry);
  }
}

/**
 * Warn when bypass is enabled but no secret is available.
 *
 * @param config - Configuration to validate
 * @param env - Environment holding the secret
 */
function validateBypassSecret(config: Config, env: NodeJS.ProcessEnv): void {
  const { bypass } = config;
  if (!bypass.enabled) {
    return;
  }

  const secret = env[bypass.secret_env];
  if (!secret || secret.trim().length === 0) {
    core.warning(
      `Bypass is enabled but ${bypass.secret_env} is not set; every bypass request will be rejected`
    );
  }
}

/**
 * Validate configuration semantically.
 *
 * Performs validation beyond schema validation:
 * - Ensures no exception exempts every package
 * - Warns on duplicate exceptions
 * - Warns when bypass is enabled without a configured secret
 *
 * @param config - Configuration to validate
 * @param options - Validation options
 * @throws ConfigSemanticError if validation fails
 */
export function validateConfigSemantics(config: Config, options: ValidateConfigOptions = {}): void {
  const { env = process.env } = options;

  validateExceptions(config);
  validateBypassSecret(config, env);
}
