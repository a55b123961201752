/**
 * Gate settings
 *
 * Turns validated configuration into the explicit, read-only inputs the
 * policy evaluator and bypass authority take.
 *
 * @module gate/settings
 */

import type { BypassSettings } from '../bypass/types';
import { createVerifier } from '../bypass/verifier';
import type { Config } from '../config/schema';
import type { Policy } from '../policy/types';

/**
 * Build the severity policy from configuration.
 */
export function policyFromConfig(config: Config): Policy {
  return Object.freeze({
    threshold: config.severity_threshold,
    exceptions: Object.freeze([...config.exceptions]),
  });
}

/**
 * Build bypass settings from configuration.
 * The secret is looked up in `env` under the configured variable name; a
 * missing secret yields a verifier that accepts nothing.
 */
export function bypassSettingsFromConfig(config: Config, env: NodeJS.ProcessEnv): BypassSettings {
  const secret = env[config.bypass.secret_env] ?? '';
  return {
    enabled: config.bypass.enabled,
    verifier: createVerifier(config.bypass.mode, secret),
  };
}
