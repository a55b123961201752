#!/usr/bin/env node
/**
 * Vulnerability Policy Gate - CLI
 *
 * Usage:
 *   policy-gate [-s trivy|grype] [-c config] [-f findings.json] [artifact]
 *   policy-gate mint-token [--ttl seconds] [--key-env NAME]
 *
 * Bypass inputs come from --bypass-token / --bypass-reason, falling back to
 * GATE_BYPASS_TOKEN / GATE_BYPASS_REASON.
 *
 * @module cli
 */

import * as core from '@actions/core';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { BYPASS_REASON_ENV, BYPASS_TOKEN_ENV } from './bypass/request';
import { createSignedToken, isValidTokenLifetime } from './bypass/verifier';
import { SUPPORTED_SCANNERS } from './findings/types';
import { ExitCode, executeGate } from './gate';
import { VERSION } from './version';

/** Default lifetime of minted tokens: 15 minutes */
const DEFAULT_TOKEN_TTL_SECONDS = 15 * 60;

async function main(): Promise<void> {
  await yargs(hideBin(process.argv))
    .scriptName('policy-gate')
    .command(
      '$0 [artifact]',
      'Evaluate scan results against the security policy',
      (builder) =>
        builder
          .positional('artifact', {
            type: 'string',
            describe: 'Artifact whose metadata file records the decision',
          })
          .option('scanner', {
            alias: 's',
            choices: SUPPORTED_SCANNERS,
            default: 'trivy',
            describe: 'Scanner whose results are evaluated',
          })
          .option('config', {
            alias: 'c',
            type: 'string',
            describe: 'Configuration file (default: .policy-gate.yml)',
          })
          .option('findings', {
            alias: 'f',
            type: 'string',
            describe: 'Findings file (default: <results_dir>/<scanner>-results.json)',
          })
          .option('bypass-token', {
            type: 'string',
            describe: `Bypass token (default: $${BYPASS_TOKEN_ENV})`,
          })
          .option('bypass-reason', {
            type: 'string',
            describe: `Bypass reason (default: $${BYPASS_REASON_ENV})`,
          })
          .option('verbose', {
            alias: 'v',
            type: 'boolean',
            default: false,
          }),
      async (argv) => {
        const outcome = await executeGate({
          scanner: argv.scanner,
          findingsPath: argv.findings,
          configPath: argv.config,
          artifactPath: argv.artifact,
          bypass: {
            token: argv['bypass-token'] ?? process.env[BYPASS_TOKEN_ENV],
            reason: argv['bypass-reason'] ?? process.env[BYPASS_REASON_ENV],
          },
          verbose: argv.verbose,
        });
        process.exitCode = outcome.exitCode;
      }
    )
    .command(
      'mint-token',
      'Create a short-lived signed bypass token (bypass.mode: signed)',
      (builder) =>
        builder
          .option('ttl', {
            type: 'number',
            default: DEFAULT_TOKEN_TTL_SECONDS,
            describe: 'Token lifetime in seconds',
          })
          .option('key-env', {
            type: 'string',
            default: 'GATE_BYPASS_SECRET',
            describe: 'Environment variable holding the signing key',
          }),
      (argv) => {
        const keyEnv = argv['key-env'];
        const signingKey = process.env[keyEnv] ?? '';
        if (!signingKey) {
          core.error(`${keyEnv} is not set; cannot sign a bypass token`);
          process.exitCode = ExitCode.InputError;
          return;
        }
        if (!isValidTokenLifetime(argv.ttl)) {
          core.error(`--ttl must be a positive whole number of seconds, got ${argv.ttl}`);
          process.exitCode = ExitCode.InputError;
          return;
        }
        process.stdout.write(`${createSignedToken(signingKey, argv.ttl)}\n`);
      }
    )
    .fail((message, error, instance) => {
      if (error) {
        throw error;
      }
      instance.showHelp();
      process.stderr.write(`\n${message}\n`);
      process.exitCode = ExitCode.InputError;
    })
    .strict()
    .help()
    .alias('h', 'help')
    .version(VERSION)
    .parseAsync();
}

main().catch((error: unknown) => {
  core.error(error instanceof Error ? error.message : String(error));
  process.exitCode = ExitCode.InternalError;
});
