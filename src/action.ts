/**
 * Vulnerability Policy Gate - Action runner
 *
 * Reads the action inputs, runs the gate and maps the verdict onto outputs
 * and the step's exit status.
 *
 * @module action
 */

import * as core from '@actions/core';
import { resolve } from 'path';

import { ExitCode, type ExitCodeValue, executeGate } from './gate';
import { VERSION } from './version';

/**
 * Read action inputs.
 */
function getInputs(): {
  scanner: string;
  findingsPath: string;
  configPath: string;
  workingDirectory: string;
  artifactPath: string;
  bypassToken: string;
  bypassReason: string;
  verbose: boolean;
} {
  return {
    scanner: core.getInput('scanner') || 'trivy',
    findingsPath: core.getInput('findings_path'),
    configPath: core.getInput('config_path') || '.policy-gate.yml',
    workingDirectory: core.getInput('working_directory') || '.',
    artifactPath: core.getInput('artifact_path'),
    bypassToken: core.getInput('bypass_token'),
    bypassReason: core.getInput('bypass_reason'),
    verbose: core.getBooleanInput('verbose'),
  };
}

/**
 * Run the action once.
 */
export async function run(): Promise<void> {
  let exitCode: ExitCodeValue = ExitCode.Success;

  try {
    const inputs = getInputs();
    const workingDirectory = resolve(process.cwd(), inputs.workingDirectory);

    core.info(`🔒 Vulnerability Policy Gate v${VERSION}`);

    const outcome = await executeGate({
      scanner: inputs.scanner,
      findingsPath: inputs.findingsPath || undefined,
      configPath: inputs.configPath,
      workingDirectory,
      artifactPath: inputs.artifactPath || undefined,
      bypass: { token: inputs.bypassToken, reason: inputs.bypassReason },
      verbose: inputs.verbose,
      annotations: true,
      summary: true,
      maskSecrets: true,
    });

    exitCode = outcome.exitCode;
    core.setOutput('exit_code', outcome.exitCode);

    const result = outcome.result;
    if (!result) {
      core.setOutput('verdict', 'ERROR');
      core.setFailed('Policy gate configuration error');
    } else if (result.kind === 'load_failed') {
      core.setOutput('verdict', 'ERROR');
      core.setFailed(`Findings could not be loaded: ${result.error.message}`);
    } else {
      const { verdict } = result;
      core.setOutput('verdict', verdict.status);
      core.setOutput('findings_count', result.report.findings.length);
      core.setOutput(
        'violations_count',
        verdict.status === 'FAIL'
          ? verdict.violations.length
          : verdict.status === 'BYPASSED'
            ? verdict.overridden.length
            : 0
      );
      if (outcome.reportPath) {
        core.setOutput('report_path', outcome.reportPath);
      }

      if (verdict.status === 'FAIL') {
        core.setFailed(
          `Security gate failed: ${verdict.violations.length} finding(s) at or above ${result.policy.threshold}` +
            (verdict.bypassRejection ? ` (bypass rejected: ${verdict.bypassRejection})` : '')
        );
      }
    }
  } catch (error) {
    exitCode = ExitCode.InternalError;
    if (error instanceof Error) {
      core.setFailed(`Policy gate failed: ${error.message}`);
    } else {
      core.setFailed('Policy gate failed with an unknown error');
    }
  }

  if (exitCode !== ExitCode.Success) {
    process.exitCode = exitCode;
  }
}
