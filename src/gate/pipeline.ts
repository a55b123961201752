/**
 * Gate Pipeline
 *
 * End-to-end gate invocation shared by the GitHub Action and the CLI:
 * load configuration, run the gate, then write the report, artifact metadata,
 * annotations and job summary.
 *
 * @module gate/pipeline
 */

import { resolve } from 'path';

import { FileAuditLog } from '../audit';
import { BypassAuthority, type RawBypassInput, parseBypassRequest } from '../bypass';
import {
  type Config,
  ConfigParseError,
  ConfigReadError,
  ConfigSemanticError,
  ConfigValidationError,
  loadConfig,
  validateConfigSemantics,
} from '../config';
import { UnsupportedScannerError, resolveFindingsPath } from '../findings';
import {
  emitFindingAnnotations,
  generateLoadFailureMarkdown,
  generateReportMarkdown,
  writeArtifactMetadata,
  writeReport,
  writeSummary,
} from '../output';
import { Logger } from '../utils/logger';
import { registerSecrets } from '../utils/masking';
import { runGate } from './orchestrator';
import { bypassSettingsFromConfig, policyFromConfig } from './settings';
import { type CompletedGateResult, ExitCode, type ExitCodeValue, type GateResult } from './types';

/**
 * One gate invocation, as collected by an entry point.
 */
export interface GateInvocation {
  /** Scanner whose results file is evaluated (trivy | grype) */
  scanner: string;
  /** Explicit findings file; overrides the scanner-derived path */
  findingsPath?: string;
  /** Configuration file path */
  configPath?: string;
  /** Base directory for relative paths (default: process.cwd()) */
  workingDirectory?: string;
  /** Artifact whose metadata file records the decision */
  artifactPath?: string;
  /** Raw bypass inputs */
  bypass: RawBypassInput;
  /** Environment for configuration overrides and the bypass secret */
  env?: NodeJS.ProcessEnv;
  verbose?: boolean;
  /** Emit GitHub annotations for violations */
  annotations?: boolean;
  /** Write the GitHub job summary */
  summary?: boolean;
  /** Register the token and secret with the Actions log masker */
  maskSecrets?: boolean;
  now?: () => Date;
}

export interface GateInvocationResult {
  exitCode: ExitCodeValue;
  /** Gate result, absent when configuration failed */
  result?: GateResult;
  reportPath?: string;
  metadataPath?: string;
  auditLocation?: string;
}

function isConfigError(error: unknown): error is Error {
  return (
    error instanceof ConfigValidationError ||
    error instanceof ConfigParseError ||
    error instanceof ConfigReadError ||
    error instanceof ConfigSemanticError ||
    error instanceof UnsupportedScannerError
  );
}

function logVerdict(logger: Logger, result: CompletedGateResult): void {
  const { verdict } = result;
  logger.info('=== SECURITY POLICY GATE RESULTS ===');

  switch (verdict.status) {
    case 'PASS':
      logger.info('✅ SECURITY GATE PASSED');
      logger.info('Artifact approved for deployment');
      break;
    case 'FAIL':
      logger.error('❌ SECURITY GATE FAILED');
      logger.error('Policy violations detected:');
      for (const finding of verdict.violations) {
        logger.error(`  - ${finding.id} [${finding.severity}] in ${finding.package}`);
      }
      if (verdict.bypassRejection) {
        logger.error(`Bypass rejected: ${verdict.bypassRejection}`);
      }
      break;
    case 'BYPASSED':
      logger.warn('⚠️ SECURITY GATE BYPASSED');
      logger.warn('Deployment allowed with override');
      break;
  }
}

/**
 * Execute the gate end to end.
 *
 * Configuration and input problems resolve to the input-error exit code;
 * unexpected errors (e.g. an unwritable report directory) are thrown.
 */
export async function executeGate(invocation: GateInvocation): Promise<GateInvocationResult> {
  const {
    scanner,
    workingDirectory = process.cwd(),
    env = process.env,
    verbose = false,
    now = (): Date => new Date(),
  } = invocation;
  const logger = new Logger(verbose);
  const baseDir = resolve(workingDirectory);

  logger.info('Starting security policy gate evaluation');
  logger.info(`Scanner: ${scanner}`);
  logger.info(`Artifact: ${invocation.artifactPath ?? 'N/A'}`);

  let config: Config;
  let findingsPath: string;
  try {
    const loaded = loadConfig({ configPath: invocation.configPath, workingDirectory: baseDir, env });
    config = loaded.config;
    logger.debug(
      loaded.configFile ? `Loaded configuration from: ${loaded.configFile}` : 'Using default configuration'
    );
    if (loaded.overrides.length > 0) {
      logger.debug(`Environment overrides: ${loaded.overrides.join(', ')}`);
    }

    validateConfigSemantics(config, { env });

    findingsPath = invocation.findingsPath
      ? resolve(baseDir, invocation.findingsPath)
      : resolveFindingsPath(resolve(baseDir, config.results_dir), scanner);
  } catch (error) {
    if (isConfigError(error)) {
      logger.error(`Configuration error: ${error.message}`);
      return { exitCode: ExitCode.InputError };
    }
    throw error;
  }

  const settings = bypassSettingsFromConfig(config, env);
  if (invocation.maskSecrets) {
    registerSecrets([invocation.bypass.token ?? '', env[config.bypass.secret_env] ?? '']);
  }

  const auditLog = new FileAuditLog(resolve(baseDir, config.audit.log_dir), {
    maxAttempts: config.audit.max_attempts,
    now,
  });
  const authority = new BypassAuthority({ settings, auditLog, logger, now });
  const policy = policyFromConfig(config);
  logger.debug(`Policy: threshold ${policy.threshold}, ${policy.exceptions.length} exception(s)`);

  const result = runGate({
    findingsPath,
    policy,
    bypassRequest: parseBypassRequest(invocation.bypass),
    authority,
    logger,
  });

  if (result.kind === 'load_failed') {
    if (invocation.summary) {
      await writeSummary(generateLoadFailureMarkdown(result));
    }
    return { exitCode: result.exitCode, result, auditLocation: auditLog.location };
  }

  const invocationResult: GateInvocationResult = {
    exitCode: result.exitCode,
    result,
    auditLocation: auditLog.location,
  };

  const markdown = generateReportMarkdown(result, { auditLocation: auditLog.location });

  if (config.report.enabled) {
    invocationResult.reportPath = writeReport(markdown, resolve(baseDir, config.report.dir), now());
    logger.info(`Detailed report: ${invocationResult.reportPath}`);
  }

  if (invocation.artifactPath) {
    invocationResult.metadataPath = writeArtifactMetadata(
      resolve(baseDir, invocation.artifactPath),
      result,
      now()
    );
    logger.info(`Updated metadata: ${invocationResult.metadataPath}`);
  }

  if (invocation.annotations && result.verdict.status === 'FAIL') {
    const annotationResult = emitFindingAnnotations(result.verdict.violations);
    if (annotationResult.capped) {
      logger.debug(`Annotation limit reached: ${annotationResult.skipped} skipped`);
    }
  }

  if (invocation.summary) {
    await writeSummary(markdown);
  }

  logVerdict(logger, result);
  logger.info(`Audit log: ${auditLog.location}`);

  return invocationResult;
}
