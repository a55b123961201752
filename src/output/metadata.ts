/**
 * Artifact Metadata
 *
 * Records the gate decision next to a build artifact in
 * `<artifact>.metadata.json`, under `security.gate`. Other keys already in
 * the metadata file are preserved.
 *
 * @module output/metadata
 */

import { existsSync, readFileSync, writeFileSync } from 'fs';
import { resolve } from 'path';

import type { CompletedGateResult, VerdictStatus } from '../gate/types';

/**
 * Gate section of the artifact metadata document.
 */
export interface GateMetadata {
  status: VerdictStatus;
  timestamp: string;
  scanner: string;
  target: string;
  violations: string[];
  vulnerability_counts: {
    critical: number;
    high: number;
    medium: number;
    low: number;
  };
  policy: {
    severity_threshold: string;
    exceptions: string[];
  };
  bypass?: {
    reason: string;
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Build the gate metadata for a completed run.
 */
export function buildGateMetadata(result: CompletedGateResult, now: Date = new Date()): GateMetadata {
  const { verdict, report, outcome, policy } = result;

  const violations =
    verdict.status === 'FAIL'
      ? verdict.violations
      : verdict.status === 'BYPASSED'
        ? verdict.overridden
        : [];

  const metadata: GateMetadata = {
    status: verdict.status,
    timestamp: now.toISOString(),
    scanner: report.tool,
    target: report.target,
    violations: violations.map((finding) => finding.id),
    vulnerability_counts: {
      critical: outcome.counts.CRITICAL,
      high: outcome.counts.HIGH,
      medium: outcome.counts.MEDIUM,
      low: outcome.counts.LOW,
    },
    policy: {
      severity_threshold: policy.threshold,
      exceptions: [...policy.exceptions],
    },
  };

  if (verdict.status === 'BYPASSED') {
    metadata.bypass = { reason: verdict.reason };
  }

  return metadata;
}

/**
 * Write or update `<artifact>.metadata.json`.
 *
 * @param artifactPath - Path of the artifact the decision applies to
 * @param result - Completed gate run
 * @returns Path of the metadata file
 */
export function writeArtifactMetadata(
  artifactPath: string,
  result: CompletedGateResult,
  now: Date = new Date()
): string {
  const metadataPath = `${resolve(artifactPath)}.metadata.json`;

  let document: Record<string, unknown> = {};
  if (existsSync(metadataPath)) {
    try {
      const existing: unknown = JSON.parse(readFileSync(metadataPath, 'utf-8'));
      if (isRecord(existing)) {
        document = existing;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Existing metadata file is not valid JSON: ${metadataPath} (${message})`);
    }
  }

  const security = isRecord(document.security) ? document.security : {};
  document.security = { ...security, gate: buildGateMetadata(result, now) };

  writeFileSync(metadataPath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
  return metadataPath;
}
