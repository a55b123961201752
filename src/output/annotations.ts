/**
 * Annotations Emitter
 *
 * Emits GitHub Actions annotations for violating findings.
 * Uses core.error, core.warning, and core.notice based on severity.
 *
 * @module output/annotations
 */

import * as core from '@actions/core';

import type { Finding, Severity } from '../findings/types';
import { compareSeverity } from '../findings/types';

/**
 * Maximum number of annotations to emit.
 * GitHub has a limit on annotations per workflow run.
 */
const MAX_ANNOTATIONS = 50;

/**
 * Result of annotation emission.
 */
export interface AnnotationResult {
  /** Total number of annotations emitted */
  emitted: number;
  /** Number of annotations skipped due to cap */
  skipped: number;
  /** Whether any annotations were skipped */
  capped: boolean;
}

/**
 * Emit annotations for a list of findings, most severe first.
 *
 * @param findings - Findings to annotate
 * @returns Annotation emission result
 */
export function emitFindingAnnotations(findings: readonly Finding[]): AnnotationResult {
  const sorted = [...findings].sort((a, b) => compareSeverity(b.severity, a.severity));

  let emitted = 0;
  let skipped = 0;

  for (const finding of sorted) {
    if (emitted >= MAX_ANNOTATIONS) {
      skipped++;
      continue;
    }

    emitAnnotation(finding);
    emitted++;
  }

  if (skipped > 0) {
    core.notice(
      `Annotation limit reached: ${skipped} additional findings not annotated. See the gate report for the full list.`
    );
  }

  return {
    emitted,
    skipped,
    capped: skipped > 0,
  };
}

function emitAnnotation(finding: Finding): void {
  const properties = { title: `${finding.id}: ${finding.package}` };
  const message = formatAnnotationMessage(finding);

  switch (getAnnotationLevel(finding.severity)) {
    case 'error':
      core.error(message, properties);
      break;
    case 'warning':
      core.warning(message, properties);
      break;
    case 'notice':
      core.notice(message, properties);
      break;
  }
}

/**
 * Format the annotation message.
 *
 * @example
 * // 'CRITICAL vulnerability CVE-2024-0001 in openssl 3.0.1 (fixed in 3.0.2)'
 */
export function formatAnnotationMessage(finding: Finding): string {
  const installed = finding.installedVersion ? ` ${finding.installedVersion}` : '';
  const fix = finding.fixedVersion ? ` (fixed in ${finding.fixedVersion})` : '';
  let message = `${finding.severity} vulnerability ${finding.id} in ${finding.package}${installed}${fix}`;

  if (finding.title) {
    message += `\n\n${finding.title}`;
  }

  return message;
}

/**
 * Get annotation level for severity.
 */
export function getAnnotationLevel(severity: Severity): 'error' | 'warning' | 'notice' {
  switch (severity) {
    case 'CRITICAL':
    case 'HIGH':
      return 'error';
    case 'MEDIUM':
      return 'warning';
    case 'LOW':
      return 'notice';
  }
}
