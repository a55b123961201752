/**
 * Findings Loader
 *
 * Reads a normalised findings document from disk, validates it against the
 * findings schema and normalises severities into the ordered enum.
 *
 * @module findings/loader
 */

import { readFileSync, statSync } from 'fs';
import { join, resolve } from 'path';
import type { z } from 'zod';

import { FindingsDocumentSchema, type RawFinding } from './schema';
import {
  type Finding,
  type FindingsReport,
  type ScannerName,
  SUPPORTED_SCANNERS,
  isSupportedScanner,
  parseSeverity,
} from './types';

/**
 * Reasons a findings document could not be loaded.
 */
export type LoadErrorKind = 'NotFound' | 'MalformedInput' | 'UnknownSeverity';

/**
 * Error thrown when a findings document cannot be loaded.
 * Always an input problem, never a policy outcome.
 */
export class LoadError extends Error {
  constructor(
    message: string,
    public readonly kind: LoadErrorKind,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'LoadError';
  }
}

/**
 * Error thrown when a scanner name has no known results file.
 */
export class UnsupportedScannerError extends Error {
  constructor(public readonly scanner: string) {
    super(`Unsupported scanner: ${scanner}. Must be one of: ${SUPPORTED_SCANNERS.join(', ')}`);
    this.name = 'UnsupportedScannerError';
  }
}

/**
 * Derive the results file for a scanner inside a results directory.
 *
 * @example
 * resolveFindingsPath('scan-results', 'trivy') // '<cwd>/scan-results/trivy-results.json'
 */
export function resolveFindingsPath(resultsDir: string, scanner: string): string {
  if (!isSupportedScanner(scanner)) {
    throw new UnsupportedScannerError(scanner);
  }
  return resolve(join(resultsDir, resultsFileName(scanner)));
}

function resultsFileName(scanner: ScannerName): string {
  return `${scanner}-results.json`;
}

/**
 * Load and validate a findings document.
 *
 * @param filePath - Path to the findings document
 * @returns The normalised report
 * @throws LoadError with kind NotFound, MalformedInput or UnknownSeverity
 */
export function loadFindings(filePath: string): FindingsReport {
  const absolutePath = resolve(filePath);

  let content: string;
  let modifiedAt: Date;
  try {
    const stats = statSync(absolutePath);
    if (!stats.isFile()) {
      throw new LoadError(`Findings path is not a file: ${absolutePath}`, 'NotFound', absolutePath);
    }
    modifiedAt = stats.mtime;
    content = readFileSync(absolutePath, 'utf-8');
  } catch (error) {
    if (error instanceof LoadError) {
      throw error;
    }
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new LoadError(`Findings file not found: ${absolutePath}`, 'NotFound', absolutePath, error);
    }
    throw new LoadError(
      `Failed to read findings file: ${absolutePath}`,
      'MalformedInput',
      absolutePath,
      error instanceof Error ? error : undefined
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown JSON parse error';
    throw new LoadError(
      `Invalid JSON in findings file: ${message}`,
      'MalformedInput',
      absolutePath,
      error instanceof Error ? error : undefined
    );
  }

  const result = FindingsDocumentSchema.safeParse(parsed);
  if (!result.success) {
    throw new LoadError(
      `Findings file does not match the expected schema:\n${formatIssues(result.error.errors)}`,
      'MalformedInput',
      absolutePath
    );
  }

  const document = result.data;
  const findings = document.findings.map((raw, index) => normaliseFinding(raw, index, absolutePath));

  return {
    tool: document.tool,
    target: document.target,
    timestamp: document.timestamp ?? modifiedAt.toISOString(),
    findings,
    source: absolutePath,
  };
}

function normaliseFinding(raw: RawFinding, index: number, filePath: string): Finding {
  const severity = parseSeverity(raw.severity);
  if (!severity) {
    throw new LoadError(
      `Unknown severity '${raw.severity}' for finding ${raw.id} (findings[${index}])`,
      'UnknownSeverity',
      filePath
    );
  }

  return {
    id: raw.id,
    severity,
    package: raw.package,
    ...(raw.fixedVersion !== undefined && { fixedVersion: raw.fixedVersion }),
    ...(raw.installedVersion !== undefined && { installedVersion: raw.installedVersion }),
    ...(raw.title !== undefined && { title: raw.title }),
  };
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `  - ${path}: ${issue.message}` : `  - ${issue.message}`;
    })
    .join('\n');
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
