/**
 * @file Findings Loader Tests
 * @description Unit tests for reading and normalising findings documents.
 *
 * Key test scenarios:
 * - Well-formed reports (severity normalisation, optional fields)
 * - Missing files and directories
 * - Broken JSON and schema mismatches
 * - Unknown severity levels
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { tmpdir } from 'os';

import {
  LoadError,
  UnsupportedScannerError,
  loadFindings,
  resolveFindingsPath,
} from '../../../src/findings/loader';

const FIXTURES = join(__dirname, '../../fixtures/findings');

function expectLoadError(fn: () => unknown): LoadError {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(LoadError);
    if (error instanceof LoadError) {
      return error;
    }
  }
  throw new Error('Expected a LoadError to be thrown');
}

describe('findings loader', () => {
  describe('loadFindings', () => {
    it('loads a clean report and normalises severities', () => {
      const report = loadFindings(join(FIXTURES, 'clean.json'));

      expect(report.tool).toBe('trivy');
      expect(report.target).toBe('registry.example.com/shop/api:1.4.0');
      expect(report.timestamp).toBe('2026-10-01T12:00:00Z');
      expect(report.findings.map((f) => f.severity)).toEqual(['LOW', 'LOW']);
      expect(report.source).toBe(resolve(FIXTURES, 'clean.json'));
    });

    it('keeps optional fields only when present', () => {
      const report = loadFindings(join(FIXTURES, 'clean.json'));

      expect(report.findings[0]).toEqual({
        id: 'CVE-2026-1101',
        severity: 'LOW',
        package: 'zlib',
        installedVersion: '1.2.13',
        fixedVersion: '1.3.1',
        title: 'zlib: out-of-bounds read in inflate',
      });
      expect(report.findings[1]).toEqual({
        id: 'CVE-2026-1102',
        severity: 'LOW',
        package: 'tar',
      });
    });

    it('preserves scanner order', () => {
      const report = loadFindings(join(FIXTURES, 'vulnerable.json'));

      expect(report.findings.map((f) => f.id)).toEqual(['CVE-2026-1101', 'CVE-2026-0001']);
    });

    it('reports a missing file as NotFound', () => {
      const error = expectLoadError(() => loadFindings(join(FIXTURES, 'does-not-exist.json')));

      expect(error.kind).toBe('NotFound');
      expect(error.message).toBe(
        `Findings file not found: ${resolve(FIXTURES, 'does-not-exist.json')}`
      );
    });

    it('reports a directory as NotFound', () => {
      const error = expectLoadError(() => loadFindings(FIXTURES));

      expect(error.kind).toBe('NotFound');
      expect(error.message).toBe(`Findings path is not a file: ${resolve(FIXTURES)}`);
    });

    it('reports truncated JSON as MalformedInput', () => {
      const error = expectLoadError(() => loadFindings(join(FIXTURES, 'truncated.json')));

      expect(error.kind).toBe('MalformedInput');
      expect(error.message).toMatch(/^Invalid JSON in findings file: /);
    });

    it('reports schema mismatches as MalformedInput', () => {
      const error = expectLoadError(() => loadFindings(join(FIXTURES, 'malformed.json')));

      expect(error.kind).toBe('MalformedInput');
      expect(error.message).toContain('  - target: Required');
      expect(error.message).toContain('  - findings.0.package: Required');
    });

    it('rejects unknown severity levels', () => {
      const error = expectLoadError(() => loadFindings(join(FIXTURES, 'unknown-severity.json')));

      expect(error.kind).toBe('UnknownSeverity');
      expect(error.message).toBe(
        "Unknown severity 'NEGLIGIBLE' for finding CVE-2026-0002 (findings[0])"
      );
    });

    describe('documents written at test time', () => {
      let testDir: string;

      beforeEach(() => {
        testDir = join(tmpdir(), `policy-gate-findings-test-${Date.now()}`);
        mkdirSync(testDir, { recursive: true });
      });

      afterEach(() => {
        rmSync(testDir, { recursive: true, force: true });
      });

      it('falls back to the file modification time when timestamp is absent', () => {
        const filePath = join(testDir, 'trivy-results.json');
        writeFileSync(
          filePath,
          JSON.stringify({ tool: 'trivy', target: '.', findings: [] }),
          'utf-8'
        );

        const report = loadFindings(filePath);

        expect(report.findings).toEqual([]);
        expect(Number.isNaN(Date.parse(report.timestamp))).toBe(false);
      });

      it('accepts mixed-case severities with surrounding whitespace', () => {
        const filePath = join(testDir, 'grype-results.json');
        writeFileSync(
          filePath,
          JSON.stringify({
            tool: 'grype',
            target: 'app',
            findings: [{ id: 'GHSA-test-0001', severity: ' High ', package: 'lodash' }],
          }),
          'utf-8'
        );

        expect(loadFindings(filePath).findings[0]?.severity).toBe('HIGH');
      });
    });
  });

  describe('resolveFindingsPath', () => {
    it('derives the results file for a scanner', () => {
      expect(resolveFindingsPath('scan-results', 'grype')).toBe(
        resolve('scan-results', 'grype-results.json')
      );
    });

    it('rejects unsupported scanners', () => {
      expect(() => resolveFindingsPath('scan-results', 'snyk')).toThrow(UnsupportedScannerError);
      expect(() => resolveFindingsPath('scan-results', 'snyk')).toThrow(
        'Unsupported scanner: snyk. Must be one of: trivy, grype'
      );
    });
  });
});
