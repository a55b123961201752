/**
 * @file Gate Pipeline Tests
 * @description executeGate end to end in a temporary working directory.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { copyFileSync, existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import * as core from '@actions/core';

import { executeGate, type GateInvocation } from '../../../src/gate/pipeline';
import { ExitCode } from '../../../src/gate/types';

vi.mock('@actions/core', () => ({
  info: vi.fn(),
  debug: vi.fn(),
  warning: vi.fn(),
  error: vi.fn(),
  notice: vi.fn(),
  setSecret: vi.fn(),
  summary: {
    addRaw: vi.fn(),
    write: vi.fn().mockResolvedValue(undefined),
  },
}));

const FIXTURES = join(__dirname, '../../fixtures/findings');
const NOW = new Date('2026-10-19T08:30:00Z');
const ENV = { GATE_BYPASS_SECRET: 'test-secret' };

describe('executeGate', () => {
  let testDir: string;

  beforeEach(() => {
    vi.clearAllMocks();
    testDir = join(tmpdir(), `policy-gate-pipeline-test-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    mkdirSync(join(testDir, 'scan-results'), { recursive: true });
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  function useFindings(fixture: string, scanner = 'trivy'): void {
    copyFileSync(join(FIXTURES, fixture), join(testDir, 'scan-results', `${scanner}-results.json`));
  }

  function invoke(overrides: Partial<GateInvocation> = {}) {
    return executeGate({
      scanner: 'trivy',
      workingDirectory: testDir,
      bypass: {},
      env: ENV,
      now: () => NOW,
      ...overrides,
    });
  }

  it('passes a clean report and writes the report file', async () => {
    useFindings('clean.json');

    const outcome = await invoke();

    expect(outcome.exitCode).toBe(ExitCode.Success);
    expect(outcome.reportPath).toBe(join(testDir, 'reports', 'policy-gate-report-20261019-083000.md'));
    expect(readFileSync(join(testDir, 'reports', 'policy-gate-report-20261019-083000.md'), 'utf-8')).toContain(
      '**Status**: ✅ PASS'
    );
    expect(outcome.auditLocation).toBe(join(testDir, 'logs/audit', 'policy-gate-20261019.log'));
    expect(existsSync(join(testDir, 'logs/audit', 'policy-gate-20261019.log'))).toBe(false);
    expect(core.info).toHaveBeenCalledWith('✅ SECURITY GATE PASSED');
  });

  it('fails on a violation and annotates it', async () => {
    useFindings('vulnerable.json');

    const outcome = await invoke({ annotations: true, summary: true });

    expect(outcome.exitCode).toBe(ExitCode.PolicyViolation);
    expect(core.error).toHaveBeenCalledWith(
      'CRITICAL vulnerability CVE-2026-0001 in openssl 3.0.1 (fixed in 3.0.2)\n\n' +
        'openssl: remote code execution in TLS handshake',
      { title: 'CVE-2026-0001: openssl' }
    );
    expect(core.error).toHaveBeenCalledWith('  - CVE-2026-0001 [CRITICAL] in openssl');
    expect(core.summary.addRaw).toHaveBeenCalledTimes(1);
    expect(core.summary.write).toHaveBeenCalledTimes(1);
  });

  it('reads grype results when asked to', async () => {
    useFindings('vulnerable.json', 'grype');

    const outcome = await invoke({ scanner: 'grype' });

    expect(outcome.exitCode).toBe(ExitCode.PolicyViolation);
  });

  it('bypasses with a valid token, audits it and records artifact metadata', async () => {
    useFindings('vulnerable.json');
    const artifact = join(testDir, 'app.tar');
    writeFileSync(
      `${artifact}.metadata.json`,
      JSON.stringify({ build: { id: '42' }, security: { sbom: 'present' } })
    );

    const outcome = await invoke({
      artifactPath: 'app.tar',
      bypass: { token: 'test-secret', reason: 'Critical production hotfix' },
      maskSecrets: true,
    });

    expect(outcome.exitCode).toBe(ExitCode.Success);
    expect(core.setSecret).toHaveBeenCalledTimes(1);
    expect(core.setSecret).toHaveBeenCalledWith('test-secret');

    const auditLines = readFileSync(join(testDir, 'logs/audit', 'policy-gate-20261019.log'), 'utf-8')
      .trim()
      .split('\n');
    expect(auditLines).toHaveLength(1);
    expect(JSON.parse(auditLines[0] ?? '')).toMatchObject({
      timestamp: '2026-10-19T08:30:00.000Z',
      decision: 'granted',
      reason: 'Critical production hotfix',
    });

    expect(outcome.metadataPath).toBe(`${artifact}.metadata.json`);
    const metadata: unknown = JSON.parse(readFileSync(`${artifact}.metadata.json`, 'utf-8'));
    expect(metadata).toEqual({
      build: { id: '42' },
      security: {
        sbom: 'present',
        gate: {
          status: 'BYPASSED',
          timestamp: '2026-10-19T08:30:00.000Z',
          scanner: 'trivy',
          target: 'registry.example.com/shop/api:1.4.0',
          violations: ['CVE-2026-0001'],
          vulnerability_counts: { critical: 1, high: 0, medium: 0, low: 1 },
          policy: { severity_threshold: 'HIGH', exceptions: [] },
          bypass: { reason: 'Critical production hotfix' },
        },
      },
    });
  });

  it('rejects a bypass when no secret is configured', async () => {
    useFindings('vulnerable.json');

    const outcome = await invoke({
      env: {},
      bypass: { token: 'test-secret', reason: 'Critical production hotfix' },
    });

    expect(outcome.exitCode).toBe(ExitCode.PolicyViolation);
    expect(outcome.result?.kind === 'completed' && outcome.result.bypass).toEqual({
      status: 'rejected',
      reason: 'invalid token',
    });
  });

  it('uses an explicit findings path and honours config', async () => {
    writeFileSync(join(testDir, '.policy-gate.yml'), 'severity_threshold: CRITICAL\nreport:\n  enabled: false\n');
    copyFileSync(join(FIXTURES, 'clean.json'), join(testDir, 'custom.json'));

    const outcome = await invoke({ findingsPath: 'custom.json' });

    expect(outcome.exitCode).toBe(ExitCode.Success);
    expect(outcome.reportPath).toBeUndefined();
    expect(existsSync(join(testDir, 'reports'))).toBe(false);
    expect(outcome.result?.kind === 'completed' && outcome.result.policy.threshold).toBe('CRITICAL');
  });

  it('returns an input error when findings are missing', async () => {
    const outcome = await invoke({ summary: true });

    expect(outcome.exitCode).toBe(ExitCode.InputError);
    expect(outcome.result?.kind).toBe('load_failed');
    expect(core.summary.addRaw).toHaveBeenCalledWith(expect.stringContaining('🚫 ERROR (NotFound)'));
  });

  it('returns an input error for invalid configuration', async () => {
    writeFileSync(join(testDir, '.policy-gate.yml'), 'severity_threshold: SEVERE\n');
    useFindings('clean.json');

    const outcome = await invoke();

    expect(outcome).toEqual({ exitCode: ExitCode.InputError });
  });

  it('returns an input error for an unsupported scanner', async () => {
    const outcome = await invoke({ scanner: 'snyk' });

    expect(outcome).toEqual({ exitCode: ExitCode.InputError });
    expect(core.error).toHaveBeenCalledWith(
      'Configuration error: Unsupported scanner: snyk. Must be one of: trivy, grype'
    );
  });
});
