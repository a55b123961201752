/**
 * Report Generator
 *
 * Generates the Markdown gate report: verdict, scan metadata, severity
 * table, violations, exemptions and bypass details. The same Markdown is
 * written to the reports directory and, in GitHub Actions, to the job summary.
 *
 * @module output/report
 */

import * as core from '@actions/core';
import { mkdirSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';

import type { Finding, Severity } from '../findings/types';
import { isAtOrAbove } from '../findings/types';
import type { CompletedGateResult, LoadFailedGateResult, VerdictStatus } from '../gate/types';
import { VERSION } from '../version';

/** Maximum number of findings listed per section */
const MAX_LISTED_FINDINGS = 50;

/** Severity rows, most severe first */
const SEVERITY_ROWS: ReadonlyArray<{ level: Severity; label: string }> = [
  { level: 'CRITICAL', label: 'Critical' },
  { level: 'HIGH', label: 'High' },
  { level: 'MEDIUM', label: 'Medium' },
  { level: 'LOW', label: 'Low' },
];

const STATUS_LINE: Record<VerdictStatus, string> = {
  PASS: '✅ PASS',
  FAIL: '❌ FAIL',
  BYPASSED: '⚠️ BYPASSED',
};

/** Options for report generation */
export interface ReportOptions {
  /** Where bypass decisions are audited */
  auditLocation?: string;
}

/**
 * Generate the gate report Markdown.
 *
 * @param result - Completed gate run
 * @param options - Report options
 * @returns Markdown string
 */
export function generateReportMarkdown(
  result: CompletedGateResult,
  options: ReportOptions = {}
): string {
  const { verdict, report, outcome, policy } = result;
  const lines: string[] = [];

  lines.push('## 🔒 Security Policy Gate Report');
  lines.push('');
  lines.push(`**Status**: ${STATUS_LINE[verdict.status]}`);
  lines.push(`**Scanner**: ${report.tool}`);
  lines.push(`**Target**: \`${report.target}\``);
  lines.push(`**Scanned at**: ${report.timestamp}`);
  lines.push(`**Threshold**: ${policy.threshold}`);
  lines.push('');

  lines.push('### Vulnerability Summary');
  lines.push('');
  lines.push('| Severity | Count | Status |');
  lines.push('| -------- | ----- | ------ |');
  for (const { level, label } of SEVERITY_ROWS) {
    const count = outcome.counts[level];
    const failing = count > 0 && isAtOrAbove(level, policy.threshold);
    lines.push(`| ${label} | ${count} | ${failing ? '❌ FAIL' : '✅ PASS'} |`);
  }
  lines.push('');

  lines.push('### Gate Decision');
  lines.push('');
  switch (verdict.status) {
    case 'PASS':
      lines.push(`No findings at or above ${policy.threshold}. The artifact is approved for deployment.`);
      break;
    case 'FAIL':
      lines.push(`${verdict.violations.length} finding(s) at or above ${policy.threshold}:`);
      lines.push('');
      lines.push(formatFindingList(verdict.violations));
      if (verdict.bypassRejection) {
        lines.push('');
        lines.push(`Bypass requested but rejected: **${verdict.bypassRejection}**.`);
      }
      lines.push('');
      lines.push('**Action required:** address the vulnerabilities before deployment.');
      break;
    case 'BYPASSED':
      lines.push(
        `The policy was violated by ${verdict.overridden.length} finding(s); ` +
          'deployment is allowed by an authorized override.'
      );
      lines.push('');
      lines.push(`**Bypass reason**: ${verdict.reason}`);
      lines.push('');
      lines.push('Overridden findings:');
      lines.push('');
      lines.push(formatFindingList(verdict.overridden));
      break;
  }
  lines.push('');

  if (outcome.exempted.length > 0) {
    lines.push(
      generateCollapsedSection(
        `Exempt findings (${outcome.exempted.length})`,
        `Packages exempt by policy: ${policy.exceptions.map((e) => `\`${e}\``).join(', ')}\n\n` +
          formatFindingList(outcome.exempted)
      )
    );
    lines.push('');
  }

  if (options.auditLocation) {
    lines.push('### Audit Trail');
    lines.push('');
    lines.push(`Bypass decisions are recorded in \`${options.auditLocation}\`.`);
    lines.push('');
  }

  lines.push('---');
  lines.push('');
  lines.push(`_Vulnerability Policy Gate v${VERSION}_`);

  return lines.join('\n');
}

/**
 * Generate a short report for a run whose findings could not be loaded.
 */
export function generateLoadFailureMarkdown(result: LoadFailedGateResult): string {
  return `## 🔒 Security Policy Gate Report

**Status**: 🚫 ERROR (${result.error.kind})

${result.error.message}

No policy decision was made: the findings input is missing or invalid.

---

_Vulnerability Policy Gate v${VERSION}_`;
}

/**
 * Format findings as a Markdown list, capped at MAX_LISTED_FINDINGS.
 */
export function formatFindingList(findings: readonly Finding[]): string {
  const lines = findings.slice(0, MAX_LISTED_FINDINGS).map((finding) => {
    const installed = finding.installedVersion ? ` ${finding.installedVersion}` : '';
    const fix = finding.fixedVersion ? ` (fixed in ${finding.fixedVersion})` : '';
    const title = finding.title ? `: ${finding.title}` : '';
    return `- **${finding.id}** [${finding.severity}] \`${finding.package}${installed}\`${fix}${title}`;
  });

  if (findings.length > MAX_LISTED_FINDINGS) {
    lines.push(`- _...and ${findings.length - MAX_LISTED_FINDINGS} more_`);
  }

  return lines.join('\n');
}

/**
 * Generate a collapsible section.
 */
function generateCollapsedSection(title: string, content: string): string {
  return `<details>
<summary>${title}</summary>

${content}

</details>`;
}

/**
 * Report file name for a generation time (UTC).
 *
 * @example
 * reportFileName(new Date('2026-10-19T08:05:09Z')) // 'policy-gate-report-20261019-080509.md'
 */
export function reportFileName(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `policy-gate-report-${day}-${time}.md`;
}

/**
 * Write the report to the reports directory.
 *
 * @returns Absolute path of the written report
 */
export function writeReport(markdown: string, directory: string, now: Date = new Date()): string {
  const dir = resolve(directory);
  mkdirSync(dir, { recursive: true });
  const filePath = join(dir, reportFileName(now));
  writeFileSync(filePath, markdown.endsWith('\n') ? markdown : `${markdown}\n`, 'utf-8');
  return filePath;
}

/**
 * Write the report to the GitHub Actions job summary.
 */
export async function writeSummary(markdown: string): Promise<void> {
  core.summary.addRaw(markdown);
  await core.summary.write();
}
