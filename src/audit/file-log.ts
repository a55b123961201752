/**
 * File Audit Log
 *
 * Appends audit entries as JSON Lines to a daily file
 * (`policy-gate-YYYYMMDD.log`) in the audit directory.
 *
 * Each entry is serialised to a single line and written with one append
 * (O_APPEND), so an entry is either fully present or absent and concurrent
 * writers do not interleave.
 *
 * @module audit/file-log
 */

import { appendFileSync, mkdirSync } from 'fs';
import { join, resolve } from 'path';

import { type AuditEntry, type AuditLog, AuditWriteError } from './types';

/** Default number of append attempts before giving up */
export const DEFAULT_MAX_ATTEMPTS = 3;

/** Options for the file audit log */
export interface FileAuditLogOptions {
  /** Append attempts before throwing AuditWriteError (default: 3) */
  maxAttempts?: number;
  /** Clock used to pick the daily file */
  now?: () => Date;
}

/**
 * Daily audit file name for a date (UTC).
 *
 * @example
 * auditFileName(new Date('2026-10-19T12:00:00Z')) // 'policy-gate-20261019.log'
 */
export function auditFileName(date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `policy-gate-${year}${month}${day}.log`;
}

export class FileAuditLog implements AuditLog {
  private readonly directory: string;
  private readonly maxAttempts: number;
  private readonly now: () => Date;

  constructor(directory: string, options: FileAuditLogOptions = {}) {
    this.directory = resolve(directory);
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.now = options.now ?? ((): Date => new Date());
  }

  get location(): string {
    return join(this.directory, auditFileName(this.now()));
  }

  /**
   * Append an entry.
   *
   * @throws AuditWriteError if every attempt failed
   */
  append(entry: AuditEntry): void {
    const line = `${JSON.stringify(entry)}\n`;
    const filePath = this.location;
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        mkdirSync(this.directory, { recursive: true });
        appendFileSync(filePath, line, { encoding: 'utf-8', flag: 'a', mode: 0o600 });
        return;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
      }
    }

    throw new AuditWriteError(
      `Failed to write audit entry to ${filePath} after ${this.maxAttempts} attempt(s): ` +
        (lastError?.message ?? 'unknown error'),
      this.maxAttempts,
      lastError
    );
  }
}
