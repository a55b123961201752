/**
 * Bypass Authority
 *
 * Decides whether a bypass request may override a failing gate and records
 * every decision in the audit log.
 *
 * Decision order:
 * 1. no request            -> not_requested (nothing audited)
 * 2. bypass disabled       -> rejected: bypass disabled
 * 3. token does not verify -> rejected: invalid token / token expired
 * 4. blank reason          -> rejected: missing reason
 * 5. otherwise             -> granted
 *
 * A grant that cannot be written to the audit log is downgraded to
 * `rejected: audit write failed`.
 *
 * @module bypass/authority
 */

import type { AuditEntry, AuditLog, OverriddenFinding } from '../audit/types';
import { tokenFingerprint } from '../utils/masking';
import type { Logger } from '../utils/logger';
import type {
  AuthorizationContext,
  BypassDecision,
  BypassRequest,
  BypassSettings,
  GrantedDecision,
  RejectedDecision,
  RejectionReason,
} from './types';

export interface BypassAuthorityOptions {
  settings: BypassSettings;
  auditLog: AuditLog;
  logger?: Logger;
  /** Clock for audit timestamps */
  now?: () => Date;
}

function rejected(reason: RejectionReason): RejectedDecision {
  return { status: 'rejected', reason };
}

function summariseFindings(context: AuthorizationContext): OverriddenFinding[] | undefined {
  if (!context.findings || context.findings.length === 0) {
    return undefined;
  }
  return context.findings.map((finding) => ({
    id: finding.id,
    severity: finding.severity,
    package: finding.package,
  }));
}

export class BypassAuthority {
  private readonly settings: BypassSettings;
  private readonly auditLog: AuditLog;
  private readonly logger?: Logger;
  private readonly now: () => Date;

  constructor(options: BypassAuthorityOptions) {
    this.settings = options.settings;
    this.auditLog = options.auditLog;
    this.logger = options.logger;
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Authorize a bypass request.
   *
   * @param request - The request, or null when none was supplied
   * @param context - Run details recorded alongside the decision
   */
  authorize(request: BypassRequest | null, context: AuthorizationContext = {}): BypassDecision {
    if (!request) {
      return { status: 'not_requested' };
    }

    const decision = this.decide(request);
    return this.record(request, decision, context);
  }

  /**
   * Record a bypass request that arrived for a run with nothing to bypass.
   * Failure to record is reported but does not affect the verdict.
   */
  recordUnused(request: BypassRequest, context: AuthorizationContext = {}): void {
    const entry: AuditEntry = {
      timestamp: this.now().toISOString(),
      event: 'bypass_unused',
      decision: 'ignored',
      tokenFingerprint: tokenFingerprint(request.token),
      ...this.describeRun(request, context),
    };

    try {
      this.auditLog.append(entry);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger?.warn(`Could not record unused bypass attempt: ${message}`);
    }
  }

  private decide(request: BypassRequest): RejectedDecision | GrantedDecision {
    if (!this.settings.enabled) {
      return rejected('bypass disabled');
    }

    const check = this.settings.verifier.verify(request.token);
    if (check === 'invalid') {
      return rejected('invalid token');
    }
    if (check === 'expired') {
      return rejected('token expired');
    }

    const reason = request.reason.trim();
    if (reason.length === 0) {
      return rejected('missing reason');
    }

    return { status: 'granted', reason };
  }

  private record(
    request: BypassRequest,
    decision: RejectedDecision | GrantedDecision,
    context: AuthorizationContext
  ): BypassDecision {
    const entry: AuditEntry = {
      timestamp: this.now().toISOString(),
      event: 'bypass_decision',
      decision: decision.status,
      tokenFingerprint: tokenFingerprint(request.token),
      ...this.describeRun(request, context),
    };

    if (decision.status === 'rejected') {
      entry.rejectionReason = decision.reason;
    } else {
      entry.overriddenFindings = summariseFindings(context);
    }

    try {
      this.auditLog.append(entry);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger?.error(`Audit log write failed: ${message}`);

      if (decision.status === 'granted') {
        return rejected('audit write failed');
      }
    }

    return decision;
  }

  private describeRun(
    request: BypassRequest,
    context: AuthorizationContext
  ): Pick<AuditEntry, 'reason' | 'tool' | 'target'> {
    const reason = request.reason.trim();
    return {
      ...(reason.length > 0 && { reason }),
      ...(context.tool !== undefined && { tool: context.tool }),
      ...(context.target !== undefined && { target: context.target }),
    };
  }
}
