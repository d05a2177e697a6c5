import type { RiskLevel, SoxStatus, ValidatedCreditMemo } from '../types';

export type AuditStep =
  | 'duplicates'
  | 'classify'
  | 'resolve'
  | 'evaluate'
  | 'timeline'
  | 'aggregate'
  | 'sod';

export interface AuditEntry {
  step: AuditStep;
  row: number | null; // null for set-wide steps
  memo: string | number | null;
  timestamp: string;
  details: string;
}

export interface EngineConfig {
  slaDays: number;
  missingLevelsForHigh: number;
  keywordsPromotional: readonly string[];
  keywordsContract: readonly string[];
}

export type EngineOptions = Partial<EngineConfig>;

export interface RunOptions {
  signal?: AbortSignal;
}

/**
 * Result of matching an approver designation against a matrix.
 * `unresolved` means there was nothing to look up (no designation or no matrix);
 * `not_found` means the matrix was consulted and nothing matched.
 */
export type ApproverLevel =
  | { kind: 'unresolved' }
  | { kind: 'not_found' }
  | { kind: 'level'; level: number };

export type TentativeOutcome =
  | { state: 'pending' }
  | { state: 'violation'; risk: RiskLevel; message: string };

export interface Verdict {
  status: SoxStatus;
  risk: RiskLevel;
  missingApprovals: string;
}

export interface TimelineOutcome {
  verdict: Verdict;
  businessDays?: number;
  timelineStatus: string;
  approvalSequence: string;
}

export interface ValidationSummary {
  total: number;
  compliant: number;
  violations: number;
  compliantPct: number;
  violationPct: number;
  highRisk: number;
  mediumRisk: number;
  lowRisk: number;
  overSla: number;
  duplicates: number;
  sodViolations: number;
  totalAmount: number;
}

export interface EngineOutput {
  records: ValidatedCreditMemo[];
  summary: ValidationSummary;
  auditTrail: AuditEntry[];
}
