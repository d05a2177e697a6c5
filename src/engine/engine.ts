import { resolveEngineConfig } from '../config';
import { logger } from '../logger';
import type { CreditMemoRecord, MatrixSet, ValidatedCreditMemo } from '../types';
import { categoryOf, classifyReason } from './classifier';
import { checkSeparationOfDuties, findDuplicateMemos } from './checks';
import { evaluateApproval } from './compliance';
import { levelOf, parseAmount, resolveApproverLevel, resolveRequiredLevel } from './levels';
import { summarizeOutcomes } from './summary';
import { evaluateTimeline } from './timeline';
import type { AuditEntry, AuditStep, EngineConfig, EngineOptions, EngineOutput, RunOptions } from './types';
import { aggregateViolations } from './violations';

function nowISO(): string {
  return new Date().toISOString();
}

function entry(step: AuditStep, row: number | null, memo: CreditMemoRecord['memo'], details: string): AuditEntry {
  return { step, row, memo, timestamp: nowISO(), details };
}

function show(value: number | undefined): string {
  return value === undefined ? 'none' : String(value);
}

export interface RecordContext {
  duplicate: boolean;
  row: number;
}

/**
 * Runs the per-record pipeline: classify, resolve levels, approval check,
 * timeline check, violation summary and SoD. `duplicate` comes from the
 * whole-set pass, which must run before any record is evaluated.
 */
export function validateCreditMemo(
  record: CreditMemoRecord,
  matrices: MatrixSet,
  config: EngineConfig,
  { duplicate, row }: RecordContext
): { result: ValidatedCreditMemo; audit: AuditEntry[] } {
  const audit: AuditEntry[] = [];
  const { memo } = record;

  const reasonClass = classifyReason(record.reason, config);
  const category = categoryOf(reasonClass);
  const matrix = matrices[category];
  audit.push(
    entry('classify', row, memo, `Reason classified as ${reasonClass}; ${matrix ? `using ${category} matrix` : `no ${category} matrix loaded`}.`)
  );

  const amount = parseAmount(record.amount);
  const requiredLevel = resolveRequiredLevel(amount, matrix);
  const approverLevel = resolveApproverLevel(record.approverDesignation, matrix);
  audit.push(
    entry(
      'resolve',
      row,
      memo,
      `Amount ${show(amount)} requires level ${show(requiredLevel)}; designation "${record.approverDesignation ?? ''}" resolved as ${
        approverLevel.kind === 'level' ? `level ${approverLevel.level}` : approverLevel.kind
      }.`
    )
  );

  const tentative = evaluateApproval(
    { amount, requiredLevel, approverLevel, designation: record.approverDesignation },
    config
  );
  audit.push(
    entry(
      'evaluate',
      row,
      memo,
      tentative.state === 'pending'
        ? 'Approval level sufficient; pending timeline check.'
        : `Approval violation (${tentative.risk}): ${tentative.message}`
    )
  );

  const timeline = evaluateTimeline(record, tentative, config);
  const { verdict } = timeline;
  audit.push(
    entry(
      'timeline',
      row,
      memo,
      `${timeline.approvalSequence}, ${show(timeline.businessDays)} business day(s); final status ${verdict.status} (${verdict.risk}).`
    )
  );

  const violations = aggregateViolations(verdict, timeline);
  audit.push(entry('aggregate', row, memo, `${violations.violationCount} violation(s): ${violations.violationReason}`));

  const designationLevelCheck = checkSeparationOfDuties(record.createdBy, record.approver);
  audit.push(entry('sod', row, memo, `Separation of duties ${designationLevelCheck}.`));

  const result: ValidatedCreditMemo = {
    ...record,
    reasonClass,
    requiredApprovalLevel: requiredLevel,
    finalApproverLevel: levelOf(approverLevel),
    finalApprover: record.approverDesignation,
    soxStatus: verdict.status,
    riskLevel: verdict.risk,
    missingApprovals: verdict.missingApprovals,
    violationReason: violations.violationReason,
    violationCount: violations.violationCount,
    approvalTimelineBusinessDays: timeline.businessDays,
    timelineStatus: timeline.timelineStatus,
    approvalSequence: timeline.approvalSequence,
    designationLevelCheck,
    duplicateMemo: duplicate ? 'Yes' : 'No',
  };

  logger.debug('Credit memo validated', {
    memo,
    status: result.soxStatus,
    risk: result.riskLevel,
    violations: result.violationCount,
  });

  return { result, audit };
}

export function validateCreditMemos(
  records: readonly CreditMemoRecord[],
  matrices: MatrixSet,
  options: EngineOptions = {},
  runOptions: RunOptions = {}
): EngineOutput {
  const config = resolveEngineConfig(options);
  const auditTrail: AuditEntry[] = [];

  const duplicates = findDuplicateMemos(records);
  auditTrail.push(
    entry('duplicates', null, null, `Found ${duplicates.size} memo value(s) occurring more than once across ${records.length} record(s).`)
  );

  const validated: ValidatedCreditMemo[] = [];
  records.forEach((record, row) => {
    runOptions.signal?.throwIfAborted();
    const { result, audit } = validateCreditMemo(record, matrices, config, {
      duplicate: duplicates.has(record.memo),
      row,
    });
    validated.push(result);
    auditTrail.push(...audit);
  });

  const summary = summarizeOutcomes(validated);
  logger.info('Credit memo validation complete', {
    total: summary.total,
    compliant: summary.compliant,
    violations: summary.violations,
    highRisk: summary.highRisk,
  });

  return { records: validated, summary, auditTrail };
}
