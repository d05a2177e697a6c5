import { describe, it, expect } from 'vitest';
import { checkSeparationOfDuties, findDuplicateMemos } from '../engine/checks';
import { validateCreditMemo, validateCreditMemos } from '../engine/engine';
import type { ApprovalMatrix, MatrixSet } from '../types';
import { TEST_CONFIG, makeRecord, matrices } from './fixtures';

function run(records = [makeRecord()], set: MatrixSet = matrices) {
  return validateCreditMemos(records, set, TEST_CONFIG);
}

describe('validateCreditMemos', () => {
  it('passes a sufficiently approved, on-time contract memo', () => {
    const [result] = run().records;
    expect(result).toMatchObject({
      reasonClass: 'Contract',
      requiredApprovalLevel: 2,
      finalApproverLevel: 2,
      finalApprover: 'Finance Controller',
      soxStatus: 'SOX Compliant',
      riskLevel: 'Low',
      missingApprovals: 'None',
      violationReason: 'None',
      violationCount: 0,
      approvalTimelineBusinessDays: 3,
      timelineStatus: 'Within 5 days',
      approvalSequence: 'Order OK',
      designationLevelCheck: 'OK',
      duplicateMemo: 'No',
    });
  });

  it('keeps the input fields on the output record', () => {
    const record = makeRecord({ customerName: 'Acme Ltd' });
    const [result] = run([record]).records;
    expect(result.customerName).toBe('Acme Ltd');
    expect(result.memo).toBe('CM100');
    expect(record).not.toHaveProperty('soxStatus');
  });

  it('flags approval after CM creation despite a sufficient approver', () => {
    const [result] = run([makeRecord({ dateOfApproval: '2024-01-09' })]).records;
    expect(result.soxStatus).toBe('SOX Violation');
    expect(result.riskLevel).toBe('High');
    expect(result.missingApprovals).toBe('Approval Date: Approved after CM creation');
    expect(result.violationCount).toBe(2);
  });

  it('reports -1 business days for a weekend approval', () => {
    const [result] = run([makeRecord({ dateOfApproval: '2024-01-06', cmDate: '2024-01-07' })]).records;
    expect(result).toMatchObject({
      soxStatus: 'SOX Compliant',
      approvalTimelineBusinessDays: -1,
      timelineStatus: 'Within 5 days',
      approvalSequence: 'Order OK',
    });
  });

  it('matches mixed-case keyword options', () => {
    const records = [makeRecord({ reason: 'Promo rebate' }), makeRecord({ memo: 'CM101', reason: 'Contract rebate' })];
    const { records: out } = validateCreditMemos(records, matrices, { ...TEST_CONFIG, keywordsPromotional: ['', 'Promo'] });
    expect(out.map((r) => r.reasonClass)).toEqual(['Promotional', 'Contract']);
  });

  it('flags missing dates on an otherwise compliant memo', () => {
    const [result] = run([makeRecord({ cmDate: 'not recorded' })]).records;
    expect(result.soxStatus).toBe('SOX Violation');
    expect(result.riskLevel).toBe('High');
    expect(result.missingApprovals).toBe('Timeline: Dates missing');
    expect(result.approvalTimelineBusinessDays).toBeUndefined();
    expect(result.violationReason).toBe('SLA Breach: Timeline: Dates missing');
  });

  it('reports missing approval levels', () => {
    const [result] = run([
      makeRecord({ amount: 180000, reason: 'Promotional allowance', approverDesignation: 'Sales Manager' }),
    ]).records;
    expect(result).toMatchObject({
      reasonClass: 'Promotional',
      requiredApprovalLevel: 3,
      finalApproverLevel: 1,
      soxStatus: 'SOX Violation',
      riskLevel: 'High',
      missingApprovals: 'Level 2–3 Missing',
      violationReason: 'Missing Approval: Level 2–3 Missing',
      violationCount: 1,
    });
  });

  it('reports an unknown designation', () => {
    const [result] = run([makeRecord({ approverDesignation: 'Regional Manager' })]).records;
    expect(result.soxStatus).toBe('SOX Violation');
    expect(result.riskLevel).toBe('High');
    expect(result.missingApprovals).toBe("Designation 'Regional Manager' not found in matrix");
    expect(result.finalApproverLevel).toBeUndefined();
  });

  it('treats a category without a matrix as unevaluable', () => {
    const [result] = run([makeRecord({ reason: 'Damaged goods' })]).records;
    expect(result.reasonClass).toBe('Other');
    expect(result.requiredApprovalLevel).toBeUndefined();
    expect(result.finalApproverLevel).toBeUndefined();
    expect(result.missingApprovals).toBe('Missing amount or matrix not available');
    expect(result.violationReason).toBe('Approval Issue: Missing amount or matrix not available');
  });

  it('lets an SLA breach replace a more severe approval finding', () => {
    const [result] = run([
      makeRecord({ approverDesignation: 'Regional Manager', dateOfApproval: '2024-01-01', cmDate: '2024-01-15' }),
    ]).records;
    expect(result.riskLevel).toBe('Medium');
    expect(result.missingApprovals).toBe('Timeline: CM created 5 days after SLA threshold');
    expect(result.violationReason).toBe(
      'SLA Breach: Timeline: CM created 5 days after SLA threshold | SLA Exceeded: Over 5 days'
    );
  });

  it('marks every occurrence of a repeated memo as duplicate', () => {
    const out = run([makeRecord({ memo: 'CM100' }), makeRecord({ memo: 'CM100' }), makeRecord({ memo: 'CM200' })]);
    expect(out.records.map((r) => r.duplicateMemo)).toEqual(['Yes', 'Yes', 'No']);
    expect(out.records.map((r) => r.soxStatus)).toEqual(['SOX Compliant', 'SOX Compliant', 'SOX Compliant']);
  });

  it('checks separation of duties independently of the verdict', () => {
    const [result] = run([
      makeRecord({ createdBy: 'Jane Doe', approver: ' jane doe ', approverDesignation: 'Regional Manager' }),
    ]).records;
    expect(result.designationLevelCheck).toBe('Violation');
    expect(result.soxStatus).toBe('SOX Violation');
  });

  it('honours engine options', () => {
    const [result] = validateCreditMemos([makeRecord()], matrices, { ...TEST_CONFIG, slaDays: 2 }).records;
    expect(result.timelineStatus).toBe('Over 2 days');
    expect(result.riskLevel).toBe('Medium');
  });

  it('summarises the run', () => {
    const out = run([
      makeRecord(),
      makeRecord({ memo: 'CM101', approverDesignation: 'Regional Manager', amount: '1000' }),
      makeRecord({ memo: 'CM101', createdBy: 'Sam Approver', amount: 'n/a' }),
      makeRecord({ memo: 'CM102', cmDate: '2024-01-15', dateOfApproval: '2024-01-01' }),
    ]);
    expect(out.summary).toEqual({
      total: 4,
      compliant: 1,
      violations: 3,
      compliantPct: 25,
      violationPct: 75,
      highRisk: 2,
      mediumRisk: 1,
      lowRisk: 1,
      overSla: 1,
      duplicates: 2,
      sodViolations: 1,
      totalAmount: 101000,
    });
  });

  it('records an audit trail for each step of each record', () => {
    const out = run([makeRecord(), makeRecord({ memo: 'CM200' })]);
    expect(out.auditTrail.map((e) => e.step)).toEqual([
      'duplicates',
      'classify', 'resolve', 'evaluate', 'timeline', 'aggregate', 'sod',
      'classify', 'resolve', 'evaluate', 'timeline', 'aggregate', 'sod',
    ]);
    expect(out.auditTrail[0]).toMatchObject({ row: null, memo: null });
    expect(out.auditTrail[7]).toMatchObject({
      row: 1,
      memo: 'CM200',
      details: 'Reason classified as Contract; using contract matrix.',
    });
    expect(out.auditTrail[2].details).toBe(
      'Amount 50000 requires level 2; designation "Finance Controller" resolved as level 2.'
    );
  });

  it('stops between records once the batch is cancelled', () => {
    const controller = new AbortController();
    controller.abort();
    expect(() =>
      validateCreditMemos([makeRecord()], matrices, TEST_CONFIG, { signal: controller.signal })
    ).toThrow();
  });
});

describe('validateCreditMemo', () => {
  it('evaluates a single record with a precomputed duplicate flag', () => {
    const open: ApprovalMatrix = [{ level: 1, designation: 'Finance Controller', upperLimit: Infinity }];
    const { result, audit } = validateCreditMemo(makeRecord(), { contract: open }, TEST_CONFIG, {
      duplicate: true,
      row: 4,
    });
    expect(result.duplicateMemo).toBe('Yes');
    expect(result.requiredApprovalLevel).toBe(1);
    expect(result.soxStatus).toBe('SOX Compliant');
    expect(audit.every((e) => e.row === 4)).toBe(true);
  });
});

describe('findDuplicateMemos', () => {
  it('compares memo values exactly', () => {
    const dupes = findDuplicateMemos([{ memo: 'cm1' }, { memo: 'CM1' }, { memo: 7 }, { memo: 7 }, { memo: null }]);
    expect([...dupes]).toEqual([7]);
  });
});

describe('checkSeparationOfDuties', () => {
  it('needs both names present and equal', () => {
    expect(checkSeparationOfDuties('Jane Doe', 'jane doe')).toBe('Violation');
    expect(checkSeparationOfDuties('Jane Doe', 'John Roe')).toBe('OK');
    expect(checkSeparationOfDuties('', '')).toBe('OK');
    expect(checkSeparationOfDuties(null, 'Jane Doe')).toBe('OK');
  });
});
