import type { CellValue, CreditMemoRecord, ValidatedCreditMemo } from './types';

export const INPUT_COLUMNS = [
  'Memo',
  'Customer Name',
  'Cm Date',
  'Created By',
  'Amount',
  'Reason',
  'Date Of Approval',
  'Approver',
  'Approver Designation',
] as const;

export const OUTCOME_COLUMNS = [
  'Reason Class',
  'Required Approval Level',
  'Final Approver',
  'Final Approver Level',
  'SOX Status',
  'Risk Level',
  'Missing Approvals',
  'Violation Reason',
  'Violation Count',
  'Approval Timeline (Business Days)',
  'Timeline Status',
  'Approval Sequence',
  'Designation Level Check',
  'Duplicate Memo',
] as const;

export type InputColumn = (typeof INPUT_COLUMNS)[number];
export type OutcomeColumn = (typeof OUTCOME_COLUMNS)[number];
export type TableCell = string | number;
export type OutcomeRow = Record<InputColumn | OutcomeColumn, TableCell>;

const COLUMN_SYNONYMS: Record<InputColumn, readonly string[]> = {
  Memo: ['memo', 'memo id', 'memoid'],
  'Customer Name': ['customer name'],
  'Cm Date': ['cm date', 'credit memo date'],
  'Created By': ['created by', 'creator'],
  Amount: ['amount'],
  Reason: ['reason'],
  'Date Of Approval': ['date of approval', 'approval date'],
  Approver: ['approver'],
  'Approver Designation': ['approver designation', 'designation'],
};

export function normalizeHeader(header: string): string {
  return header
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

/** Renames synonym headers to their canonical column; other headers pass through. */
export function mapColumns(row: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const byNormalized = new Map<string, string>();
  for (const header of Object.keys(row)) byNormalized.set(normalizeHeader(header), header);

  const renames = new Map<string, string>();
  for (const column of INPUT_COLUMNS) {
    const source = COLUMN_SYNONYMS[column].map((syn) => byNormalized.get(syn)).find((h) => h !== undefined);
    if (source !== undefined) renames.set(source, column);
  }

  const mapped: Record<string, unknown> = {};
  for (const [header, value] of Object.entries(row)) {
    mapped[renames.get(header) ?? header] = value;
  }
  return mapped;
}

function text(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

function cell(value: unknown): CellValue {
  if (typeof value === 'string' || typeof value === 'number' || value instanceof Date) return value;
  return null;
}

export function recordFromRow(row: Readonly<Record<string, unknown>>): CreditMemoRecord {
  const r = mapColumns(row);
  const memo = r['Memo'];
  return {
    memo: typeof memo === 'string' || typeof memo === 'number' ? memo : null,
    customerName: text(r['Customer Name']),
    cmDate: cell(r['Cm Date']),
    createdBy: text(r['Created By']),
    amount: cell(r['Amount']),
    reason: text(r['Reason']),
    dateOfApproval: cell(r['Date Of Approval']),
    approver: text(r['Approver']),
    approverDesignation: text(r['Approver Designation']),
  };
}

function formatDate(date: Date): string {
  if (Number.isNaN(date.getTime())) return '';
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function toCell(value: CellValue): TableCell {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return formatDate(value);
  return value;
}

export function toOutcomeRow(v: ValidatedCreditMemo): OutcomeRow {
  return {
    Memo: toCell(v.memo),
    'Customer Name': toCell(v.customerName),
    'Cm Date': toCell(v.cmDate),
    'Created By': toCell(v.createdBy),
    Amount: toCell(v.amount),
    Reason: toCell(v.reason),
    'Date Of Approval': toCell(v.dateOfApproval),
    Approver: toCell(v.approver),
    'Approver Designation': toCell(v.approverDesignation),
    'Reason Class': v.reasonClass,
    'Required Approval Level': toCell(v.requiredApprovalLevel),
    'Final Approver': toCell(v.finalApprover),
    'Final Approver Level': toCell(v.finalApproverLevel),
    'SOX Status': v.soxStatus,
    'Risk Level': v.riskLevel,
    'Missing Approvals': v.missingApprovals,
    'Violation Reason': v.violationReason,
    'Violation Count': v.violationCount,
    'Approval Timeline (Business Days)': toCell(v.approvalTimelineBusinessDays),
    'Timeline Status': v.timelineStatus,
    'Approval Sequence': v.approvalSequence,
    'Designation Level Check': v.designationLevelCheck,
    'Duplicate Memo': v.duplicateMemo,
  };
}
