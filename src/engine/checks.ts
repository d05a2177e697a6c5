import type { CheckResult, CreditMemoRecord } from '../types';

type MemoId = CreditMemoRecord['memo'];

/** Memo values seen more than once. Exact, case-sensitive comparison. */
export function findDuplicateMemos(records: readonly Pick<CreditMemoRecord, 'memo'>[]): Set<MemoId> {
  const counts = new Map<MemoId, number>();
  for (const { memo } of records) {
    counts.set(memo, (counts.get(memo) ?? 0) + 1);
  }
  const duplicates = new Set<MemoId>();
  for (const [memo, count] of counts) {
    if (count > 1) duplicates.add(memo);
  }
  return duplicates;
}

// Creator and approver must be different people.
export function checkSeparationOfDuties(createdBy: string | null, approver: string | null): CheckResult {
  const creator = (createdBy ?? '').trim().toLowerCase();
  const approvedBy = (approver ?? '').trim().toLowerCase();
  return creator && approvedBy && creator === approvedBy ? 'Violation' : 'OK';
}
