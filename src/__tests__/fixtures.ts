import type { EngineConfig } from '../engine/types';
import type { ApprovalMatrix, CreditMemoRecord, MatrixSet } from '../types';

export const TEST_CONFIG: EngineConfig = {
  slaDays: 5,
  missingLevelsForHigh: 2,
  keywordsPromotional: ['promotional', 'promotion'],
  keywordsContract: ['contract'],
};

export const contractMatrix: ApprovalMatrix = [
  { level: 1, designation: 'Contract Manager', upperLimit: 25000 },
  { level: 2, designation: 'Finance Controller', upperLimit: 100000 },
  { level: 3, designation: 'Chief Financial Officer', upperLimit: Infinity },
];

export const promotionalMatrix: ApprovalMatrix = [
  { level: 1, designation: 'Sales Manager', upperLimit: 10000 },
  { level: 2, designation: 'Regional Sales Director', upperLimit: 50000 },
  { level: 3, designation: 'VP Sales', upperLimit: 250000 },
];

export const matrices: MatrixSet = {
  contract: contractMatrix,
  promotional: promotionalMatrix,
};

export function makeRecord(overrides: Partial<CreditMemoRecord> = {}): CreditMemoRecord {
  return {
    memo: 'CM100',
    customerName: 'Test Customer',
    cmDate: '2024-01-05',
    createdBy: 'Alex Creator',
    amount: 50000,
    reason: 'Contract rebate',
    dateOfApproval: '2024-01-02',
    approver: 'Sam Approver',
    approverDesignation: 'Finance Controller',
    ...overrides,
  };
}
