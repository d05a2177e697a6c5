export type PolicyCategory = 'promotional' | 'contract' | 'other';

export type ReasonClass = 'Promotional' | 'Contract' | 'Other';

export type SoxStatus = 'SOX Compliant' | 'SOX Violation';

export type RiskLevel = 'Low' | 'Medium' | 'High';

export type CheckResult = 'OK' | 'Violation';

export interface ApprovalMatrixEntry {
  level: number;
  designation: string;
  upperLimit: number; // Infinity for an open-ended top tier
}

// Sorted ascending by upperLimit, then level.
export type ApprovalMatrix = readonly ApprovalMatrixEntry[];

export type MatrixSet = Readonly<Partial<Record<PolicyCategory, ApprovalMatrix>>>;

export type CellValue = string | number | Date | null | undefined;

export interface CreditMemoRecord {
  memo: string | number | null;
  customerName: string | null;
  cmDate: CellValue;
  createdBy: string | null;
  amount: CellValue;
  reason: string | null;
  dateOfApproval: CellValue;
  approver: string | null;
  approverDesignation: string | null;
}

export interface ValidationOutcome {
  reasonClass: ReasonClass;
  requiredApprovalLevel?: number;
  finalApproverLevel?: number;
  finalApprover: string | null;
  soxStatus: SoxStatus;
  riskLevel: RiskLevel;
  missingApprovals: string;
  violationReason: string;
  violationCount: number;
  approvalTimelineBusinessDays?: number;
  timelineStatus: string;
  approvalSequence: string;
  designationLevelCheck: CheckResult;
  duplicateMemo: 'Yes' | 'No';
}

export type ValidatedCreditMemo = CreditMemoRecord & ValidationOutcome;
