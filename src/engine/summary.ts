import type { ValidatedCreditMemo } from '../types';
import { parseAmount } from './levels';
import type { ValidationSummary } from './types';

function pct(part: number, total: number): number {
  return total === 0 ? 0 : Math.round((1000 * part) / total) / 10;
}

export function summarizeOutcomes(records: readonly ValidatedCreditMemo[]): ValidationSummary {
  const total = records.length;
  const count = (predicate: (r: ValidatedCreditMemo) => boolean) => records.filter(predicate).length;

  const compliant = count((r) => r.soxStatus === 'SOX Compliant');
  const violations = count((r) => r.soxStatus === 'SOX Violation');

  return {
    total,
    compliant,
    violations,
    compliantPct: pct(compliant, total),
    violationPct: pct(violations, total),
    highRisk: count((r) => r.riskLevel === 'High'),
    mediumRisk: count((r) => r.riskLevel === 'Medium'),
    lowRisk: count((r) => r.riskLevel === 'Low'),
    overSla: count((r) => r.timelineStatus.startsWith('Over')),
    duplicates: count((r) => r.duplicateMemo === 'Yes'),
    sodViolations: count((r) => r.designationLevelCheck === 'Violation'),
    totalAmount: records.reduce((sum, r) => sum + (parseAmount(r.amount) ?? 0), 0),
  };
}
