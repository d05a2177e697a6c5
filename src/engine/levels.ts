import type { ApprovalMatrix, ApprovalMatrixEntry, CellValue } from '../types';
import type { ApproverLevel } from './types';

export function parseAmount(value: CellValue): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value !== 'string') return undefined;
  const s = value.trim();
  if (!s) return undefined;
  const n = Number(s);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Minimum approval level for an amount: the tier with the smallest ceiling
 * that still covers the amount, lowest level first on equal ceilings.
 */
export function resolveRequiredLevel(
  amount: number | undefined,
  matrix: ApprovalMatrix | undefined
): number | undefined {
  if (amount === undefined || !matrix) return undefined;

  let best: ApprovalMatrixEntry | undefined;
  for (const entry of matrix) {
    if (entry.upperLimit < amount) continue;
    if (
      !best ||
      entry.upperLimit < best.upperLimit ||
      (entry.upperLimit === best.upperLimit && entry.level < best.level)
    ) {
      best = entry;
    }
  }
  return best?.level;
}

function fold(s: string): string {
  return s.trim().toLowerCase();
}

type Matcher = (rowDesignation: string, input: string) => boolean;

// Tried in order; the first matcher with any hit decides, first row wins.
const MATCHERS: readonly Matcher[] = [
  (row, input) => row === input,
  (row, input) => row.length > 0 && input.includes(row),
  (row, input) => row.length > 0 && row.includes(input),
];

export function resolveApproverLevel(
  designation: string | null | undefined,
  matrix: ApprovalMatrix | undefined
): ApproverLevel {
  const input = fold(designation ?? '');
  if (!input || !matrix) return { kind: 'unresolved' };

  const rows = matrix.map((entry) => ({ level: entry.level, designation: fold(entry.designation) }));
  for (const matches of MATCHERS) {
    const hit = rows.find((row) => matches(row.designation, input));
    if (hit) return { kind: 'level', level: hit.level };
  }
  return { kind: 'not_found' };
}

export function levelOf(result: ApproverLevel): number | undefined {
  return result.kind === 'level' ? result.level : undefined;
}
