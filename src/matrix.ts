import { logger } from './logger';
import type { ApprovalMatrix, ApprovalMatrixEntry, MatrixSet, PolicyCategory } from './types';

export interface MatrixRow {
  amountRange?: string | number | null;
  level?: string | number | null;
  designation?: string | null;
}

function numberOrInfinity(digits: string): number {
  const n = digits ? Number(digits) : NaN;
  return Number.isFinite(n) ? n : Infinity;
}

/**
 * Inclusive ceiling of an amount-range cell such as "Up to 10,000",
 * "10,001 – 50,000" or "Above 50,000". Unparseable ranges are open-ended.
 */
export function parseUpperLimit(amountRange: MatrixRow['amountRange']): number {
  if (typeof amountRange === 'number') return Number.isNaN(amountRange) ? Infinity : amountRange;
  if (amountRange === null || amountRange === undefined) return Infinity;

  const s = amountRange.trim().replace(/,/g, '');
  const low = s.toLowerCase();

  if (low.startsWith('up to')) {
    return numberOrInfinity(low.slice('up to'.length).replace(/[^\d.]/g, ''));
  }
  const sep = s.includes('–') ? '–' : s.includes('-') ? '-' : undefined;
  if (sep) {
    const right = s.split(sep).pop() ?? '';
    return numberOrInfinity(right.replace(/[^\d.]/g, ''));
  }
  if (low.startsWith('above')) return Infinity;

  const nums = s.match(/\d+(?:\.\d+)?/g);
  return nums ? Number(nums[nums.length - 1]) : Infinity;
}

export function parseLevel(value: MatrixRow['level']): number | undefined {
  if (typeof value === 'number') return Number.isInteger(value) ? value : undefined;
  const m = (value ?? '').match(/\d+/);
  return m ? Number(m[0]) : undefined;
}

export function buildMatrix(rows: readonly MatrixRow[]): ApprovalMatrix {
  const entries: ApprovalMatrixEntry[] = [];
  for (const row of rows) {
    const level = parseLevel(row.level);
    if (level === undefined) continue;
    entries.push({
      level,
      designation: (row.designation ?? '').trim(),
      upperLimit: parseUpperLimit(row.amountRange),
    });
  }
  entries.sort((a, b) => (a.upperLimit === b.upperLimit ? a.level - b.level : a.upperLimit < b.upperLimit ? -1 : 1));
  return Object.freeze(entries.map((e) => Object.freeze(e)));
}

export function classifyMatrixName(name: string): PolicyCategory | undefined {
  const n = name.toLowerCase();
  if (n.includes('promotional')) return 'promotional';
  if (n.includes('contract')) return 'contract';
  if (n.includes('other')) return 'other';
  return undefined;
}

export function buildMatrixSet(tables: Readonly<Record<string, readonly MatrixRow[]>>): MatrixSet {
  const set: Partial<Record<PolicyCategory, ApprovalMatrix>> = {};
  for (const [name, rows] of Object.entries(tables)) {
    const category = classifyMatrixName(name);
    if (!category) {
      logger.warn('Skipping matrix table with unrecognised name', { name });
      continue;
    }
    set[category] = buildMatrix(rows);
  }
  return Object.freeze(set);
}
