import type { CellValue, RiskLevel } from '../types';
import type { EngineConfig, TentativeOutcome, TimelineOutcome, Verdict } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

function utcDate(year: number, month: number, day: number): Date | undefined {
  const date = new Date(Date.UTC(year, month - 1, day));
  // rejects overflow such as 2024-02-30
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  return date;
}

function fromLocal(date: Date): Date | undefined {
  if (Number.isNaN(date.getTime())) return undefined;
  return utcDate(date.getFullYear(), date.getMonth() + 1, date.getDate());
}

/**
 * Parses a cell into a calendar date at UTC midnight; the time of day is dropped.
 * Slashed dates without a leading year are read month-first.
 */
export function parseCalendarDate(value: CellValue): Date | undefined {
  if (value instanceof Date) return fromLocal(value);
  if (typeof value !== 'string') return undefined;

  const s = value.trim();
  if (!s) return undefined;

  let m = s.match(/^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T\s].*)?$/);
  if (m) return utcDate(Number(m[1]), Number(m[2]), Number(m[3]));

  m = s.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (m) return utcDate(Number(m[3]), Number(m[1]), Number(m[2]));

  m = s.match(/^(\d{1,2})\.(\d{1,2})\.(\d{4})$/);
  if (m) return utcDate(Number(m[3]), Number(m[2]), Number(m[1]));

  if (!/\b\d{4}\b/.test(s)) return undefined;
  return fromLocal(new Date(s));
}

function isWeekday(date: Date): boolean {
  const dow = date.getUTCDay();
  return dow !== 0 && dow !== 6;
}

/**
 * Weekdays in the closed range [from, to], minus one. Same weekday is 0;
 * a range holding no weekday at all (Saturday to Sunday) is -1.
 */
export function businessDaysBetween(from: Date, to: Date): number {
  const span = Math.round((to.getTime() - from.getTime()) / DAY_MS);
  if (span < 0) return 0;

  const fullWeeks = Math.floor((span + 1) / 7);
  let weekdays = fullWeeks * 5;
  for (let offset = fullWeeks * 7; offset <= span; offset++) {
    if (isWeekday(new Date(from.getTime() + offset * DAY_MS))) weekdays++;
  }
  return weekdays - 1;
}

export interface TimelineInput {
  cmDate: CellValue;
  dateOfApproval: CellValue;
}

function violation(risk: RiskLevel, missingApprovals: string): Verdict {
  return { status: 'SOX Violation', risk, missingApprovals };
}

/**
 * Second stage of the verdict. Approval after CM creation and SLA breaches
 * overwrite whatever the approval stage decided; missing dates and on-time
 * approvals only settle a pending outcome.
 */
export function evaluateTimeline(
  input: TimelineInput,
  tentative: TentativeOutcome,
  config: Pick<EngineConfig, 'slaDays'>
): TimelineOutcome {
  const sla = config.slaDays;
  const carried: Verdict | undefined =
    tentative.state === 'violation' ? violation(tentative.risk, tentative.message) : undefined;

  const cm = parseCalendarDate(input.cmDate);
  const approved = parseCalendarDate(input.dateOfApproval);

  if (!cm || !approved) {
    return {
      verdict: carried ?? violation('High', 'Timeline: Dates missing'),
      timelineStatus: 'Dates Missing',
      approvalSequence: 'Dates Missing',
    };
  }

  if (approved.getTime() > cm.getTime()) {
    return {
      verdict: violation('High', 'Approval Date: Approved after CM creation'),
      businessDays: businessDaysBetween(cm, approved),
      timelineStatus: 'Approval After CM',
      approvalSequence: 'Approval After CM (Violation)',
    };
  }

  const days = businessDaysBetween(approved, cm);
  if (days <= sla) {
    return {
      verdict: carried ?? { status: 'SOX Compliant', risk: 'Low', missingApprovals: 'None' },
      businessDays: days,
      timelineStatus: `Within ${sla} days`,
      approvalSequence: 'Order OK',
    };
  }

  // TODO: this replaces an earlier High-risk approval violation with Medium; needs a product decision on precedence
  return {
    verdict: violation('Medium', `Timeline: CM created ${days - sla} days after SLA threshold`),
    businessDays: days,
    timelineStatus: `Over ${sla} days`,
    approvalSequence: 'SLA Violated',
  };
}
