import type { TimelineOutcome, Verdict } from './types';

export interface ViolationSummary {
  violationReason: string;
  violationCount: number;
}

function describeMissingApprovals(missingApprovals: string): string | undefined {
  if (!missingApprovals || missingApprovals === 'None') return undefined;
  if (missingApprovals.includes('Level')) return `Missing Approval: ${missingApprovals}`;
  if (missingApprovals.includes('Timeline')) return `SLA Breach: ${missingApprovals}`;
  return `Approval Issue: ${missingApprovals}`;
}

function describeSequence(timeline: TimelineOutcome): string | undefined {
  if (timeline.approvalSequence.includes('SLA Violated')) return `SLA Exceeded: ${timeline.timelineStatus}`;
  if (timeline.approvalSequence.includes('Approval After CM')) return 'Approval After CM Creation';
  return undefined;
}

export function aggregateViolations(verdict: Verdict, timeline: TimelineOutcome): ViolationSummary {
  if (verdict.status !== 'SOX Violation') {
    return { violationReason: 'None', violationCount: 0 };
  }

  const reasons = [describeMissingApprovals(verdict.missingApprovals), describeSequence(timeline)].filter(
    (r): r is string => r !== undefined
  );

  return {
    violationReason: reasons.length > 0 ? reasons.join(' | ') : 'None',
    violationCount: reasons.length,
  };
}
