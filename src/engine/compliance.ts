import type { ApproverLevel, EngineConfig, TentativeOutcome } from './types';

export interface ApprovalInput {
  amount: number | undefined;
  requiredLevel: number | undefined;
  approverLevel: ApproverLevel;
  designation: string | null;
}

export function missingLevels(approverLevel: number, requiredLevel: number): number[] {
  const levels: number[] = [];
  for (let lvl = approverLevel + 1; lvl <= requiredLevel; lvl++) levels.push(lvl);
  return levels;
}

/**
 * First stage of the verdict. A sufficient approver yields `pending`;
 * the timeline stage decides whether that becomes compliant.
 */
export function evaluateApproval(
  input: ApprovalInput,
  config: Pick<EngineConfig, 'missingLevelsForHigh'>
): TentativeOutcome {
  const { amount, requiredLevel, approverLevel } = input;

  if (amount === undefined || requiredLevel === undefined) {
    return { state: 'violation', risk: 'High', message: 'Missing amount or matrix not available' };
  }
  if (approverLevel.kind === 'unresolved') {
    return { state: 'violation', risk: 'High', message: 'Approver designation missing' };
  }
  if (approverLevel.kind === 'not_found') {
    return {
      state: 'violation',
      risk: 'High',
      message: `Designation '${input.designation ?? ''}' not found in matrix`,
    };
  }
  if (approverLevel.level >= requiredLevel) {
    return { state: 'pending' };
  }

  const missing = missingLevels(approverLevel.level, requiredLevel);
  return {
    state: 'violation',
    risk: missing.length >= config.missingLevelsForHigh ? 'High' : 'Medium',
    message: `Level ${missing.join('–')} Missing`,
  };
}
