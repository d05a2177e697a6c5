import { validateCreditMemos } from './engine/engine';
import type { EngineOutput } from './engine/types';
import { loadDataset, loadSampleData } from './load_sample_data';
import { toOutcomeRow } from './table';
import type { ValidatedCreditMemo } from './types';

// Color codes for terminal output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
  green: '\x1b[32m',
  red: '\x1b[31m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
};

function section(title: string) {
  console.log(`\n${colors.bright}${colors.cyan}${'='.repeat(100)}${colors.reset}`);
  console.log(`${colors.bright}${colors.cyan}📋 ${title}${colors.reset}`);
  console.log(`${colors.bright}${colors.cyan}${'='.repeat(100)}${colors.reset}\n`);
}

function riskColor(risk: ValidatedCreditMemo['riskLevel']): string {
  return risk === 'High' ? colors.red : risk === 'Medium' ? colors.yellow : colors.green;
}

function showMemoResult(memo: ValidatedCreditMemo, row: number, output: EngineOutput) {
  const status =
    memo.soxStatus === 'SOX Compliant'
      ? `${colors.green}✅ ${memo.soxStatus}${colors.reset}`
      : `${colors.red}⚠️  ${memo.soxStatus}${colors.reset}`;

  console.log(`${colors.bright}🔹 Memo: ${memo.memo ?? '(blank)'}${colors.reset}`);
  console.log(`   ${colors.dim}Customer: ${memo.customerName ?? 'Unknown'} | Amount: ${memo.amount ?? '-'} | Class: ${memo.reasonClass}${colors.reset}`);
  console.log(`\n   ${colors.yellow}🚦 Status:${colors.reset} ${status}`);
  console.log(`   ${colors.yellow}📊 Risk:${colors.reset} ${riskColor(memo.riskLevel)}${memo.riskLevel}${colors.reset}`);
  console.log(
    `   ${colors.yellow}🎚  Levels:${colors.reset} required ${memo.requiredApprovalLevel ?? '-'}, approver ${memo.finalApproverLevel ?? '-'} (${memo.finalApprover ?? 'no designation'})`
  );
  console.log(
    `   ${colors.yellow}⏱  Timeline:${colors.reset} ${memo.timelineStatus} / ${memo.approvalSequence} (${memo.approvalTimelineBusinessDays ?? '-'} business days)`
  );

  if (memo.violationCount > 0) {
    console.log(`\n   ${colors.magenta}💡 Violations (${memo.violationCount}):${colors.reset}`);
    memo.violationReason.split(' | ').forEach((v) => {
      console.log(`      ${colors.red}•${colors.reset} ${v}`);
    });
  }
  if (memo.duplicateMemo === 'Yes') {
    console.log(`   ${colors.yellow}⚠️  Duplicate memo number${colors.reset}`);
  }
  if (memo.designationLevelCheck === 'Violation') {
    console.log(`   ${colors.red}⚠️  Creator approved their own memo${colors.reset}`);
  }

  console.log(`\n   ${colors.magenta}📜 Audit Trail:${colors.reset}`);
  output.auditTrail
    .filter((entry) => entry.row === row)
    .forEach((entry) => {
      console.log(`      ${colors.cyan}[${entry.step.toUpperCase()}]${colors.reset} ${entry.details}`);
    });

  console.log(`\n${colors.dim}${'─'.repeat(100)}${colors.reset}`);
}

function showSummary(output: EngineOutput) {
  const s = output.summary;
  section('SUMMARY: Validation Metrics');

  console.log(`${colors.bright}┌──────────────────────┬──────────────┐${colors.reset}`);
  const rows: Array<[string, string]> = [
    ['Total Memos', String(s.total)],
    ['Compliant', `${s.compliant} (${s.compliantPct}%)`],
    ['Violations', `${s.violations} (${s.violationPct}%)`],
    ['High Risk', String(s.highRisk)],
    ['Medium Risk', String(s.mediumRisk)],
    ['Over SLA', String(s.overSla)],
    ['Duplicate Memos', String(s.duplicates)],
    ['SoD Violations', String(s.sodViolations)],
    ['Total Amount', s.totalAmount.toLocaleString('en-US')],
  ];
  rows.forEach(([label, value]) => {
    console.log(`${colors.bright}│${colors.reset} ${label.padEnd(20)} │ ${value.padEnd(12)} │`);
  });
  console.log(`${colors.bright}└──────────────────────┴──────────────┘${colors.reset}\n`);
}

function main() {
  const args = process.argv.slice(2);
  const asJson = args.includes('--json');
  const paths = args.filter((a) => a !== '--json');

  const dataset = paths.length >= 2 ? loadDataset(paths[0], paths[1]) : loadSampleData();
  const output = validateCreditMemos(dataset.records, dataset.matrices);

  if (asJson) {
    console.log(JSON.stringify(output.records.map(toOutcomeRow), null, 2));
    return;
  }

  section('CREDIT MEMO SOX VALIDATION');
  output.records.forEach((memo, row) => showMemoResult(memo, row, output));
  showSummary(output);
}

try {
  main();
} catch (err) {
  console.error(`${colors.red}Error: ${err instanceof Error ? err.message : String(err)}${colors.reset}`);
  process.exit(1);
}
