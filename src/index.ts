export { validateCreditMemo, validateCreditMemos } from './engine/engine';
export type { RecordContext } from './engine/engine';
export { classifyReason, categoryOf } from './engine/classifier';
export { parseAmount, resolveRequiredLevel, resolveApproverLevel, levelOf } from './engine/levels';
export { evaluateApproval, missingLevels } from './engine/compliance';
export { evaluateTimeline, parseCalendarDate, businessDaysBetween } from './engine/timeline';
export { aggregateViolations } from './engine/violations';
export { findDuplicateMemos, checkSeparationOfDuties } from './engine/checks';
export { summarizeOutcomes } from './engine/summary';
export { buildMatrix, buildMatrixSet, classifyMatrixName, parseLevel, parseUpperLimit } from './matrix';
export type { MatrixRow } from './matrix';
export { INPUT_COLUMNS, OUTCOME_COLUMNS, mapColumns, normalizeHeader, recordFromRow, toOutcomeRow } from './table';
export type { OutcomeRow, TableCell } from './table';
export { loadDataset, loadSampleData } from './load_sample_data';
export type { Dataset } from './load_sample_data';
export { getConfig, loadEnv, normalizeKeywords, resolveEngineConfig } from './config';
export type { AppConfig } from './config';
export { AppError, ConfigError, InputValidationError } from './errors';
export type * from './engine/types';
export type * from './types';
