import { readFileSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { InputValidationError } from './errors';
import { logger } from './logger';
import { buildMatrixSet } from './matrix';
import { recordFromRow } from './table';
import type { CreditMemoRecord, MatrixSet } from './types';

const DATA_DIR = path.join(__dirname, '..', 'data');

const recordRowsSchema = z.array(z.record(z.string(), z.unknown()));

const matrixRowSchema = z.object({
  amountRange: z.union([z.string(), z.number()]).nullish(),
  level: z.union([z.string(), z.number()]).nullish(),
  designation: z.string().nullish(),
});

const matrixTablesSchema = z.record(z.string(), z.array(matrixRowSchema));

export interface Dataset {
  records: CreditMemoRecord[];
  matrices: MatrixSet;
}

function readJson<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InputValidationError(`Could not read ${filePath}: ${reason}`);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new InputValidationError(
      `Unexpected data layout in ${filePath}`,
      parsed.error.errors.map((e) => ({ path: e.path.join('.'), message: e.message }))
    );
  }
  return parsed.data;
}

export function loadRecords(filePath: string): CreditMemoRecord[] {
  return readJson(filePath, recordRowsSchema).map((row) => recordFromRow(row));
}

export function loadMatrices(filePath: string): MatrixSet {
  return buildMatrixSet(readJson(filePath, matrixTablesSchema));
}

export function loadDataset(recordsPath: string, matricesPath: string): Dataset {
  const records = loadRecords(recordsPath);
  const matrices = loadMatrices(matricesPath);
  logger.info('Dataset loaded', {
    records: records.length,
    matrices: Object.keys(matrices),
  });
  return { records, matrices };
}

export function loadSampleData(): Dataset {
  return loadDataset(
    path.join(DATA_DIR, 'credit_memos.json'),
    path.join(DATA_DIR, 'approval_matrices.json')
  );
}
