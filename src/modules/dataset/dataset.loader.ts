/**
 * Dataset Loader
 * ==============
 *
 * CSV text → records → frozen Dataset.
 *
 * LOAD POLICY
 * -----------
 * - Record 0 is the header: [entity name, category label, ...features]
 * - Data rows with 2 fields or fewer are dropped without a diagnostic
 * - Numeric fields that do not parse become MISSING
 * - Short rows are padded with MISSING, fields past the header are ignored
 * - Only an unreadable source or a source without a header is an error
 */

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { DatasetLoadError } from '../../common/errors.js';
import { ColumnIndex, IDENTITY_COLUMN_COUNT } from './column.index.js';
import { parseNumericCell } from './numeric.cell.js';
import type { Cell, Dataset, DatasetSummary, MatrixRow } from './dataset.types.js';

// ═══════════════════════════════════════════════════════════════
// TOKENIZING
// ═══════════════════════════════════════════════════════════════

function isRecordList(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every(row => Array.isArray(row) && row.every(field => typeof field === 'string'))
  );
}

const CSV_OPTIONS = {
  bom: true,
  relax_column_count: true,
  relax_quotes: true,
  skip_empty_lines: true,
};

function isUnclosedQuote(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'CSV_QUOTE_NOT_CLOSED';
}

function tokenize(content: string): unknown {
  try {
    return parse(content, CSV_OPTIONS);
  } catch (err) {
    if (!isUnclosedQuote(err)) {
      throw new DatasetLoadError('Cannot tokenize dataset file', { cause: err });
    }
  }

  // An unclosed quote runs to the end of the input: close it there and keep the rows before it
  try {
    return parse(`${content}"`, CSV_OPTIONS);
  } catch (err) {
    throw new DatasetLoadError('Cannot tokenize dataset file', { cause: err });
  }
}

/**
 * Split CSV text into records of raw string fields
 */
export function parseCsv(content: string): string[][] {
  const records = tokenize(content);

  if (!isRecordList(records)) {
    throw new DatasetLoadError('CSV tokenizer returned unexpected records');
  }
  return records;
}

// ═══════════════════════════════════════════════════════════════
// BUILDING
// ═══════════════════════════════════════════════════════════════

/**
 * Build a Dataset from records whose first entry is the header row
 */
export function buildDataset(records: readonly (readonly string[])[]): Dataset {
  const [header, ...rows] = records;
  if (header === undefined) {
    throw new DatasetLoadError('Source has no header row');
  }

  const identityNames: readonly [string, string] = [header[0] ?? '', header[1] ?? ''];
  Object.freeze(identityNames);
  const featureNames = Object.freeze(header.slice(IDENTITY_COLUMN_COUNT));

  const entityNames: string[] = [];
  const categoryLabels: string[] = [];
  const matrix: MatrixRow[] = [];

  for (const row of rows) {
    if (row.length <= IDENTITY_COLUMN_COUNT) continue;

    entityNames.push(row[0]);
    categoryLabels.push(row[1]);

    const cells: Cell[] = featureNames.map((_, j) => parseNumericCell(row[IDENTITY_COLUMN_COUNT + j]));
    matrix.push(Object.freeze(cells));
  }

  return Object.freeze({
    identityNames,
    entityNames: Object.freeze(entityNames),
    categoryLabels: Object.freeze(categoryLabels),
    featureNames,
    matrix: Object.freeze(matrix),
    columnIndex: new ColumnIndex(header),
  });
}

/**
 * Read and build a Dataset from a UTF-8 CSV file
 */
export function loadDataset(filePath: string): Dataset {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new DatasetLoadError(`Cannot read dataset file: ${filePath}`, { cause: err });
  }

  return buildDataset(parseCsv(content));
}

export function describeDataset(dataset: Dataset): DatasetSummary {
  return {
    entityCount: dataset.entityNames.length,
    featureCount: dataset.featureNames.length,
  };
}
