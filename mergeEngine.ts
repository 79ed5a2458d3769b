import type {
  CellValue,
  JoinSpec,
  MergeResult,
  MergeStats,
  Row,
  Table,
  WorkbookMergeResult,
} from './types';
import { MissingColumnError } from './errors';
import { type StageLogger, silentLogger } from './logger';
import { isMissing, readWorkbook, writeWorkbook } from './utils';
import { OUTPUT_FILE_NAME, OUTPUT_SHEET_NAME } from './config';

// --- Key Index ---

/**
 * Lookup keyed by exact cell value. Types are not coerced, so the number 5
 * and the string "5" are different keys. Dates compare by timestamp and
 * a missing value is a key of its own.
 */
class KeyIndex<T> {
  private scalars = new Map<string | number | boolean | null, T>();
  private dates = new Map<number, T>();

  get(key: CellValue): T | undefined {
    return key instanceof Date ? this.dates.get(key.getTime()) : this.scalars.get(key);
  }

  has(key: CellValue): boolean {
    return key instanceof Date ? this.dates.has(key.getTime()) : this.scalars.has(key);
  }

  set(key: CellValue, value: T): void {
    if (key instanceof Date) this.dates.set(key.getTime(), value);
    else this.scalars.set(key, value);
  }
}

const keyOf = (row: Row, column: string): CellValue => row[column] ?? null;

// --- Validation ---

/**
 * Checks the join columns in a fixed order: reference column in File A,
 * reference column in File B, then target column in File B. Returns the
 * first failure, or null when all three are present.
 */
export const validateJoinSpec = (primary: Table, secondary: Table, spec: JoinSpec): MissingColumnError | null => {
  if (!primary.columns.includes(spec.referenceColumn)) {
    return new MissingColumnError(spec.referenceColumn, 'File A');
  }
  if (!secondary.columns.includes(spec.referenceColumn)) {
    return new MissingColumnError(spec.referenceColumn, 'File B');
  }
  if (!secondary.columns.includes(spec.targetColumn)) {
    return new MissingColumnError(spec.targetColumn, 'File B');
  }
  return null;
};

// --- Table Operations ---

// Keeps the named columns in the table's own order
export const projectColumns = (table: Table, columns: string[]): Table => {
  const keep = table.columns.filter(col => columns.includes(col));
  return {
    columns: keep,
    rows: table.rows.map(row => Object.fromEntries(keep.map((col): [string, CellValue] => [col, keyOf(row, col)]))),
  };
};

export const deduplicate = (table: Table, referenceColumn: string): Table => {
  const seen = new KeyIndex<true>();
  const rows = table.rows.filter(row => {
    const key = keyOf(row, referenceColumn);
    if (seen.has(key)) return false;
    seen.set(key, true);
    return true;
  });
  return { columns: [...table.columns], rows };
};

/**
 * Every primary row comes out exactly once, in order, with `targetColumn`
 * set to the value from the first secondary row sharing its key (or null).
 * An existing `targetColumn` in the primary table is overwritten in place.
 */
export const leftJoin = (
  primary: Table,
  secondary: Table,
  referenceColumn: string,
  targetColumn: string
): Table => {
  const index = new KeyIndex<Row>();
  for (const row of secondary.rows) {
    const key = keyOf(row, referenceColumn);
    if (!index.has(key)) index.set(key, row);
  }

  const columns = primary.columns.includes(targetColumn)
    ? [...primary.columns]
    : [...primary.columns, targetColumn];

  const rows = primary.rows.map((row): Row => {
    const key = keyOf(row, referenceColumn);
    const match = index.get(key);
    // Joining a column onto itself leaves the key untouched
    const value = targetColumn === referenceColumn ? key : match ? keyOf(match, targetColumn) : null;
    return { ...row, [targetColumn]: value };
  });

  return { columns, rows };
};

export const computeStats = (merged: Table, targetColumn: string): MergeStats => {
  const matchedRows = merged.rows.filter(row => !isMissing(row[targetColumn])).length;
  return {
    totalRows: merged.rows.length,
    matchedRows,
    unmatchedRows: merged.rows.length - matchedRows,
  };
};

// Rows left without a target value, shown without the target column
export const selectUnmatched = (merged: Table, targetColumn: string): Table => {
  const columns = merged.columns.filter(col => col !== targetColumn);
  return {
    columns,
    rows: merged.rows
      .filter(row => isMissing(row[targetColumn]))
      .map(row => Object.fromEntries(columns.map((col): [string, CellValue] => [col, keyOf(row, col)]))),
  };
};

// --- Pipelines ---

export const mergeTables = (
  primary: Table,
  secondary: Table,
  spec: JoinSpec,
  log: StageLogger = silentLogger
): MergeResult => {
  const { referenceColumn, targetColumn } = spec;

  const missing = validateJoinSpec(primary, secondary, spec);
  if (missing) {
    log.error(missing.message, { column: missing.column, source: missing.source });
    return { success: false, error: missing };
  }
  log.info('Columns validated', { referenceColumn, targetColumn });

  if (primary.columns.includes(targetColumn) && targetColumn !== referenceColumn) {
    log.warn(`File A already has a '${targetColumn}' column; its values will be replaced`);
  }

  const projected = projectColumns(secondary, [referenceColumn, targetColumn]);
  const deduped = deduplicate(projected, referenceColumn);
  log.info(`Removed ${projected.rows.length - deduped.rows.length} duplicate rows from File B`, {
    before: projected.rows.length,
    after: deduped.rows.length,
  });

  const merged = leftJoin(primary, deduped, referenceColumn, targetColumn);
  const stats = computeStats(merged, targetColumn);
  log.info(`Joined ${stats.totalRows} rows from File A`, { ...stats });

  return { success: true, merged, stats, unmatched: selectUnmatched(merged, targetColumn) };
};

export interface WorkbookMergeOptions {
  logger?: StageLogger;
  sheetName?: string;
  fileName?: string;
}

/**
 * Merge two parsed tables and write the result as a workbook. Stops at the
 * first failure without producing any output.
 */
export const mergeToWorkbook = (
  primary: Table,
  secondary: Table,
  spec: JoinSpec,
  options: WorkbookMergeOptions = {}
): WorkbookMergeResult => {
  const { logger: log = silentLogger, sheetName = OUTPUT_SHEET_NAME, fileName = OUTPUT_FILE_NAME } = options;

  const result = mergeTables(primary, secondary, spec, log);
  if (!result.success) return result;

  const written = writeWorkbook(result.merged, sheetName);
  if (!written.success) {
    log.error(written.error.message);
    return written;
  }
  log.info(`Wrote ${fileName}`, { bytes: written.bytes.length });

  return { ...result, output: written.bytes, fileName };
};

// Byte-level pipeline: read both workbooks, then merge and write
export const mergeWorkbooks = (
  primaryBytes: Uint8Array,
  secondaryBytes: Uint8Array,
  spec: JoinSpec,
  options: WorkbookMergeOptions = {}
): WorkbookMergeResult => {
  const log = options.logger ?? silentLogger;

  const primary = readWorkbook(primaryBytes, 'File A');
  if (!primary.success) {
    log.error(primary.error.message);
    return primary;
  }
  const secondary = readWorkbook(secondaryBytes, 'File B');
  if (!secondary.success) {
    log.error(secondary.error.message);
    return secondary;
  }
  log.info('Loaded files', {
    fileA: { rows: primary.table.rows.length, columns: primary.table.columns.length },
    fileB: { rows: secondary.table.rows.length, columns: secondary.table.columns.length },
  });

  return mergeToWorkbook(primary.table, secondary.table, spec, options);
};
