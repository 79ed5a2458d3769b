import type { MergeEngineError } from './errors';

export type CellValue = string | number | boolean | Date | null;

export type Row = Record<string, CellValue>;

export interface Table {
  columns: string[];
  rows: Row[];
}

export type DataType = 'text' | 'number' | 'date' | 'boolean';

export interface ColumnDef {
  name: string;
  type: DataType;
}

// Which upload a table or error belongs to
export type TableSource = 'File A' | 'File B';

export interface Dataset {
  name: string;
  source: TableSource;
  columns: ColumnDef[];
  table: Table;
  rowCount: number;
  size?: string;
  rawSize?: number; // bytes
}

export interface JoinSpec {
  referenceColumn: string; // Join key, must exist in both files
  targetColumn: string;    // Column copied from File B
}

export interface MergeStats {
  totalRows: number;
  matchedRows: number;
  unmatchedRows: number;
}

export interface MergeSuccess {
  success: true;
  merged: Table;
  stats: MergeStats;
  unmatched: Table;
}

export interface MergeFailure {
  success: false;
  error: MergeEngineError;
}

export type MergeResult = MergeSuccess | MergeFailure;

export interface WorkbookMergeSuccess extends MergeSuccess {
  output: Uint8Array;
  fileName: string;
}

export type WorkbookMergeResult = WorkbookMergeSuccess | MergeFailure;

// A finished run and the join it was made with
export interface MergeRun {
  id: number;
  spec: JoinSpec;
  result: WorkbookMergeSuccess;
}

export type StepId = 'upload' | 'config' | 'results';
