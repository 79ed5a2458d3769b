import type { JoinSpec } from './types';

// --- Join Defaults ---

export const DEFAULT_JOIN_SPEC: JoinSpec = {
  referenceColumn: 'email',
  targetColumn: 'state',
};

// --- Output ---

export const OUTPUT_SHEET_NAME = 'Merged_Data';
export const OUTPUT_FILE_NAME = 'Games_State.xlsx';
export const XLSX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

// --- Uploads ---

export const ACCEPTED_EXTENSIONS = ['.xlsx', '.xls'];
export const MAX_FILE_SIZE_MB = 100;

// --- Display ---

export const PREVIEW_ROWS = 5;
export const RESULT_PAGE_SIZE = 50;

// Cell text read as a missing value
export const MISSING_MARKERS: ReadonlySet<string> = new Set([
  '',
  '#N/A',
  '#N/A N/A',
  '#NA',
  '-1.#IND',
  '-1.#QNAN',
  '-NaN',
  '-nan',
  '1.#IND',
  '1.#QNAN',
  '<NA>',
  'N/A',
  'NA',
  'NULL',
  'NaN',
  'None',
  'n/a',
  'nan',
  'null',
]);
