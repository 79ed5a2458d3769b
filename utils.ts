import * as XLSX from 'xlsx';
import type { CellValue, ColumnDef, DataType, Dataset, Table, TableSource } from './types';
import { ParseError, SerializationError, describeError } from './errors';
import { MISSING_MARKERS, OUTPUT_SHEET_NAME, XLSX_MIME_TYPE } from './config';

// --- Cells ---

export const isMissing = (value: CellValue | undefined): value is null | undefined =>
  value === null || value === undefined;

export const normalizeCell = (value: unknown): CellValue => {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return MISSING_MARKERS.has(value) ? null : value;
  if (typeof value === 'number') return Number.isNaN(value) ? null : value;
  if (typeof value === 'boolean') return value;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  return String(value);
};

export const displayValue = (value: CellValue | undefined): string => {
  if (isMissing(value)) return '';
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  return String(value);
};

// --- Type Inference ---

export const inferType = (value: CellValue): DataType => {
  if (value === null) return 'text';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'boolean') return 'boolean';
  if (value instanceof Date) return 'date';
  if (!isNaN(Number(value)) && value.trim() !== '') return 'number';
  if (value.match(/^\d{4}-\d{2}-\d{2}$/) || value.match(/^\d{1,2}\/\d{1,2}\/\d{4}$/)) return 'date';
  if (value.toLowerCase() === 'true' || value.toLowerCase() === 'false') return 'boolean';
  return 'text';
};

export const describeColumns = (table: Table): ColumnDef[] =>
  table.columns.map(name => {
    const sample = table.rows.find(row => !isMissing(row[name]));
    return { name, type: inferType(sample ? sample[name] : null) };
  });

// --- Headers ---

/**
 * Header names for the first sheet row. Blank cells become `Unnamed: <index>`;
 * a repeated name gets `.1`, `.2`, ... and a suffixed name that is itself
 * taken is suffixed again.
 */
export const buildHeaders = (cells: unknown[], width: number): string[] => {
  // Missing-value markers apply to data cells only; a header titled "NA" keeps its name
  const names = Array.from({ length: width }, (_, idx) => {
    const cell = cells[idx];
    const name = typeof cell === 'string' ? cell : displayValue(normalizeCell(cell));
    return name === '' ? `Unnamed: ${idx}` : name;
  });

  const counts = new Map<string, number>();
  return names.map(name => {
    let col = name;
    let count = counts.get(col) ?? 0;
    while (count > 0) {
      counts.set(col, count + 1);
      col = `${col}.${count}`;
      count = counts.get(col) ?? 0;
    }
    counts.set(col, count + 1);
    return col;
  });
};

// --- Parsers ---

const XLSX_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];
const XLS_SIGNATURE = [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1];

const startsWith = (bytes: Uint8Array, signature: number[]): boolean =>
  bytes.length >= signature.length && signature.every((byte, idx) => bytes[idx] === byte);

export const isWorkbookBytes = (bytes: Uint8Array): boolean =>
  startsWith(bytes, XLSX_SIGNATURE) || startsWith(bytes, XLS_SIGNATURE);

export type ParseResult = { success: true; table: Table } | { success: false; error: ParseError };

/**
 * Read the first sheet of an .xlsx/.xls workbook into a Table. The first
 * non-blank row is the header; blank rows are dropped.
 */
export const readWorkbook = (bytes: Uint8Array, source: TableSource): ParseResult => {
  if (!isWorkbookBytes(bytes)) {
    return { success: false, error: new ParseError(source, 'not an Excel workbook (.xlsx or .xls)') };
  }

  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(bytes, { type: 'array', cellDates: true });
  } catch (e) {
    return { success: false, error: new ParseError(source, describeError(e), { cause: e }) };
  }

  const sheetName = workbook.SheetNames[0];
  const worksheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!worksheet) {
    return { success: false, error: new ParseError(source, 'the workbook has no sheets') };
  }

  const grid = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
    header: 1,
    defval: null,
    blankrows: false,
    raw: true,
  });
  if (grid.length === 0) {
    return { success: false, error: new ParseError(source, `sheet '${sheetName}' has no header row`) };
  }

  const [headerCells, ...body] = grid;
  const width = grid.reduce((max, cells) => Math.max(max, cells.length), 0);
  const columns = buildHeaders(headerCells, width);

  const rows = body.map(cells =>
    Object.fromEntries(columns.map((col, idx): [string, CellValue] => [col, normalizeCell(cells[idx])]))
  );

  return { success: true, table: { columns, rows } };
};

export const formatFileSize = (bytes: number): string => {
  const sizeMB = bytes / (1024 * 1024);
  return sizeMB < 1 ? `${(bytes / 1024).toFixed(1)} KB` : `${sizeMB.toFixed(1)} MB`;
};

export const toDataset = (table: Table, name: string, source: TableSource, rawSize: number): Dataset => ({
  name,
  source,
  columns: describeColumns(table),
  table,
  rowCount: table.rows.length,
  size: formatFileSize(rawSize),
  rawSize,
});

export const hasAcceptedExtension = (fileName: string, extensions: string[]): boolean => {
  const lower = fileName.toLowerCase();
  return extensions.some(ext => lower.endsWith(ext));
};

// --- Export Utils ---

export type WriteResult = { success: true; bytes: Uint8Array } | { success: false; error: SerializationError };

/**
 * Write a Table as a single-sheet .xlsx workbook: header row, then data rows
 * in table order. Missing values are left as empty cells.
 */
export const writeWorkbook = (table: Table, sheetName: string = OUTPUT_SHEET_NAME): WriteResult => {
  try {
    // json_to_sheet appends unseen keys to the header array it is given
    const worksheet = XLSX.utils.json_to_sheet(table.rows, { header: [...table.columns], cellDates: true });
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, worksheet, sheetName);
    const output: ArrayBuffer = XLSX.write(workbook, { type: 'array', bookType: 'xlsx' });
    return { success: true, bytes: new Uint8Array(output) };
  } catch (e) {
    return { success: false, error: new SerializationError(describeError(e), { cause: e }) };
  }
};

export const downloadWorkbook = (bytes: Uint8Array, filename: string) => {
  const blob = new Blob([bytes.slice()], { type: XLSX_MIME_TYPE });
  const url = URL.createObjectURL(blob);
  const a = document.createElement('a');
  a.href = url;
  a.download = filename;
  document.body.appendChild(a);
  a.click();
  document.body.removeChild(a);
  URL.revokeObjectURL(url);
};
