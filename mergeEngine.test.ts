import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import {
  computeStats,
  deduplicate,
  leftJoin,
  mergeTables,
  mergeToWorkbook,
  mergeWorkbooks,
  projectColumns,
  selectUnmatched,
  validateJoinSpec,
} from './mergeEngine';
import { MissingColumnError, ParseError } from './errors';
import { ProcessLogger } from './logger';
import { readWorkbook } from './utils';
import type { Table } from './types';

const fileA: Table = {
  columns: ['email', 'name'],
  rows: [
    { email: 'a@x.com', name: 'A' },
    { email: 'b@x.com', name: 'B' },
  ],
};

const fileB: Table = {
  columns: ['email', 'state'],
  rows: [
    { email: 'a@x.com', state: 'CA' },
    { email: 'a@x.com', state: 'NY' },
    { email: 'c@x.com', state: 'TX' },
  ],
};

const spec = { referenceColumn: 'email', targetColumn: 'state' };

const toBytes = (aoa: unknown[][]): Uint8Array => {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(aoa), 'Sheet1');
  return new Uint8Array(XLSX.write(workbook, { type: 'array', bookType: 'xlsx' }));
};

describe('validateJoinSpec', () => {
  it('accepts columns present in both files', () => {
    expect(validateJoinSpec(fileA, fileB, spec)).toBeNull();
  });

  it('reports a reference column missing from File A', () => {
    const error = validateJoinSpec(fileA, fileB, { referenceColumn: 'id', targetColumn: 'state' });
    expect(error).toBeInstanceOf(MissingColumnError);
    expect(error?.column).toBe('id');
    expect(error?.source).toBe('File A');
    expect(error?.message).toBe("Column 'id' not found in File A");
  });

  it('checks File A before File B when both lack the reference column', () => {
    const noEmailB: Table = { columns: ['mail', 'state'], rows: [] };
    const noEmailA: Table = { columns: ['mail', 'name'], rows: [] };
    expect(validateJoinSpec(noEmailA, noEmailB, spec)?.source).toBe('File A');
  });

  it('checks the reference column in File B before the target column', () => {
    const bareB: Table = { columns: ['other'], rows: [] };
    const error = validateJoinSpec(fileA, bareB, spec);
    expect(error?.message).toBe("Column 'email' not found in File B");
  });

  it('reports a target column missing from File B last', () => {
    const noState: Table = { columns: ['email', 'region'], rows: [] };
    const error = validateJoinSpec(fileA, noState, spec);
    expect(error?.column).toBe('state');
    expect(error?.source).toBe('File B');
  });
});

describe('deduplicate', () => {
  it('keeps the first row for each key', () => {
    expect(deduplicate(fileB, 'email').rows).toEqual([
      { email: 'a@x.com', state: 'CA' },
      { email: 'c@x.com', state: 'TX' },
    ]);
  });

  it('treats missing keys as one key', () => {
    const table: Table = {
      columns: ['email', 'state'],
      rows: [
        { email: null, state: 'WA' },
        { email: 'a@x.com', state: 'CA' },
        { email: null, state: 'OR' },
      ],
    };
    expect(deduplicate(table, 'email').rows).toEqual([
      { email: null, state: 'WA' },
      { email: 'a@x.com', state: 'CA' },
    ]);
  });

  it('does not coerce key types', () => {
    const table: Table = { columns: ['id'], rows: [{ id: 5 }, { id: '5' }, { id: 5 }] };
    expect(deduplicate(table, 'id').rows).toEqual([{ id: 5 }, { id: '5' }]);
  });

  it('compares dates by timestamp', () => {
    const table: Table = {
      columns: ['day'],
      rows: [{ day: new Date(Date.UTC(2024, 0, 1)) }, { day: new Date(Date.UTC(2024, 0, 1)) }],
    };
    expect(deduplicate(table, 'day').rows).toHaveLength(1);
  });

  it('is idempotent', () => {
    const once = deduplicate(fileB, 'email');
    expect(deduplicate(once, 'email')).toEqual(once);
  });
});

describe('projectColumns', () => {
  it('keeps the requested columns in file order', () => {
    const wide: Table = {
      columns: ['state', 'zip', 'email'],
      rows: [{ state: 'CA', zip: '90001', email: 'a@x.com' }],
    };
    expect(projectColumns(wide, ['email', 'state'])).toEqual({
      columns: ['state', 'email'],
      rows: [{ state: 'CA', email: 'a@x.com' }],
    });
  });
});

describe('leftJoin', () => {
  it('adds the target column to every primary row', () => {
    const merged = leftJoin(fileA, deduplicate(fileB, 'email'), 'email', 'state');
    expect(merged).toEqual({
      columns: ['email', 'name', 'state'],
      rows: [
        { email: 'a@x.com', name: 'A', state: 'CA' },
        { email: 'b@x.com', name: 'B', state: null },
      ],
    });
  });

  it('never duplicates or drops primary rows', () => {
    const primary: Table = {
      columns: ['email'],
      rows: [{ email: 'a@x.com' }, { email: 'a@x.com' }, { email: 'z@x.com' }],
    };
    const merged = leftJoin(primary, deduplicate(fileB, 'email'), 'email', 'state');
    expect(merged.rows).toHaveLength(primary.rows.length);
    expect(merged.rows.map(row => row.state)).toEqual(['CA', 'CA', null]);
  });

  it('does not match a number key against a string key', () => {
    const primary: Table = { columns: ['id'], rows: [{ id: 5 }, { id: '7' }] };
    const secondary: Table = { columns: ['id', 'state'], rows: [{ id: '5', state: 'CA' }, { id: '7', state: 'NY' }] };
    expect(leftJoin(primary, secondary, 'id', 'state').rows).toEqual([
      { id: 5, state: null },
      { id: '7', state: 'NY' },
    ]);
  });

  it('matches a missing key against the missing-key row', () => {
    const primary: Table = { columns: ['email'], rows: [{ email: null }] };
    const secondary: Table = { columns: ['email', 'state'], rows: [{ email: null, state: 'WA' }] };
    expect(leftJoin(primary, secondary, 'email', 'state').rows).toEqual([{ email: null, state: 'WA' }]);
  });

  it('replaces an existing target column in place', () => {
    const primary: Table = {
      columns: ['state', 'email'],
      rows: [{ state: 'old', email: 'a@x.com' }, { state: 'old', email: 'q@x.com' }],
    };
    const merged = leftJoin(primary, deduplicate(fileB, 'email'), 'email', 'state');
    expect(merged.columns).toEqual(['state', 'email']);
    expect(merged.rows).toEqual([
      { state: 'CA', email: 'a@x.com' },
      { state: null, email: 'q@x.com' },
    ]);
  });

  it('leaves the key untouched when joining a column onto itself', () => {
    const merged = leftJoin(fileA, projectColumns(fileB, ['email']), 'email', 'email');
    expect(merged).toEqual(fileA);
  });

  it('does not mutate its inputs', () => {
    const before = JSON.stringify(fileA);
    leftJoin(fileA, fileB, 'email', 'state');
    expect(JSON.stringify(fileA)).toBe(before);
  });
});

describe('computeStats', () => {
  it('counts matched and unmatched rows', () => {
    const merged = leftJoin(fileA, deduplicate(fileB, 'email'), 'email', 'state');
    expect(computeStats(merged, 'state')).toEqual({ totalRows: 2, matchedRows: 1, unmatchedRows: 1 });
  });

  it('counts a matched row with an empty target as unmatched', () => {
    const secondary: Table = { columns: ['email', 'state'], rows: [{ email: 'a@x.com', state: null }] };
    const stats = computeStats(leftJoin(fileA, secondary, 'email', 'state'), 'state');
    expect(stats).toEqual({ totalRows: 2, matchedRows: 0, unmatchedRows: 2 });
  });
});

describe('selectUnmatched', () => {
  it('returns unmatched rows without the target column', () => {
    const merged = leftJoin(fileA, deduplicate(fileB, 'email'), 'email', 'state');
    expect(selectUnmatched(merged, 'state')).toEqual({
      columns: ['email', 'name'],
      rows: [{ email: 'b@x.com', name: 'B' }],
    });
  });
});

describe('mergeTables', () => {
  it('merges the two-file scenario', () => {
    const result = mergeTables(fileA, fileB, spec);
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.merged.rows).toEqual([
      { email: 'a@x.com', name: 'A', state: 'CA' },
      { email: 'b@x.com', name: 'B', state: null },
    ]);
    expect(result.stats).toEqual({ totalRows: 2, matchedRows: 1, unmatchedRows: 1 });
    expect(result.unmatched.rows).toEqual([{ email: 'b@x.com', name: 'B' }]);
  });

  it('handles an empty File A', () => {
    const empty: Table = { columns: ['email', 'name'], rows: [] };
    const result = mergeTables(empty, fileB, spec);
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.merged).toEqual({ columns: ['email', 'name', 'state'], rows: [] });
    expect(result.stats).toEqual({ totalRows: 0, matchedRows: 0, unmatchedRows: 0 });
  });

  it('drops File B columns other than the key and target', () => {
    const wideB: Table = {
      columns: ['email', 'state', 'name'],
      rows: [{ email: 'a@x.com', state: 'CA', name: 'from B' }],
    };
    const result = mergeTables(fileA, wideB, spec);
    expect(result.success && result.merged.rows[0]).toEqual({ email: 'a@x.com', name: 'A', state: 'CA' });
  });

  it('returns the validation error and no output', () => {
    const result = mergeTables(fileA, fileB, { referenceColumn: 'id', targetColumn: 'state' });
    expect(result).toEqual({ success: false, error: expect.any(MissingColumnError) });
  });

  it('logs each step through the given logger', () => {
    const logger = new ProcessLogger(false);
    mergeTables(fileA, fileB, spec, logger.scoped('Merge'));
    expect(logger.getEntries().map(entry => entry.message)).toEqual([
      'Columns validated',
      'Removed 1 duplicate rows from File B',
      'Joined 2 rows from File A',
    ]);
  });

  it('warns when File A already has the target column', () => {
    const logger = new ProcessLogger(false);
    const withState: Table = { columns: ['email', 'state'], rows: [{ email: 'a@x.com', state: 'old' }] };
    mergeTables(withState, fileB, spec, logger.scoped('Merge'));
    const warnings = logger.getEntries().filter(entry => entry.level === 'WARN');
    expect(warnings.map(entry => entry.message)).toEqual([
      "File A already has a 'state' column; its values will be replaced",
    ]);
  });
});

describe('mergeToWorkbook', () => {
  it('merges parsed tables and writes the workbook', () => {
    const logger = new ProcessLogger(false);
    const result = mergeToWorkbook(fileA, fileB, spec, { logger: logger.scoped('Merge') });
    expect(result.success).toBe(true);
    if (!result.success) return;

    expect(result.fileName).toBe('Games_State.xlsx');
    expect(result.stats).toEqual({ totalRows: 2, matchedRows: 1, unmatchedRows: 1 });
    expect(readWorkbook(result.output, 'File A')).toEqual({ success: true, table: result.merged });
    expect(logger.getEntries().map(entry => entry.message)).toEqual([
      'Columns validated',
      'Removed 1 duplicate rows from File B',
      'Joined 2 rows from File A',
      'Wrote Games_State.xlsx',
    ]);
  });

  it('writes nothing when validation fails', () => {
    const result = mergeToWorkbook(fileA, fileB, { referenceColumn: 'email', targetColumn: 'county' });
    expect(result).toEqual({ success: false, error: expect.any(MissingColumnError) });
  });
});

describe('mergeWorkbooks', () => {
  const bytesA = toBytes([
    ['email', 'name'],
    ['a@x.com', 'A'],
    ['b@x.com', 'B'],
  ]);
  const bytesB = toBytes([
    ['email', 'state', 'zip'],
    ['a@x.com', 'CA', 90001],
    ['a@x.com', 'NY', 10001],
    ['c@x.com', 'TX', 73301],
  ]);

  it('writes the merged table to a Merged_Data sheet', () => {
    const result = mergeWorkbooks(bytesA, bytesB, spec);
    expect(result.success).toBe(true);
    if (!result.success) return;

    expect(result.fileName).toBe('Games_State.xlsx');
    expect(result.stats).toEqual({ totalRows: 2, matchedRows: 1, unmatchedRows: 1 });
    expect(XLSX.read(result.output, { type: 'array' }).SheetNames).toEqual(['Merged_Data']);

    const reread = readWorkbook(result.output, 'File A');
    expect(reread).toEqual({
      success: true,
      table: {
        columns: ['email', 'name', 'state'],
        rows: [
          { email: 'a@x.com', name: 'A', state: 'CA' },
          { email: 'b@x.com', name: 'B', state: null },
        ],
      },
    });
  });

  it('honours a custom sheet and file name', () => {
    const result = mergeWorkbooks(bytesA, bytesB, spec, { sheetName: 'Out', fileName: 'out.xlsx' });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.fileName).toBe('out.xlsx');
    expect(XLSX.read(result.output, { type: 'array' }).SheetNames).toEqual(['Out']);
  });

  it('reports which file could not be parsed', () => {
    const garbage = new TextEncoder().encode('email,state\na@x.com,CA');

    const badA = mergeWorkbooks(garbage, bytesB, spec);
    expect(badA.success).toBe(false);
    if (badA.success) return;
    expect(badA.error).toBeInstanceOf(ParseError);
    expect(badA.error.message).toBe('Could not read File A: not an Excel workbook (.xlsx or .xls)');

    const badB = mergeWorkbooks(bytesA, garbage, spec);
    expect(!badB.success && badB.error.message).toBe('Could not read File B: not an Excel workbook (.xlsx or .xls)');
  });

  it('reports a missing column found after parsing', () => {
    const result = mergeWorkbooks(bytesA, bytesB, { referenceColumn: 'email', targetColumn: 'county' });
    expect(!result.success && result.error.message).toBe("Column 'county' not found in File B");
  });
});
