import React, { useState } from 'react';
import { ChevronDown } from 'lucide-react';
import type { Table } from '../types';
import { Badge, Button } from './ui/Components';
import { displayValue, isMissing } from '../utils';
import { RESULT_PAGE_SIZE } from '../config';

interface ResultsTableProps {
  table: Table;
  keyColumn: string;
  // When set, rows get a Match / No Match badge and the column is highlighted
  targetColumn?: string;
}

export const ResultsTable = ({ table, keyColumn, targetColumn }: ResultsTableProps) => {
  const [visibleRows, setVisibleRows] = useState(RESULT_PAGE_SIZE);

  return (
    <div>
      <div className="overflow-x-auto custom-scrollbar max-h-[600px] border-t border-slate-100">
        <table className="w-full text-sm text-left border-collapse">
            <thead className="bg-white sticky top-0 z-10 shadow-sm">
                <tr>
                    <th className="p-3 border-b text-xs font-bold text-slate-400 uppercase w-10">#</th>
                    {targetColumn && <th className="p-3 border-b text-xs font-bold text-slate-400 uppercase w-24">Status</th>}
                    {table.columns.map(col => (
                        <th key={col} className={`p-3 border-b font-semibold text-slate-700 ${col === targetColumn ? 'bg-slate-50' : 'bg-blue-50/30'}`}>
                            {col}
                            {col === keyColumn && <span className="ml-1 text-xs font-normal text-slate-400">(Key)</span>}
                        </th>
                    ))}
                </tr>
            </thead>
            <tbody className="divide-y divide-slate-100 bg-white">
                {table.rows.slice(0, visibleRows).map((row, i) => {
                    const isMatched = targetColumn !== undefined && !isMissing(row[targetColumn]);
                    return (
                        <tr key={i} className="hover:bg-slate-50">
                            <td className="p-3 text-slate-400 text-xs font-mono">{i + 1}</td>
                            {targetColumn && (
                                <td className="p-3">
                                    {isMatched ? <Badge variant="success">Match</Badge> : <Badge variant="warning">No Match</Badge>}
                                </td>
                            )}
                            {table.columns.map(col => (
                                <td key={col} className={`p-3 text-slate-700 max-w-[200px] truncate ${isMatched && col === targetColumn ? 'bg-green-50/30' : ''}`}>
                                    {displayValue(row[col])}
                                </td>
                            ))}
                        </tr>
                    );
                })}
            </tbody>
        </table>
      </div>

      <div className="p-3 bg-slate-50 border-t border-slate-200 text-center">
        <p className="text-xs text-slate-500 mb-2">
            {`Showing ${Math.min(visibleRows, table.rows.length)} of ${table.rows.length} rows`}
        </p>
        {visibleRows < table.rows.length && (
            <Button variant="outline" size="sm" onClick={() => setVisibleRows(prev => prev + RESULT_PAGE_SIZE * 2)}>
                <ChevronDown size={14} className="mr-1" /> Load More
            </Button>
        )}
      </div>
    </div>
  );
};
