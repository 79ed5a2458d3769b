import React from 'react';
import type { Dataset } from '../types';
import { Type, Calendar, Hash, CheckSquare } from 'lucide-react';
import { Card, Badge } from './ui/Components';
import { displayValue } from '../utils';
import { PREVIEW_ROWS } from '../config';

const TypeIcon = ({ type }: { type: string }) => {
  switch (type) {
    case 'number': return <Hash size={12} className="text-blue-500" />;
    case 'date': return <Calendar size={12} className="text-purple-500" />;
    case 'boolean': return <CheckSquare size={12} className="text-green-500" />;
    default: return <Type size={12} className="text-slate-400" />;
  }
};

export const DataPreview = ({ dataset }: { dataset: Dataset }) => (
  <Card className="mt-4 overflow-hidden border-slate-200 shadow-sm">
    <div className="bg-slate-50 border-b border-slate-200 px-4 py-3 flex items-center justify-between">
      <div className="flex items-center gap-2">
          <span className="font-semibold text-slate-700 text-sm">{dataset.name}</span>
          <Badge variant="outline">{dataset.source}</Badge>
      </div>
      <div className="flex gap-4 text-xs text-slate-500 font-mono">
          <span>{`${dataset.rowCount.toLocaleString()} Rows`}</span>
          <span>{`${dataset.columns.length} Cols`}</span>
          {dataset.size && <span>{dataset.size}</span>}
      </div>
    </div>

    <div className="overflow-x-auto custom-scrollbar">
      <table className="w-full text-sm text-left">
          <thead className="bg-white border-b border-slate-100">
              <tr>
                  {dataset.columns.map(col => (
                      <th key={col.name} className="px-4 py-3 font-medium text-slate-600 min-w-[120px]">
                          <div className="flex items-center gap-1.5">
                              <TypeIcon type={col.type} />
                              <span>{col.name}</span>
                          </div>
                      </th>
                  ))}
              </tr>
          </thead>
          <tbody className="divide-y divide-slate-50 bg-white">
              {dataset.table.rows.slice(0, PREVIEW_ROWS).map((row, i) => (
                  <tr key={i} className="hover:bg-slate-50/80 transition-colors">
                      {dataset.columns.map(col => (
                          <td key={col.name} className="px-4 py-2.5 text-slate-600 truncate max-w-[200px]">
                              {displayValue(row[col.name])}
                          </td>
                      ))}
                  </tr>
              ))}
          </tbody>
      </table>
      {dataset.rowCount > PREVIEW_ROWS && (
          <div className="px-4 py-2 text-center border-t border-slate-100 bg-slate-50/50">
              <span className="text-xs text-slate-400 italic">{`Showing ${PREVIEW_ROWS} of ${dataset.rowCount} rows`}</span>
          </div>
      )}
    </div>
  </Card>
);
