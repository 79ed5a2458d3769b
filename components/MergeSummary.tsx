import React from 'react';
import { BarChart, Bar, XAxis, YAxis, Tooltip, ResponsiveContainer, Cell } from 'recharts';
import type { MergeStats } from '../types';
import { Card, CardContent } from './ui/Components';

export const matchRate = (stats: MergeStats): string =>
  stats.totalRows === 0 ? '0.0' : ((stats.matchedRows / stats.totalRows) * 100).toFixed(1);

export const MergeSummary = ({ stats }: { stats: MergeStats }) => (
  <div className="grid grid-cols-1 md:grid-cols-3 gap-4">
      <Card>
          <CardContent className="flex flex-col items-center justify-center py-6">
              <span className="text-slate-500 text-xs uppercase tracking-wider font-semibold">Total Rows</span>
              <span className="text-3xl font-bold text-slate-900 mt-1">{stats.totalRows.toLocaleString()}</span>
          </CardContent>
      </Card>
      <Card className="bg-green-50/50 border-green-100">
          <CardContent className="flex flex-col items-center justify-center py-6">
              <span className="text-green-600 text-xs uppercase tracking-wider font-semibold">Matched Records</span>
              <span className="text-3xl font-bold text-green-700 mt-1">{stats.matchedRows.toLocaleString()}</span>
              <span className="text-xs text-green-600 mt-1 font-medium">{`${matchRate(stats)}% Match Rate`}</span>
          </CardContent>
      </Card>
      <Card className="bg-amber-50/50 border-amber-100">
          <CardContent className="flex flex-col items-center justify-center py-6">
              <span className="text-amber-600 text-xs uppercase tracking-wider font-semibold">Unmatched Records</span>
              <span className="text-3xl font-bold text-amber-700 mt-1">{stats.unmatchedRows.toLocaleString()}</span>
          </CardContent>
      </Card>
  </div>
);

export const MatchChart = ({ stats }: { stats: MergeStats }) => {
  const data = [
    { name: 'Matched', value: stats.matchedRows, color: '#16a34a' },
    { name: 'Unmatched', value: stats.unmatchedRows, color: '#d97706' },
  ];
  return (
    <Card>
      <CardContent className="h-48 pt-6">
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={data} layout="vertical" margin={{ left: 24 }}>
            <XAxis type="number" allowDecimals={false} />
            <YAxis type="category" dataKey="name" />
            <Tooltip />
            <Bar dataKey="value" radius={[0, 4, 4, 0]}>
              {data.map(entry => <Cell key={entry.name} fill={entry.color} />)}
            </Bar>
          </BarChart>
        </ResponsiveContainer>
      </CardContent>
    </Card>
  );
};
