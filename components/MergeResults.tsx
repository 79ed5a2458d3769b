import React, { useState } from 'react';
import { FileSpreadsheet, Download, ChevronDown, AlertCircle } from 'lucide-react';
import type { MergeRun } from '../types';
import { Button, Card } from './ui/Components';
import { MergeSummary, MatchChart } from './MergeSummary';
import { ResultsTable } from './ResultsTable';
import { downloadWorkbook } from '../utils';

interface MergeResultsProps {
  run: MergeRun;
}

/**
 * Everything shown for one finished run. Columns are labelled from the run's
 * own join, not from the configuration form, which may have changed since.
 */
export const MergeResults = ({ run }: MergeResultsProps) => {
  const [showUnmatched, setShowUnmatched] = useState(false);
  const { result, spec } = run;

  return (
    <>
      <MergeSummary stats={result.stats} />
      <MatchChart stats={result.stats} />

      <Card className="overflow-hidden border-slate-200 shadow-md">
          <div className="p-3 flex justify-between items-center bg-slate-50 px-4 gap-2">
              <span className="flex items-center gap-2 text-sm font-semibold text-slate-700">
                  <FileSpreadsheet size={16} /> Merged Data Preview
              </span>
              <Button size="sm" onClick={() => downloadWorkbook(result.output, result.fileName)}>
                  <Download size={14} className="mr-1" /> {`Download ${result.fileName}`}
              </Button>
          </div>
          <ResultsTable table={result.merged} keyColumn={spec.referenceColumn} targetColumn={spec.targetColumn} />
      </Card>

      {result.stats.unmatchedRows > 0 && (
          <Card className="overflow-hidden">
              <button
                  onClick={() => setShowUnmatched(prev => !prev)}
                  className="w-full p-4 flex items-center gap-2 text-sm font-medium text-amber-700 hover:bg-amber-50"
              >
                  <AlertCircle size={16} />
                  {`View ${result.stats.unmatchedRows} Unmatched Records`}
                  <ChevronDown size={16} className={`ml-auto transition-transform ${showUnmatched ? 'rotate-180' : ''}`} />
              </button>
              {showUnmatched && <ResultsTable table={result.unmatched} keyColumn={spec.referenceColumn} />}
          </Card>
      )}
    </>
  );
};
