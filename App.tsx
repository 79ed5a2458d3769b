import React, { useRef, useState } from 'react';
import { StepIndicator } from './components/StepIndicator';
import { FileUploader } from './components/FileUploader';
import { MergeResults } from './components/MergeResults';
import type { Dataset, JoinSpec, MergeRun, StepId } from './types';
import { mergeToWorkbook } from './mergeEngine';
import { ProcessLogger } from './logger';
import { describeError } from './errors';
import { DEFAULT_JOIN_SPEC } from './config';
import { ArrowRight, Rocket, TerminalSquare, FileSpreadsheet, ShieldCheck } from 'lucide-react';
import { Alert, Button, Card, CardContent, CardDescription, CardHeader, CardTitle, Input } from './components/ui/Components';

export default function App() {
  const [step, setStep] = useState<StepId>('upload');
  const [tableA, setTableA] = useState<Dataset | null>(null); // Records to enrich
  const [tableB, setTableB] = useState<Dataset | null>(null); // Lookup data
  const [joinSpec, setJoinSpec] = useState<JoinSpec>(DEFAULT_JOIN_SPEC);

  const [run, setRun] = useState<MergeRun | null>(null);
  const [errorMsg, setErrorMsg] = useState('');
  const [processLogs, setProcessLogs] = useState<string[]>([]);
  const runCount = useRef(0);

  const filesReady = tableA !== null && tableB !== null;

  const resetRun = () => {
    setRun(null);
    setErrorMsg('');
    setProcessLogs([]);
  };

  const replaceTable = (setter: (dataset: Dataset | null) => void) => (dataset: Dataset | null) => {
    setter(dataset);
    resetRun();
  };

  const runMerge = () => {
    if (!tableA || !tableB) return;
    resetRun();
    setStep('results');

    const logger = new ProcessLogger();
    const log = logger.scoped('Merge');
    try {
      log.info(`File A: ${tableA.rowCount} rows, ${tableA.columns.length} columns`);
      log.info(`File B: ${tableB.rowCount} rows, ${tableB.columns.length} columns`);

      const result = mergeToWorkbook(tableA.table, tableB.table, joinSpec, { logger: log });
      if (!result.success) {
        setErrorMsg(result.error.message);
        return;
      }

      log.info('Process Complete.');
      runCount.current += 1;
      setRun({ id: runCount.current, spec: joinSpec, result });
    } catch (e) {
      console.error('Merge failed', e);
      log.error(describeError(e));
      setErrorMsg(`An error occurred: ${describeError(e)}`);
    } finally {
      setProcessLogs(logger.getFormattedLines());
    }
  };

  // --- Render Sections ---

  const renderUploadStep = () => (
    <div className="space-y-8">
      <div className="text-center space-y-2 mb-8">
        <h2 className="text-2xl font-bold text-slate-800">Excel File Merger</h2>
        <p className="text-slate-500 max-w-2xl mx-auto text-sm leading-relaxed">
           Add a column from one spreadsheet to another by matching rows on a shared reference column.
        </p>
      </div>

      <div className="grid grid-cols-1 lg:grid-cols-2 gap-8">
        <FileUploader
            source="File A"
            title="File A"
            description="Your handpicked/filtered file. Every row is kept."
            dataset={tableA}
            onDataLoaded={replaceTable(setTableA)}
        />
        <FileUploader
            source="File B"
            title="File B (Full Data)"
            description="The full data file holding the reference column and the column to add."
            dataset={tableB}
            onDataLoaded={replaceTable(setTableB)}
        />
      </div>

      <div className="flex justify-center pt-8 border-t border-slate-100">
        {filesReady ? (
          <Button onClick={() => setStep('config')} size="lg" className="w-full md:w-auto px-12 gap-2">
              Configure Merge <ArrowRight size={18} />
          </Button>
        ) : (
          <Alert variant="info">Please upload both files to enable processing</Alert>
        )}
      </div>
    </div>
  );

  const renderConfigStep = () => {
    const suggestionsA = tableA?.columns.map(c => c.name) ?? [];
    const suggestionsB = tableB?.columns.map(c => c.name) ?? [];

    return (
      <div className="space-y-6 max-w-3xl mx-auto pb-12">
        <Card>
          <CardHeader>
              <CardTitle>Configuration</CardTitle>
              <CardDescription>
                  Rows are matched on the reference column. The first matching row of File B wins.
              </CardDescription>
          </CardHeader>
          <CardContent>
              <div className="grid grid-cols-1 md:grid-cols-2 gap-4">
                  <Input
                      id="reference-column"
                      label="Reference Column"
                      hint="Column to merge on"
                      value={joinSpec.referenceColumn}
                      suggestions={suggestionsA}
                      onChange={e => setJoinSpec(prev => ({ ...prev, referenceColumn: e.target.value }))}
                  />
                  <Input
                      id="target-column"
                      label="Column to Add"
                      hint="Column to add from File B"
                      value={joinSpec.targetColumn}
                      suggestions={suggestionsB}
                      onChange={e => setJoinSpec(prev => ({ ...prev, targetColumn: e.target.value }))}
                  />
              </div>
          </CardContent>
        </Card>

        <div className="flex justify-between pt-6 border-t border-slate-200">
          <Button variant="ghost" onClick={() => setStep('upload')}>Back</Button>
          <Button onClick={runMerge} disabled={!filesReady} size="lg" className="gap-2">
              <Rocket size={18} /> Start Processing
          </Button>
        </div>
      </div>
    );
  };

  const renderResultsStep = () => (
    <div className="space-y-6 pb-12">
       {/* Process Log */}
       <Card className="bg-slate-900 border-slate-800 text-slate-300 overflow-hidden shadow-xl">
           <div className="p-3 border-b border-slate-800 flex items-center gap-2">
               <TerminalSquare size={16} />
               <span className="text-xs font-mono font-bold text-slate-400">System Log</span>
           </div>
           <div className="p-4 font-mono text-xs h-32 overflow-y-auto custom-scrollbar flex flex-col gap-1">
               {processLogs.length === 0 && <span className="text-slate-600 italic">Ready...</span>}
               {processLogs.map((line, i) => <div key={i} className="text-green-400">{line}</div>)}
           </div>
       </Card>

       {errorMsg && (
           <div className="space-y-2">
               <Alert>{errorMsg}</Alert>
               <Alert variant="info">Please make sure your files are valid Excel files and contain the specified columns.</Alert>
           </div>
       )}

       {run && <MergeResults key={run.id} run={run} />}

       <div className="flex justify-center pt-8">
          <Button variant="ghost" onClick={() => setStep('config')}>Adjust Configuration</Button>
       </div>
    </div>
  );

  return (
    <div className="min-h-screen bg-slate-50/50 text-slate-900 pb-20 font-sans flex flex-col">
      <header className="bg-white border-b border-slate-200 sticky top-0 z-50">
        <div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8">
            <div className="flex justify-between items-center h-16">
                <div className="flex items-center gap-2">
                    <div className="bg-slate-900 text-white p-1.5 rounded-lg shadow-sm">
                        <FileSpreadsheet size={20} className="text-white" />
                    </div>
                    <h1 className="text-lg font-bold tracking-tight text-slate-900">
                        Sheet Merger
                    </h1>
                </div>
                <div className="hidden md:flex items-center gap-2 text-[10px] bg-green-50 text-green-700 px-3 py-1.5 rounded-full border border-green-100">
                    <ShieldCheck size={12} />
                    <span className="font-medium">Client-Side Processing • No Data Stored</span>
                </div>
            </div>
        </div>
      </header>

      <StepIndicator
        currentStep={step}
        onStepChange={setStep}
        canConfigure={filesReady}
        hasResults={run !== null || errorMsg !== ''}
      />

      <main className="flex-grow max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 mt-8 w-full">
        {step === 'upload' && renderUploadStep()}
        {step === 'config' && renderConfigStep()}
        {step === 'results' && renderResultsStep()}
      </main>
    </div>
  );
}
