import React, { useState } from 'react';
import { Upload, Loader2, FileWarning } from 'lucide-react';
import { readWorkbook, toDataset, hasAcceptedExtension } from '../utils';
import { describeError } from '../errors';
import type { Dataset, TableSource } from '../types';
import { ACCEPTED_EXTENSIONS, MAX_FILE_SIZE_MB } from '../config';
import { Card, Button } from './ui/Components';
import { DataPreview } from './DataPreview';

interface FileUploaderProps {
  source: TableSource;
  title: string;
  description: string;
  dataset: Dataset | null;
  onDataLoaded: (dataset: Dataset | null) => void;
}

/**
 * Checks a picked file before it is read. Returns the message to show, or
 * null when the file may be parsed.
 */
export const checkUpload = (fileName: string, sizeBytes: number): string | null => {
  if (!hasAcceptedExtension(fileName, ACCEPTED_EXTENSIONS)) {
    return `Unsupported file type. Please upload an Excel file (${ACCEPTED_EXTENSIONS.join(', ')}).`;
  }
  const sizeMB = sizeBytes / (1024 * 1024);
  if (sizeMB > MAX_FILE_SIZE_MB) {
    return `File size (${sizeMB.toFixed(1)}MB) exceeds the ${MAX_FILE_SIZE_MB}MB limit.`;
  }
  return null;
};

/**
 * First file of a picker, clearing the input so the same file can be picked
 * again after a failed read.
 */
export const takeFile = (input: { files: ArrayLike<File> | null; value: string }): File | undefined => {
  const file = input.files?.[0];
  input.value = '';
  return file;
};

export const FileUploader: React.FC<FileUploaderProps> = ({ source, title, description, dataset, onDataLoaded }) => {
  const [errorMsg, setErrorMsg] = useState('');
  const [statusMsg, setStatusMsg] = useState('');
  const [isLoading, setIsLoading] = useState(false);
  const inputId = `file-${source.replace(/\s+/g, '-').toLowerCase()}`;

  const handleFile = async (file: File) => {
    setErrorMsg('');
    const rejection = checkUpload(file.name, file.size);
    if (rejection) {
        setErrorMsg(rejection);
        return;
    }

    setIsLoading(true);
    setStatusMsg(`Parsing ${file.name}...`);
    try {
        const bytes = new Uint8Array(await file.arrayBuffer());
        const parsed = readWorkbook(bytes, source);
        if (parsed.success) {
            onDataLoaded(toDataset(parsed.table, file.name, source, file.size));
        } else {
            setErrorMsg(parsed.error.message);
        }
    } catch (e) {
        console.error(`Failed to load ${source}`, e);
        setErrorMsg(`Error reading file: ${describeError(e)}`);
    } finally {
        setIsLoading(false);
        setStatusMsg('');
    }
  };

  const pickFile = (file: File | undefined) => {
    if (file) void handleFile(file);
  };

  return (
    <div className="space-y-4">
      <div>
          <h2 className="text-lg font-bold text-slate-800">{title}</h2>
          <p className="text-slate-500 text-xs mt-1">{description}</p>
      </div>

      {dataset ? (
          <div>
            <div className="flex justify-end mb-2">
                <Button variant="ghost" size="sm" onClick={() => onDataLoaded(null)} className="text-red-500 hover:text-red-600">
                    Replace File
                </Button>
            </div>
            <DataPreview dataset={dataset} />
          </div>
      ) : (
        <Card className="overflow-hidden">
          <div
            className="m-6 border-2 border-dashed border-slate-200 rounded-lg p-8 text-center hover:bg-slate-50 transition-colors"
            onDragOver={(e) => e.preventDefault()}
            onDrop={(e) => {
                e.preventDefault();
                pickFile(e.dataTransfer.files[0]);
            }}
          >
            {isLoading ? (
              <div className="flex flex-col items-center py-4">
                <Loader2 className="animate-spin text-slate-400 mb-2" size={24} />
                <span className="text-slate-500 text-sm">{statusMsg || 'Processing...'}</span>
              </div>
            ) : (
              <>
                <div className="bg-slate-100 w-12 h-12 rounded-full flex items-center justify-center mx-auto mb-3">
                    <Upload className="text-slate-500" size={20} />
                </div>
                <p className="text-slate-900 font-medium mb-1">Click to upload or drag and drop</p>
                <p className="text-slate-500 text-xs mb-1">Excel ({ACCEPTED_EXTENSIONS.join(', ')})</p>
                <p className="text-slate-400 text-[10px] mb-4">Max size: {MAX_FILE_SIZE_MB}MB</p>

                <input
                    type="file"
                    id={inputId}
                    className="hidden"
                    accept={ACCEPTED_EXTENSIONS.join(',')}
                    onChange={(e) => pickFile(takeFile(e.target))}
                />
                <label htmlFor={inputId}>
                    <Button as="span" variant="outline" size="sm" className="cursor-pointer">Select File</Button>
                </label>
              </>
            )}
          </div>

          {errorMsg && (
              <div className="mx-6 mb-6 p-3 bg-red-50 border border-red-200 rounded-md flex items-start gap-2">
                  <FileWarning size={16} className="text-red-500 mt-0.5 shrink-0" />
                  <span className="text-xs text-red-600">{errorMsg}</span>
              </div>
          )}
        </Card>
      )}
    </div>
  );
};
