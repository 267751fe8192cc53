import { Upload, FileText } from 'lucide-react';
import { SOURCE_TYPES, isSourceType, type FileSourceType, type SourceType } from '../types';

interface SourcePanelProps {
  sourceType: SourceType;
  onSourceTypeChange: (type: SourceType) => void;
  url: string;
  onUrlChange: (url: string) => void;
  file: File | null;
  onFileChange: (file: File | null) => void;
  disabled?: boolean;
}

const URL_LABELS = {
  Website: 'Enter the website URL',
  Youtube: 'Enter the video URL',
} as const;

const UPLOAD_OPTIONS: Record<FileSourceType, { label: string; accept: string }> = {
  Pdf: { label: 'Upload a PDF file', accept: '.pdf' },
  Csv: { label: 'Upload a CSV file', accept: '.csv' },
  Txt: { label: 'Upload a TXT file', accept: '.txt' },
};

export default function SourcePanel({
  sourceType,
  onSourceTypeChange,
  url,
  onUrlChange,
  file,
  onFileChange,
  disabled,
}: SourcePanelProps) {
  const handleFileUpload = (event: React.ChangeEvent<HTMLInputElement>) => {
    onFileChange(event.target.files?.[0] ?? null);
  };

  return (
    <div className="space-y-4">
      <div>
        <label htmlFor="source-type" className="block text-sm font-medium text-gray-300 mb-2">
          Select file type
        </label>
        <select
          id="source-type"
          value={sourceType}
          disabled={disabled}
          onChange={(e) => {
            if (isSourceType(e.target.value)) onSourceTypeChange(e.target.value);
          }}
          className="w-full bg-gray-800 border border-gray-700 rounded-lg px-3 py-2 text-white focus:outline-none focus:border-blue-500"
        >
          {SOURCE_TYPES.map((type) => (
            <option key={type} value={type}>
              {type}
            </option>
          ))}
        </select>
      </div>

      {sourceType === 'Website' || sourceType === 'Youtube' ? (
        <div>
          <label htmlFor="source-url" className="block text-sm font-medium text-gray-300 mb-2">
            {URL_LABELS[sourceType]}
          </label>
          <input
            id="source-url"
            type="url"
            value={url}
            disabled={disabled}
            onChange={(e) => onUrlChange(e.target.value)}
            placeholder="https://..."
            className="w-full bg-gray-800 border border-gray-700 rounded-lg px-3 py-2 text-white focus:outline-none focus:border-blue-500"
          />
        </div>
      ) : (
        <div>
          <label htmlFor="source-file" className="block text-sm font-medium text-gray-300 mb-2">
            {UPLOAD_OPTIONS[sourceType].label}
          </label>
          <label className="block">
            <input
              id="source-file"
              key={sourceType}
              type="file"
              onChange={handleFileUpload}
              disabled={disabled}
              className="hidden"
              accept={UPLOAD_OPTIONS[sourceType].accept}
            />
            <div className="bg-gray-800 hover:bg-gray-700 border border-dashed border-gray-600 text-gray-200 px-4 py-3 rounded-lg cursor-pointer flex items-center justify-center gap-2">
              {file ? (
                <>
                  <FileText size={18} className="text-blue-400" />
                  <span className="text-sm truncate">{file.name}</span>
                </>
              ) : (
                <>
                  <Upload size={18} />
                  <span className="text-sm">Browse files</span>
                </>
              )}
            </div>
          </label>
        </div>
      )}
    </div>
  );
}
