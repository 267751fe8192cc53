import { useState } from 'react';
import { Loader2, Sparkles, Trash2 } from 'lucide-react';
import SourcePanel from './SourcePanel';
import ModelPanel from './ModelPanel';
import { MODEL_CONFIG } from '../services/providers';
import type { OracleConfig, OracleSession } from '../services/session';
import type { DocumentSource, ProviderName, SourceType } from '../types';

const TABS = ['File Upload', 'Model Selection'] as const;
type Tab = (typeof TABS)[number];

interface SidebarProps {
  session: OracleSession;
  busy?: boolean;
  onInitialize: (config: OracleConfig) => Promise<void>;
  onClear: () => void;
}

function buildSource(sourceType: SourceType, url: string, file: File | null): DocumentSource | null {
  if (sourceType === 'Website' || sourceType === 'Youtube') {
    const trimmed = url.trim();
    return trimmed ? { type: sourceType, url: trimmed } : null;
  }
  return file ? { type: sourceType, file } : null;
}

export default function Sidebar({ session, busy = false, onInitialize, onClear }: SidebarProps) {
  const [activeTab, setActiveTab] = useState<Tab>('File Upload');
  const [sourceType, setSourceType] = useState<SourceType>('Website');
  const [url, setUrl] = useState('');
  const [file, setFile] = useState<File | null>(null);
  const [provider, setProvider] = useState<ProviderName>('Groq');
  const [model, setModel] = useState(MODEL_CONFIG.Groq.models[0]);
  const [apiKey, setApiKey] = useState(session.apiKeyFor('Groq'));
  const [isLoading, setIsLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const source = buildSource(sourceType, url, file);
  const locked = isLoading || busy;

  const handleSourceTypeChange = (type: SourceType) => {
    setSourceType(type);
    setFile(null);
  };

  const handleProviderChange = (next: ProviderName) => {
    setProvider(next);
    setModel(MODEL_CONFIG[next].models[0]);
    setApiKey(session.apiKeyFor(next));
  };

  const handleApiKeyChange = (value: string) => {
    setApiKey(value);
    session.rememberApiKey(provider, value);
  };

  const handleInitialize = async () => {
    if (!source || locked) return;
    setIsLoading(true);
    setError(null);
    try {
      await onInitialize({ provider, model, apiKey, source });
    } catch (err: unknown) {
      console.error('Error initializing Oracle:', err);
      setError(err instanceof Error ? err.message : 'Failed to load the document');
    } finally {
      setIsLoading(false);
    }
  };

  return (
    <div className="h-full flex flex-col bg-gray-900 border-r border-gray-700">
      <div className="flex border-b border-gray-700" role="tablist">
        {TABS.map((tab) => (
          <button
            key={tab}
            role="tab"
            aria-selected={activeTab === tab}
            onClick={() => setActiveTab(tab)}
            className={`flex-1 px-3 py-3 text-sm font-medium transition-colors ${
              activeTab === tab
                ? 'text-white border-b-2 border-blue-500'
                : 'text-gray-400 hover:text-gray-200'
            }`}
          >
            {tab}
          </button>
        ))}
      </div>

      <div className="flex-1 overflow-y-auto p-4">
        {activeTab === 'File Upload' ? (
          <SourcePanel
            sourceType={sourceType}
            onSourceTypeChange={handleSourceTypeChange}
            url={url}
            onUrlChange={setUrl}
            file={file}
            onFileChange={setFile}
            disabled={locked}
          />
        ) : (
          <ModelPanel
            provider={provider}
            onProviderChange={handleProviderChange}
            model={model}
            onModelChange={setModel}
            apiKey={apiKey}
            onApiKeyChange={handleApiKeyChange}
            disabled={locked}
          />
        )}
      </div>

      <div className="p-4 border-t border-gray-700 space-y-2">
        {error && (
          <div role="alert" className="text-sm text-red-300 bg-red-500/10 border border-red-500/40 rounded-lg px-3 py-2">
            {error}
          </div>
        )}
        <button
          onClick={() => void handleInitialize()}
          disabled={!source || locked}
          className="w-full bg-blue-600 hover:bg-blue-700 disabled:bg-gray-700 disabled:cursor-not-allowed text-white px-4 py-2 rounded-lg flex items-center justify-center gap-2"
        >
          {isLoading ? <Loader2 className="animate-spin" size={18} /> : <Sparkles size={18} />}
          <span>Initialize Oracle</span>
        </button>
        <button
          onClick={onClear}
          disabled={busy}
          className="w-full bg-gray-800 hover:bg-gray-700 disabled:opacity-50 disabled:cursor-not-allowed text-white px-4 py-2 rounded-lg flex items-center justify-center gap-2"
        >
          <Trash2 size={18} />
          <span>Clear Conversation History</span>
        </button>
      </div>
    </div>
  );
}
