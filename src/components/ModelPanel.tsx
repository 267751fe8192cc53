import { MODEL_CONFIG, PROVIDERS } from '../services/providers';
import type { ProviderName } from '../types';

interface ModelPanelProps {
  provider: ProviderName;
  onProviderChange: (provider: ProviderName) => void;
  model: string;
  onModelChange: (model: string) => void;
  apiKey: string;
  onApiKeyChange: (apiKey: string) => void;
  disabled?: boolean;
}

export default function ModelPanel({
  provider,
  onProviderChange,
  model,
  onModelChange,
  apiKey,
  onApiKeyChange,
  disabled,
}: ModelPanelProps) {
  return (
    <div className="space-y-4">
      <div>
        <label htmlFor="model-provider" className="block text-sm font-medium text-gray-300 mb-2">
          Select model provider
        </label>
        <select
          id="model-provider"
          value={provider}
          disabled={disabled}
          onChange={(e) => {
            const next = PROVIDERS.find((p) => p === e.target.value);
            if (next) onProviderChange(next);
          }}
          className="w-full bg-gray-800 border border-gray-700 rounded-lg px-3 py-2 text-white focus:outline-none focus:border-blue-500"
        >
          {PROVIDERS.map((p) => (
            <option key={p} value={p}>
              {p}
            </option>
          ))}
        </select>
      </div>

      <div>
        <label htmlFor="model-id" className="block text-sm font-medium text-gray-300 mb-2">
          Select model
        </label>
        <select
          id="model-id"
          value={model}
          disabled={disabled}
          onChange={(e) => onModelChange(e.target.value)}
          className="w-full bg-gray-800 border border-gray-700 rounded-lg px-3 py-2 text-white focus:outline-none focus:border-blue-500"
        >
          {MODEL_CONFIG[provider].models.map((m) => (
            <option key={m} value={m}>
              {m}
            </option>
          ))}
        </select>
      </div>

      <div>
        <label htmlFor="model-api-key" className="block text-sm font-medium text-gray-300 mb-2">
          Enter the API key for {provider}
        </label>
        <input
          id="model-api-key"
          type="password"
          value={apiKey}
          disabled={disabled}
          onChange={(e) => onApiKeyChange(e.target.value)}
          className="w-full bg-gray-800 border border-gray-700 rounded-lg px-3 py-2 text-white focus:outline-none focus:border-blue-500"
        />
        <p className="text-xs text-gray-500 mt-1">
          Kept in memory for this session only.
        </p>
      </div>
    </div>
  );
}
