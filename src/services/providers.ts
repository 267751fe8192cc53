import type { ProviderName } from '../types';
import { type ChatClient, ChatCompletionsClient } from './chatCompletions';

const GROQ_API_URL = 'https://api.groq.com/openai/v1/chat/completions';
const OPENAI_API_URL = 'https://api.openai.com/v1/chat/completions';

export interface ProviderConfig {
  models: readonly string[];
  chat: (model: string, apiKey: string) => ChatClient;
}

export type ModelConfig = Record<ProviderName, ProviderConfig>;

export const MODEL_CONFIG: ModelConfig = {
  Groq: {
    models: ['llama-3.1-70b-versatile', 'gemma2-9b-it', 'mixtral-8x7b-32768'],
    chat: (model, apiKey) =>
      new ChatCompletionsClient({ provider: 'Groq', endpoint: GROQ_API_URL, model, apiKey }),
  },
  OpenAI: {
    models: ['gpt-4o-mini', 'gpt-4o', 'o1-preview', 'o1-mini'],
    chat: (model, apiKey) =>
      new ChatCompletionsClient({ provider: 'OpenAI', endpoint: OPENAI_API_URL, model, apiKey }),
  },
};

export const PROVIDERS: readonly ProviderName[] = ['Groq', 'OpenAI'];
