import type { DocumentSource, ProviderName } from '../types';
import { buildSystemMessage, createChain, type Chain } from './chain';
import { fetchDocument } from './documents';
import { ConversationBuffer } from './memory';
import { MODEL_CONFIG, type ModelConfig } from './providers';

export class OracleNotLoadedError extends Error {
  constructor() {
    super('Load the Oracle');
    this.name = 'OracleNotLoadedError';
  }
}

export interface OracleConfig {
  provider: ProviderName;
  model: string;
  apiKey: string;
  source: DocumentSource;
}

export interface OracleSessionDeps {
  fetchDocument?: (source: DocumentSource) => Promise<string>;
  models?: ModelConfig;
}

/**
 * Everything one user's conversation with the Oracle needs: the active chain,
 * the conversation buffer and the API keys typed in per provider.
 *
 * A chain must be installed with {@link OracleSession.initialize} before
 * {@link OracleSession.chat} accepts a turn.
 */
export class OracleSession {
  chain: Chain | null = null;
  memory = new ConversationBuffer();
  private readonly apiKeys: Partial<Record<ProviderName, string>> = {};
  private readonly loadDocument: (source: DocumentSource) => Promise<string>;
  private readonly models: ModelConfig;

  constructor(deps: OracleSessionDeps = {}) {
    this.loadDocument = deps.fetchDocument ?? fetchDocument;
    this.models = deps.models ?? MODEL_CONFIG;
  }

  get isReady(): boolean {
    return this.chain !== null;
  }

  apiKeyFor(provider: ProviderName): string {
    return this.apiKeys[provider] ?? '';
  }

  rememberApiKey(provider: ProviderName, apiKey: string): void {
    this.apiKeys[provider] = apiKey;
  }

  async initialize({ provider, model, apiKey, source }: OracleConfig): Promise<void> {
    const document = await this.loadDocument(source);
    const systemMessage = buildSystemMessage(source.type, document);
    const client = this.models[provider].chat(model, apiKey);
    this.chain = createChain(systemMessage, client);
  }

  clearMemory(): void {
    this.memory = new ConversationBuffer();
  }

  /**
   * Streams the assistant's reply to `input`. Both messages are appended to the
   * buffer only once the stream has completed.
   *
   * @throws OracleNotLoadedError when no chain has been initialized
   */
  chat(input: string): AsyncGenerator<string, string> {
    const chain = this.chain;
    if (!chain) {
      throw new OracleNotLoadedError();
    }
    return this.runTurn(chain, input);
  }

  private async *runTurn(chain: Chain, input: string): AsyncGenerator<string, string> {
    const memory = this.memory;
    let response = '';
    for await (const chunk of chain.stream({ input, chatHistory: memory.messages })) {
      response += chunk;
      yield chunk;
    }
    memory.addUserMessage(input);
    memory.addAiMessage(response);
    return response;
  }
}
