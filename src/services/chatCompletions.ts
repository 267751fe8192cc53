export interface ChatCompletionMessage {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatCompletionMessage[];
  temperature?: number;
  max_tokens?: number;
  stream?: boolean;
}

export interface ChatCompletionStreamChunk {
  id: string;
  choices: Array<{
    delta: {
      role?: string;
      content?: string | null;
    };
    finish_reason?: string | null;
  }>;
}

export interface ChatClientOptions {
  provider: string;
  endpoint: string;
  model: string;
  apiKey: string;
}

/** Anything that can turn a prompt into a stream of text deltas. */
export interface ChatClient {
  readonly model: string;
  stream(messages: ChatCompletionMessage[]): AsyncIterable<string>;
}

export class ChatCompletionError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'ChatCompletionError';
  }
}

function parseDataLine(line: string): ChatCompletionStreamChunk | 'done' | null {
  // SSE comments (": keep-alive") and non-data fields carry nothing for us
  if (!line.startsWith('data:')) return null;

  const data = line.slice(5).trim();
  if (data === '[DONE]') return 'done';

  try {
    return JSON.parse(data);
  } catch (e) {
    console.warn('Failed to parse SSE chunk:', data, e);
    return null;
  }
}

/**
 * Streaming client for OpenAI-compatible `/chat/completions` endpoints.
 *
 * Each call to {@link ChatCompletionsClient.stream} issues one request and yields
 * content deltas as they arrive. The sequence is finite and cannot be restarted.
 */
export class ChatCompletionsClient implements ChatClient {
  readonly model: string;
  private readonly provider: string;
  private readonly endpoint: string;
  private readonly apiKey: string;

  constructor(options: ChatClientOptions) {
    this.provider = options.provider;
    this.endpoint = options.endpoint;
    this.model = options.model;
    this.apiKey = options.apiKey;
  }

  async *stream(messages: ChatCompletionMessage[]): AsyncGenerator<string> {
    const request: ChatCompletionRequest = { model: this.model, messages, stream: true };
    const response = await fetch(this.endpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(request),
    });

    if (!response.ok) {
      const error = await response.text();
      throw new ChatCompletionError(`${this.provider} API error: ${error}`, response.status);
    }

    if (!response.body) {
      throw new ChatCompletionError(`${this.provider} API error: response body is null`, response.status);
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;

        buffer += decoder.decode(value, { stream: true });
        const lines = buffer.split('\n');
        buffer = lines.pop() || '';

        for (const line of lines) {
          const chunk = parseDataLine(line.trim());
          if (chunk === 'done') return;
          const delta = chunk?.choices[0]?.delta?.content;
          if (delta) yield delta;
        }
      }

      // Last event may arrive without a trailing newline
      const chunk = parseDataLine(buffer.trim());
      if (chunk && chunk !== 'done') {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) yield delta;
      }
    } finally {
      reader.releaseLock();
    }
  }
}
