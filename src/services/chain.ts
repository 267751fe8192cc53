import type { Message, SourceType } from '../types';
import type { ChatClient, ChatCompletionMessage } from './chatCompletions';

export interface ChainInput {
  input: string;
  chatHistory: readonly Message[];
}

/** Instruction template bound to a model client. */
export interface Chain {
  readonly systemMessage: string;
  stream(input: ChainInput): AsyncIterable<string>;
}

// Wording is user-visible product behaviour; keep it literal.
export function buildSystemMessage(sourceType: SourceType, document: string): string {
  return [
    'You are a friendly assistant named Oracle.',
    `You have access to the following information from a document of type ${sourceType}: `,
    '',
    '####',
    document,
    '####',
    '',
    'Use the provided information as a basis for your responses.',
    '',
    'Whenever you encounter $ in your output, replace it with S.',
    '',
    'If the document contains something like "Just a moment...Enable JavaScript and cookies to continue"',
    'suggest the user reload the Oracle!',
  ].join('\n');
}

export function buildPrompt(systemMessage: string, { input, chatHistory }: ChainInput): ChatCompletionMessage[] {
  return [
    { role: 'system', content: systemMessage },
    ...chatHistory.map((message) => ({ role: message.role, content: message.content })),
    { role: 'user', content: input },
  ];
}

export function createChain(systemMessage: string, client: ChatClient): Chain {
  return {
    systemMessage,
    stream: (input) => client.stream(buildPrompt(systemMessage, input)),
  };
}
