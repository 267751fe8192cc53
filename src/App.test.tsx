// @vitest-environment jsdom
import { afterEach, describe, it, expect, vi } from 'vitest';
import { cleanup, fireEvent, render, screen, waitFor } from '@testing-library/react';
import App from './App';
import { OracleSession } from './services/session';
import type { ChatClient, ChatCompletionMessage } from './services/chatCompletions';
import type { ModelConfig } from './services/providers';

afterEach(cleanup);

async function* helloBack() {
  yield 'Hello ';
  yield 'back';
}

function createSession(
  fetchDocument = vi.fn().mockResolvedValue('Hello\nWorld'),
  reply: () => AsyncIterable<string> = helloBack
) {
  const prompts: ChatCompletionMessage[][] = [];
  const chat = (model: string): ChatClient => ({
    model,
    stream(messages) {
      prompts.push(messages);
      return reply();
    },
  });
  const models: ModelConfig = {
    Groq: { models: ['llama-3.1-70b-versatile'], chat },
    OpenAI: { models: ['gpt-4o-mini'], chat },
  };
  return { session: new OracleSession({ fetchDocument, models }), fetchDocument, prompts };
}

async function initializeWithTxt(content: string) {
  fireEvent.change(screen.getByLabelText('Select file type'), { target: { value: 'Txt' } });
  const file = new File([content], 'notes.txt', { type: 'text/plain' });
  fireEvent.change(screen.getByLabelText('Upload a TXT file'), { target: { files: [file] } });
  fireEvent.click(screen.getByRole('button', { name: 'Initialize Oracle' }));
  return { file, input: await screen.findByPlaceholderText('Talk to the Oracle') };
}

function send(input: HTMLElement, text: string) {
  fireEvent.change(input, { target: { value: text } });
  fireEvent.keyDown(input, { key: 'Enter' });
}

describe('App', () => {
  it('asks the user to load the Oracle before any chat', () => {
    const { session } = createSession();
    render(<App session={session} />);

    expect(screen.getByText('🤖Welcome to the Oracle')).toBeTruthy();
    expect(screen.getByText('Load the Oracle')).toBeTruthy();
    expect(screen.queryByPlaceholderText('Talk to the Oracle')).toBeNull();
  });

  it('loads an uploaded text file, streams a reply and clears the history', async () => {
    const { session, fetchDocument, prompts } = createSession();
    render(<App session={session} />);

    const { file, input } = await initializeWithTxt('Hello\nWorld');
    expect(fetchDocument).toHaveBeenCalledWith({ type: 'Txt', file });

    send(input, 'Summarize this');

    expect(await screen.findByText('Hello back')).toBeTruthy();
    expect(screen.getByText('Summarize this')).toBeTruthy();
    await waitFor(() => expect(session.memory.length).toBe(2));
    expect(prompts[0][0].content).toContain('####\nHello\nWorld\n####');

    fireEvent.click(screen.getByRole('button', { name: 'Clear Conversation History' }));

    expect(screen.queryByText('Hello back')).toBeNull();
    expect(session.memory.length).toBe(0);
    expect(session.isReady).toBe(true);
  });

  it('remembers the API key typed for each provider', () => {
    const { session } = createSession();
    render(<App session={session} />);

    fireEvent.click(screen.getByRole('tab', { name: 'Model Selection' }));
    fireEvent.change(screen.getByLabelText('Enter the API key for Groq'), { target: { value: 'groq-key' } });

    fireEvent.change(screen.getByLabelText('Select model provider'), { target: { value: 'OpenAI' } });
    expect(screen.getByLabelText<HTMLInputElement>('Enter the API key for OpenAI').value).toBe('');
    expect(screen.getByLabelText<HTMLSelectElement>('Select model').value).toBe('gpt-4o-mini');

    fireEvent.change(screen.getByLabelText('Select model provider'), { target: { value: 'Groq' } });
    expect(screen.getByLabelText<HTMLInputElement>('Enter the API key for Groq').value).toBe('groq-key');
    expect(session.apiKeyFor('Groq')).toBe('groq-key');
  });

  it('shows the loading error and stays uninitialized', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { session } = createSession(vi.fn().mockRejectedValue(new Error('Failed to fetch https://example.test/: 404 Not Found')));
    render(<App session={session} />);

    fireEvent.change(screen.getByLabelText('Enter the website URL'), { target: { value: 'https://example.test/' } });
    fireEvent.click(screen.getByRole('button', { name: 'Initialize Oracle' }));

    expect(await screen.findByText('Failed to fetch https://example.test/: 404 Not Found')).toBeTruthy();
    expect(screen.getByText('Load the Oracle')).toBeTruthy();
    expect(session.isReady).toBe(false);
  });

  it('locks Initialize and Clear while a reply is streaming', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const { session } = createSession(undefined, async function* () {
      yield 'Thinking';
      await gate;
      yield ' done';
    });
    render(<App session={session} />);

    const { input } = await initializeWithTxt('Hello\nWorld');
    send(input, 'Summarize this');

    expect(await screen.findByText('Thinking')).toBeTruthy();
    const clear = screen.getByRole<HTMLButtonElement>('button', { name: 'Clear Conversation History' });
    const initialize = screen.getByRole<HTMLButtonElement>('button', { name: 'Initialize Oracle' });
    expect(clear.disabled).toBe(true);
    expect(initialize.disabled).toBe(true);

    release();

    expect(await screen.findByText('Thinking done')).toBeTruthy();
    await waitFor(() => expect(clear.disabled).toBe(false));
    expect(initialize.disabled).toBe(false);
    expect(session.memory.length).toBe(2);
  });

  it('drops the streaming error once the history is cleared', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { session } = createSession(undefined, async function* () {
      yield 'Partial';
      throw new Error('connection reset');
    });
    render(<App session={session} />);

    const { input } = await initializeWithTxt('Hello\nWorld');
    send(input, 'Summarize this');

    expect(await screen.findByText('Error: connection reset')).toBeTruthy();
    expect(session.memory.length).toBe(0);
    const clear = screen.getByRole<HTMLButtonElement>('button', { name: 'Clear Conversation History' });
    await waitFor(() => expect(clear.disabled).toBe(false));

    fireEvent.click(clear);

    expect(screen.queryByText('Error: connection reset')).toBeNull();
  });
});
