import { useState, useRef, useEffect } from 'react';
import ReactMarkdown from 'react-markdown';
import remarkGfm from 'remark-gfm';
import { Send, Loader2, AlertTriangle } from 'lucide-react';
import type { Message } from '../types';
import type { OracleSession } from '../services/session';

interface ChatProps {
  session: OracleSession;
  isReady: boolean;
  messages: readonly Message[];
  onTurnComplete: () => void;
  onStreamingChange: (streaming: boolean) => void;
}

function MessageBubble({ role, content, streaming }: { role: Message['role']; content: string; streaming?: boolean }) {
  return (
    <div className={`flex ${role === 'user' ? 'justify-end' : 'justify-start'}`}>
      <div
        className={`max-w-[80%] rounded-lg p-3 ${
          role === 'user' ? 'bg-blue-600 text-white' : 'bg-gray-800 text-gray-100'
        }`}
      >
        {role === 'assistant' && !streaming ? (
          <div className="chat-markdown">
            <ReactMarkdown remarkPlugins={[remarkGfm]}>{content}</ReactMarkdown>
          </div>
        ) : (
          <div className="whitespace-pre-wrap">{content}</div>
        )}
      </div>
    </div>
  );
}

export default function Chat({ session, isReady, messages, onTurnComplete, onStreamingChange }: ChatProps) {
  const [input, setInput] = useState('');
  const [pendingInput, setPendingInput] = useState<string | null>(null);
  const [streamingText, setStreamingText] = useState('');
  const [isLoading, setIsLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const messagesEndRef = useRef<HTMLDivElement>(null);
  const inputRef = useRef<HTMLTextAreaElement>(null);

  useEffect(() => {
    messagesEndRef.current?.scrollIntoView?.({ behavior: 'smooth' });
  }, [messages, pendingInput, streamingText]);

  useEffect(() => {
    if (messages.length === 0) setError(null);
  }, [messages]);

  const handleSend = async () => {
    if (!input.trim() || isLoading) return;
    const userInput = input;

    let stream: AsyncGenerator<string, string>;
    try {
      stream = session.chat(userInput);
    } catch (err: unknown) {
      setError(err instanceof Error ? err.message : 'Unknown error');
      return;
    }

    setInput('');
    setError(null);
    setPendingInput(userInput);
    setStreamingText('');
    setIsLoading(true);
    onStreamingChange(true);

    try {
      for await (const chunk of stream) {
        setStreamingText((prev) => prev + chunk);
      }
      onTurnComplete();
    } catch (err: unknown) {
      console.error('Error streaming response:', err);
      setError(`Error: ${err instanceof Error ? err.message : 'Failed to get response'}`);
    } finally {
      setPendingInput(null);
      setStreamingText('');
      setIsLoading(false);
      onStreamingChange(false);
      setTimeout(() => inputRef.current?.focus(), 0);
    }
  };

  return (
    <div className="h-full flex flex-col bg-gray-950">
      <div className="border-b border-gray-800 px-6 py-4">
        <h1 className="text-2xl font-bold text-white">🤖Welcome to the Oracle</h1>
      </div>

      {!isReady ? (
        <div className="p-6">
          <div
            role="alert"
            className="flex items-center gap-2 text-red-300 bg-red-500/10 border border-red-500/40 rounded-lg px-4 py-3"
          >
            <AlertTriangle size={18} />
            <span>Load the Oracle</span>
          </div>
        </div>
      ) : (
        <>
          <div className="flex-1 overflow-y-auto p-4 space-y-4">
            {messages.map((message) => (
              <MessageBubble key={message.id} role={message.role} content={message.content} />
            ))}
            {pendingInput !== null && (
              <>
                <MessageBubble role="user" content={pendingInput} />
                {streamingText ? (
                  <MessageBubble role="assistant" content={streamingText} streaming />
                ) : (
                  <div className="flex justify-start">
                    <div className="rounded-lg p-3 bg-gray-800 text-gray-100">
                      <Loader2 className="animate-spin" size={20} />
                    </div>
                  </div>
                )}
              </>
            )}
            {error && (
              <div role="alert" className="text-sm text-red-300 bg-red-500/10 border border-red-500/40 rounded-lg px-3 py-2">
                {error}
              </div>
            )}
            <div ref={messagesEndRef} />
          </div>
          <div className="border-t border-gray-800 p-4">
            <div className="flex gap-2 items-end">
              <textarea
                ref={inputRef}
                value={input}
                onChange={(e) => setInput(e.target.value)}
                onKeyDown={(e) => {
                  if (e.key === 'Enter' && !e.shiftKey) {
                    e.preventDefault();
                    void handleSend();
                  }
                }}
                placeholder="Talk to the Oracle"
                rows={1}
                className="flex-1 rounded-lg px-4 py-2 bg-gray-800 border border-gray-700 text-white focus:outline-none focus:border-blue-500 resize-none min-h-[42px] max-h-[200px] overflow-y-auto"
                disabled={isLoading}
              />
              <button
                onClick={() => void handleSend()}
                disabled={isLoading || !input.trim()}
                className="bg-blue-600 hover:bg-blue-700 text-white px-4 py-2 rounded-lg flex items-center gap-2 disabled:opacity-50 disabled:cursor-not-allowed"
                title="Send"
              >
                <Send size={20} />
              </button>
            </div>
          </div>
        </>
      )}
    </div>
  );
}
