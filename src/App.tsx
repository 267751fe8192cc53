import { useState, useCallback } from 'react';
import Chat from './components/Chat';
import Sidebar from './components/Sidebar';
import { OracleSession, type OracleConfig } from './services/session';
import type { Message } from './types';

interface AppProps {
  session?: OracleSession;
}

function App({ session: providedSession }: AppProps) {
  const [session] = useState(() => providedSession ?? new OracleSession());
  const [isReady, setIsReady] = useState(session.isReady);
  const [messages, setMessages] = useState<readonly Message[]>(session.memory.messages);
  const [isStreaming, setIsStreaming] = useState(false);

  const handleInitialize = useCallback(
    async (config: OracleConfig) => {
      await session.initialize(config);
      setIsReady(session.isReady);
    },
    [session]
  );

  const handleClear = useCallback(() => {
    session.clearMemory();
    setMessages(session.memory.messages);
  }, [session]);

  const handleTurnComplete = useCallback(() => {
    setMessages(session.memory.messages);
  }, [session]);

  return (
    <div className="h-screen flex bg-gray-950">
      <aside className="w-80 flex-shrink-0">
        <Sidebar session={session} busy={isStreaming} onInitialize={handleInitialize} onClear={handleClear} />
      </aside>
      <main className="flex-1 flex flex-col min-w-0">
        <Chat
          session={session}
          isReady={isReady}
          messages={messages}
          onTurnComplete={handleTurnComplete}
          onStreamingChange={setIsStreaming}
        />
      </main>
    </div>
  );
}

export default App;
