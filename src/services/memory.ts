import type { Message } from '../types';

function createMessageId(): string {
  return `msg_${Date.now()}_${Math.random().toString(36).slice(2, 9)}`;
}

/** Append-only record of a conversation, in chronological order. */
export class ConversationBuffer {
  private readonly entries: Message[] = [];

  get messages(): readonly Message[] {
    return [...this.entries];
  }

  get length(): number {
    return this.entries.length;
  }

  addUserMessage(content: string): Message {
    return this.append('user', content);
  }

  addAiMessage(content: string): Message {
    return this.append('assistant', content);
  }

  private append(role: Message['role'], content: string): Message {
    const message: Message = { id: createMessageId(), role, content, timestamp: Date.now() };
    this.entries.push(message);
    return message;
  }
}
