import { nanoid } from 'nanoid';
import type { Message, Role, TokenUsage, ToolCall } from './types.js';

export interface MessageInit {
  role: Role;
  content: string | null;
  toolCalls?: readonly ToolCall[];
  toolCallId?: string;
  name?: string;
}

/** Messages are frozen, so copying a conversation never needs a deep copy. */
export function createMessage(init: MessageInit): Message {
  const message: Message = {
    id: nanoid(),
    role: init.role,
    content: init.content,
    timestamp: Date.now(),
    ...(init.toolCalls?.length
      ? { toolCalls: Object.freeze(init.toolCalls.map((tc) => Object.freeze({ ...tc }))) }
      : {}),
    ...(init.toolCallId !== undefined ? { toolCallId: init.toolCallId } : {}),
    ...(init.name !== undefined ? { name: init.name } : {}),
  };
  return Object.freeze(message);
}

export class Conversation {
  private messages: Message[];

  constructor(messages: readonly Message[] = []) {
    this.messages = [...messages];
  }

  get length(): number {
    return this.messages.length;
  }

  append(init: MessageInit): Message {
    const message = createMessage(init);
    this.messages.push(message);
    return message;
  }

  getMessages(): Message[] {
    return [...this.messages];
  }

  clone(): Conversation {
    return new Conversation(this.messages);
  }

  clear(): void {
    this.messages = [];
  }
}

export function emptyUsage(): TokenUsage {
  return { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
}

export class UsageAccumulator {
  private totals: TokenUsage;

  constructor(initial: TokenUsage = emptyUsage()) {
    this.totals = { ...initial };
  }

  add(delta: TokenUsage): void {
    this.totals.promptTokens += delta.promptTokens;
    this.totals.completionTokens += delta.completionTokens;
    this.totals.totalTokens += delta.totalTokens;
  }

  snapshot(): TokenUsage {
    return { ...this.totals };
  }

  clone(): UsageAccumulator {
    return new UsageAccumulator(this.totals);
  }

  reset(): void {
    this.totals = emptyUsage();
  }
}
