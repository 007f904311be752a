/**
 * Shared fakes for service tests
 */

import { ChatCompletion, ToolCall } from '../src/core/entities/Model.js';
import { Conversation, ConversationSummary, Message } from '../src/core/entities/Conversation.js';
import { IOllamaClient } from '../src/core/interfaces/IOllamaClient.js';
import { IConversationRepository } from '../src/core/interfaces/IConversationRepository.js';
import { HolidayEvent, IClock, IHolidayCalendar } from '../src/core/interfaces/ICapabilities.js';
import { setLogSink } from '../src/utils/logger.js';

export type ChatMock = jest.Mock<ReturnType<IOllamaClient['chat']>, Parameters<IOllamaClient['chat']>>;

export function completion(content: string, toolCalls: ToolCall[] = []): ChatCompletion {
  return { model: 'test-model', choices: [{ message: { content, toolCalls } }] };
}

export function toolCall(name: string, args: unknown = {}, id = 'call_0'): ToolCall {
  return { id, function: { name, arguments: args } };
}

export function fakeOllama(chat: ChatMock): IOllamaClient {
  return {
    chat,
    listModels: jest.fn().mockResolvedValue({ models: [{ name: 'test-model' }] }),
  };
}

export function fixedClock(iso: string): IClock {
  return { now: () => new Date(iso) };
}

export function staticHolidays(events: HolidayEvent[]): IHolidayCalendar {
  return { loadEvents: jest.fn().mockResolvedValue(events) };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Collect structured log lines instead of writing them to stderr
 */
export function captureLogs(): Array<Record<string, unknown>> {
  const lines: Array<Record<string, unknown>> = [];
  setLogSink((line) => lines.push(JSON.parse(line)));
  return lines;
}

/**
 * In-memory repository keeping the same message order rules as the SQLite one
 */
export class InMemoryConversationRepository implements IConversationRepository {
  readonly conversations = new Map<string, Conversation>();
  failUpdate: Error | null = null;
  failCreate: Error | null = null;

  async create(conversation: Conversation): Promise<void> {
    if (this.failCreate) throw this.failCreate;
    this.conversations.set(conversation.id, clone(conversation));
  }

  async appendMessage(conversationId: string, message: Message): Promise<void> {
    const stored = this.conversations.get(conversationId);
    if (!stored) throw new Error(`conversation ${conversationId} does not exist`);
    stored.messages.push({ ...message });
  }

  async update(conversation: Conversation): Promise<void> {
    if (this.failUpdate) throw this.failUpdate;
    if (!this.conversations.has(conversation.id)) {
      throw new Error(`conversation ${conversation.id} does not exist`);
    }
    this.conversations.set(conversation.id, clone(conversation));
  }

  async describe(conversationId: string): Promise<Conversation | null> {
    const stored = this.conversations.get(conversationId);
    return stored ? clone(stored) : null;
  }

  async list(): Promise<ConversationSummary[]> {
    return [...this.conversations.values()]
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime())
      .map((conv) => ({
        id: conv.id,
        title: conv.title,
        messageCount: conv.messages.length,
        createdAt: conv.createdAt,
        updatedAt: conv.updatedAt,
      }));
  }
}

function clone(conversation: Conversation): Conversation {
  return { ...conversation, messages: conversation.messages.map((msg) => ({ ...msg })) };
}
