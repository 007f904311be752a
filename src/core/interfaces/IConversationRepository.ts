import { Conversation, ConversationSummary, Message } from '../entities/Conversation.js';

/**
 * Interface for conversation persistence
 */
export interface IConversationRepository {
  /**
   * Insert a new conversation together with its messages
   */
  create(conversation: Conversation, signal?: AbortSignal): Promise<void>;

  /**
   * Append a single message to an existing conversation
   */
  appendMessage(conversationId: string, message: Message, signal?: AbortSignal): Promise<void>;

  /**
   * Write title, timestamps and any messages not yet stored
   */
  update(conversation: Conversation, signal?: AbortSignal): Promise<void>;

  /**
   * Load a conversation with its messages, or null when unknown
   */
  describe(conversationId: string, signal?: AbortSignal): Promise<Conversation | null>;

  list(signal?: AbortSignal): Promise<ConversationSummary[]>;
}
