import { Message } from '../entities/Conversation.js';
import { ChatMessage } from '../entities/Model.js';

/**
 * Abstract interface for prompt templates
 * Each template turns stored conversation messages into a model exchange
 */
export interface PromptTemplate {
  /**
   * Format conversation history into chat messages, system prompt first
   * @param messages - Stored conversation messages in creation order
   */
  formatMessages(messages: Message[]): ChatMessage[];
}

/**
 * Template whose output is cached; the version is part of the cache key
 */
export interface VersionedPromptTemplate extends PromptTemplate {
  /**
   * Version tag that changes whenever the prompt text changes
   */
  getVersion(): string;
}
