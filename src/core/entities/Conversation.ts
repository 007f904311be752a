/**
 * Conversation domain entities
 */
export type MessageRole = 'user' | 'assistant';

export interface Message {
  id: string;
  role: MessageRole;
  content: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface Conversation {
  id: string;
  title: string;
  messages: Message[];
  createdAt: Date;
  updatedAt: Date;
}

export interface ConversationSummary {
  id: string;
  title: string;
  messageCount: number;
  createdAt: Date;
  updatedAt: Date;
}

export const DEFAULT_CONVERSATION_TITLE = 'Untitled conversation';

export interface ConversationRow {
  id: string;
  title: string;
  created_at: string;
  updated_at: string;
  message_count?: number;
}

export interface MessageRow {
  id: string;
  conversation_id: string;
  position: number;
  role: string;
  content: string;
  created_at: string;
  updated_at: string;
}
