import Database from 'better-sqlite3';
import { IConversationRepository } from '../../../core/interfaces/IConversationRepository.js';
import {
  Conversation,
  ConversationRow,
  ConversationSummary,
  Message,
  MessageRole,
  MessageRow,
} from '../../../core/entities/Conversation.js';

/**
 * SQLite implementation of conversation repository.
 * Message order is kept in `position`; new messages always go after the
 * last stored one.
 */
export class ConversationRepository implements IConversationRepository {
  constructor(private db: Database.Database) {}

  async create(conversation: Conversation, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    const insert = this.db.transaction((conv: Conversation) => {
      this.db
        .prepare(
          `INSERT INTO conversations (id, title, created_at, updated_at)
           VALUES (?, ?, ?, ?)`
        )
        .run(conv.id, conv.title, conv.createdAt.toISOString(), conv.updatedAt.toISOString());

      conv.messages.forEach((message, position) => this.insertMessage(conv.id, position, message));
    });

    insert(conversation);
  }

  async appendMessage(conversationId: string, message: Message, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    const append = this.db.transaction(() => {
      this.insertMessage(conversationId, this.nextPosition(conversationId), message);
    });

    append();
  }

  async update(conversation: Conversation, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    const write = this.db.transaction((conv: Conversation) => {
      const result = this.db
        .prepare('UPDATE conversations SET title = ?, updated_at = ? WHERE id = ?')
        .run(conv.title, conv.updatedAt.toISOString(), conv.id);

      if (result.changes === 0) {
        throw new Error(`conversation ${conv.id} does not exist`);
      }

      const stored = new Set(
        this.db
          .prepare<[string], { id: string }>('SELECT id FROM messages WHERE conversation_id = ?')
          .all(conv.id)
          .map((row) => row.id)
      );

      let position = this.nextPosition(conv.id);
      for (const message of conv.messages) {
        if (!stored.has(message.id)) {
          this.insertMessage(conv.id, position++, message);
        }
      }
    });

    write(conversation);
  }

  async describe(conversationId: string, signal?: AbortSignal): Promise<Conversation | null> {
    signal?.throwIfAborted();

    const row = this.db
      .prepare<[string], ConversationRow>(
        'SELECT id, title, created_at, updated_at FROM conversations WHERE id = ?'
      )
      .get(conversationId);

    if (!row) {
      return null;
    }

    const messages = this.db
      .prepare<[string], MessageRow>(
        `SELECT * FROM messages
         WHERE conversation_id = ?
         ORDER BY position`
      )
      .all(conversationId);

    return {
      id: row.id,
      title: row.title,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
      messages: messages.map(toMessage),
    };
  }

  async list(signal?: AbortSignal): Promise<ConversationSummary[]> {
    signal?.throwIfAborted();

    const rows = this.db
      .prepare<[], ConversationRow>(
        `SELECT c.id, c.title, c.created_at, c.updated_at, COUNT(m.id) as message_count
         FROM conversations c
         LEFT JOIN messages m ON m.conversation_id = c.id
         GROUP BY c.id
         ORDER BY c.updated_at DESC, c.created_at DESC`
      )
      .all();

    return rows.map((row) => ({
      id: row.id,
      title: row.title,
      messageCount: row.message_count ?? 0,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    }));
  }

  private nextPosition(conversationId: string): number {
    const row = this.db
      .prepare<[string], { next: number }>(
        'SELECT COALESCE(MAX(position) + 1, 0) as next FROM messages WHERE conversation_id = ?'
      )
      .get(conversationId);
    return row?.next ?? 0;
  }

  private insertMessage(conversationId: string, position: number, message: Message): void {
    this.db
      .prepare(
        `INSERT INTO messages (id, conversation_id, position, role, content, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        message.id,
        conversationId,
        position,
        message.role,
        message.content,
        message.createdAt.toISOString(),
        message.updatedAt.toISOString()
      );
  }
}

function toRole(role: string): MessageRole {
  if (role === 'user' || role === 'assistant') {
    return role;
  }
  throw new Error(`unexpected stored message role: ${role}`);
}

function toMessage(row: MessageRow): Message {
  return {
    id: row.id,
    role: toRole(row.role),
    content: row.content,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}
