import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export const IN_MEMORY_DATABASE = ':memory:';

/**
 * Database connection manager.
 * Relative file names resolve under ./data in the working directory.
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string = 'conversations.db') {
    this.dbPath =
      dbPath === IN_MEMORY_DATABASE ? dbPath : path.resolve(process.cwd(), 'data', dbPath);

    if (this.dbPath !== IN_MEMORY_DATABASE) {
      // Ensure data directory exists
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }

    this.db = new Database(this.dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS conversations (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_conversations_updated ON conversations(updated_at);

      CREATE TABLE IF NOT EXISTS messages (
        id TEXT PRIMARY KEY,
        conversation_id TEXT NOT NULL,
        position INTEGER NOT NULL,
        role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
        content TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        UNIQUE(conversation_id, position),
        FOREIGN KEY (conversation_id) REFERENCES conversations(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_messages_conversation ON messages(conversation_id, position);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  getDatabasePath(): string {
    return this.dbPath;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  getStatistics(): {
    totalConversations: number;
    totalMessages: number;
    databaseSize: number;
  } {
    const count = (sql: string) => this.db.prepare<[], { count: number }>(sql).get()?.count ?? 0;

    let databaseSize = 0;
    if (this.dbPath !== IN_MEMORY_DATABASE && fs.existsSync(this.dbPath)) {
      databaseSize = fs.statSync(this.dbPath).size;
    }

    return {
      totalConversations: count('SELECT COUNT(*) as count FROM conversations'),
      totalMessages: count('SELECT COUNT(*) as count FROM messages'),
      databaseSize,
    };
  }
}

// Global instance
let dbInstance: DatabaseConnection | null = null;

export function initializeDatabase(dbPath?: string): DatabaseConnection {
  if (!dbInstance) {
    dbInstance = new DatabaseConnection(dbPath);
  }
  return dbInstance;
}

export function closeDatabase(): void {
  if (dbInstance) {
    dbInstance.close();
    dbInstance = null;
  }
}
