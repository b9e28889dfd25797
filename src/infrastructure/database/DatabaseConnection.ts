import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';

const CountRowSchema = z.object({ count: z.number() });

/**
 * Turn a `database.url` setting into a file path for better-sqlite3.
 * Accepts `sqlite:///abs/path.db`, `sqlite://rel.db`, `sqlite:rel.db`, plain paths and `:memory:`.
 */
export function resolveDatabasePath(url: string, baseDir: string = process.cwd()): string {
  let location = url.trim();
  if (location.startsWith('sqlite://')) {
    location = location.slice('sqlite://'.length);
  } else if (location.startsWith('sqlite:')) {
    location = location.slice('sqlite:'.length);
  }

  if (location === ':memory:' || location === '') {
    return ':memory:';
  }
  return path.resolve(baseDir, location);
}

/**
 * Database connection manager for the transcript archive
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(url: string = ':memory:') {
    this.dbPath = resolveDatabasePath(url);

    if (this.dbPath !== ':memory:') {
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    if (this.dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('synchronous = NORMAL');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS conversations (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL,
        message_index INTEGER NOT NULL,
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        metadata TEXT,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        UNIQUE(session_id, message_index)
      );

      CREATE INDEX IF NOT EXISTS idx_session_id ON conversations(session_id);
      CREATE INDEX IF NOT EXISTS idx_session_created ON conversations(session_id, created_at);
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

  getStatistics(): { totalMessages: number; totalSessions: number; databaseSize: number } {
    const messages = CountRowSchema.parse(
      this.db.prepare('SELECT COUNT(*) as count FROM conversations').get()
    ).count;
    const sessions = CountRowSchema.parse(
      this.db.prepare('SELECT COUNT(DISTINCT session_id) as count FROM conversations').get()
    ).count;

    let databaseSize = 0;
    if (this.dbPath !== ':memory:' && fs.existsSync(this.dbPath)) {
      databaseSize = fs.statSync(this.dbPath).size;
    }

    return { totalMessages: messages, totalSessions: sessions, databaseSize };
  }
}
