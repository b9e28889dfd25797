import Database from 'better-sqlite3';
import { z } from 'zod';
import { ConversationMessageRecord } from '../../../core/entities/Conversation.js';
import { IConversationRepository } from '../../../core/interfaces/IConversationRepository.js';

const MessageRowSchema = z.object({
  id: z.number(),
  session_id: z.string(),
  message_index: z.number(),
  role: z.string(),
  content: z.string(),
  metadata: z.string().nullable(),
  created_at: z.string(),
});

const NextIndexRowSchema = z.object({
  next_index: z.number(),
});

const SessionRowSchema = z.object({
  session_id: z.string(),
  last_updated: z.string(),
  message_count: z.number(),
});

/**
 * SQLite implementation of the transcript archive
 */
export class ConversationRepository implements IConversationRepository {
  constructor(private db: Database.Database) {}

  saveMessage(
    sessionId: string,
    messageIndex: number,
    role: string,
    content: string,
    metadata?: Record<string, unknown>
  ): void {
    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO conversations (session_id, message_index, role, content, metadata, created_at)
      VALUES (?, ?, ?, ?, ?, datetime('now', 'localtime'))
    `);

    stmt.run(sessionId, messageIndex, role, content, metadata ? JSON.stringify(metadata) : null);
  }

  getHistory(sessionId: string): ConversationMessageRecord[] {
    const stmt = this.db.prepare(`
      SELECT id, session_id, message_index, role, content, metadata, created_at
      FROM conversations
      WHERE session_id = ?
      ORDER BY message_index
    `);

    return z.array(MessageRowSchema).parse(stmt.all(sessionId));
  }

  getNextMessageIndex(sessionId: string): number {
    const stmt = this.db.prepare(`
      SELECT COALESCE(MAX(message_index) + 1, 0) as next_index
      FROM conversations
      WHERE session_id = ?
    `);
    return NextIndexRowSchema.parse(stmt.get(sessionId)).next_index;
  }

  getAllSessions(): Array<{ session_id: string; last_updated: string; message_count: number }> {
    const stmt = this.db.prepare(`
      SELECT
        session_id,
        MAX(created_at) as last_updated,
        COUNT(*) as message_count
      FROM conversations
      GROUP BY session_id
      ORDER BY last_updated DESC, session_id
    `);
    return z.array(SessionRowSchema).parse(stmt.all());
  }

  clearHistory(sessionId: string): void {
    this.db.prepare('DELETE FROM conversations WHERE session_id = ?').run(sessionId);
  }
}
