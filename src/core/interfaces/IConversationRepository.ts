import { ConversationMessageRecord } from '../entities/Conversation.js';

/**
 * Interface for the conversation transcript archive
 */
export interface IConversationRepository {
  saveMessage(
    sessionId: string,
    messageIndex: number,
    role: string,
    content: string,
    metadata?: Record<string, unknown>
  ): void;

  getHistory(sessionId: string): ConversationMessageRecord[];

  /**
   * Index after the last archived message of a session, 0 when it has none
   */
  getNextMessageIndex(sessionId: string): number;

  getAllSessions(): Array<{ session_id: string; last_updated: string; message_count: number }>;

  clearHistory(sessionId: string): void;
}
